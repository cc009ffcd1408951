import { v4 as uuidv4 } from "uuid";
import { buildContextWindow } from "./context.js";
import { ConversationNotFoundError, EmptyMessageError } from "./errors.js";
import { getLogger, type Logger } from "./logger.js";
import {
  cleanupCutoff,
  DEFAULT_LIST_LIMIT,
  DEFAULT_SEARCH_LIMIT,
  isOlderThan,
  type ConversationStore,
  type StoreKind,
} from "./storage.js";
import type {
  ContextEntry,
  Conversation,
  ConversationSummary,
  Message,
  MessageRole,
  StoreStats,
} from "../types.js";

export const DEFAULT_CONTEXT_MESSAGES = 10;
export const DEFAULT_CLEANUP_DAYS = 30;

export interface ManagerOptions {
  /** Context window used when getContext is called without one. */
  maxContextMessages?: number;
  now?: () => Date;
  generateId?: () => string;
  logger?: Logger;
}

export interface AppendResult {
  message: Message;
  /** False when the store rejected the write; the message is still in memory. */
  persisted: boolean;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function defaultTitle(at: Date): string {
  const date = `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())}`;
  return `Conversation ${date} ${pad(at.getHours())}:${pad(at.getMinutes())}`;
}

/**
 * The one API the rest of the application uses for conversations.
 *
 * Ids and timestamps are assigned here, never by a store. Conversations
 * touched during the session stay in memory and that copy wins over the
 * store's for the rest of the process. Every mutation writes the whole
 * conversation through before returning.
 */
export class ConversationManager {
  private store: ConversationStore;
  private conversations = new Map<string, Conversation>();
  private maxContextMessages: number;
  private now: () => Date;
  private generateId: () => string;
  private log: Logger;

  constructor(store: ConversationStore, options: ManagerOptions = {}) {
    this.store = store;
    this.maxContextMessages = options.maxContextMessages ?? DEFAULT_CONTEXT_MESSAGES;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? uuidv4;
    this.log = options.logger ?? getLogger("conversations");
  }

  get backend(): StoreKind {
    return this.store.kind;
  }

  isCached(id: string): boolean {
    return this.conversations.has(id);
  }

  async createConversation(title?: string): Promise<Conversation> {
    const at = this.now();
    const timestamp = at.toISOString();

    const conversation: Conversation = {
      id: this.generateId(),
      title: title?.trim() || defaultTitle(at),
      messages: [],
      created_at: timestamp,
      updated_at: timestamp,
    };
    this.conversations.set(conversation.id, conversation);

    if (!(await this.store.save(conversation))) {
      this.log.warn(`Conversation ${conversation.id} was created but not persisted`);
    }
    this.log.info(`Created new conversation: ${conversation.id}`);
    return structuredClone(conversation);
  }

  /**
   * Append a message and persist the conversation. Throws
   * ConversationNotFoundError when neither memory nor the store has it.
   */
  async addMessage(
    conversationId: string,
    role: MessageRole,
    content: string,
    metadata?: Record<string, unknown>
  ): Promise<AppendResult> {
    if (!content.trim()) {
      throw new EmptyMessageError();
    }

    const conversation = await this.resolve(conversationId);
    if (!conversation) {
      throw new ConversationNotFoundError(conversationId);
    }

    const message: Message = {
      id: this.generateId(),
      role,
      content,
      timestamp: this.now().toISOString(),
    };
    if (metadata) message.metadata = metadata;

    conversation.messages.push(message);
    conversation.updated_at = message.timestamp;

    const persisted = await this.store.save(conversation);
    if (!persisted) {
      this.log.warn(`Message ${message.id} kept in memory only; save to ${this.store.kind} failed`);
    }
    this.log.debug(`Added ${role} message to conversation ${conversationId}`);
    return { message: structuredClone(message), persisted };
  }

  private async resolve(id: string): Promise<Conversation | null> {
    const hot = this.conversations.get(id);
    if (hot) return hot;

    const loaded = await this.store.load(id);
    if (!loaded) return null;
    this.conversations.set(id, loaded);
    return loaded;
  }

  /** A copy; edits to it do not reach the cached conversation. */
  async getConversation(id: string): Promise<Conversation | null> {
    const conversation = await this.resolve(id);
    return conversation ? structuredClone(conversation) : null;
  }

  /**
   * Pull a conversation from the store into memory.
   */
  async loadConversation(id: string): Promise<boolean> {
    const loaded = await this.store.load(id);
    if (!loaded) return false;
    this.conversations.set(id, loaded);
    this.log.info(`Loaded conversation: ${id}`);
    return true;
  }

  async getMessages(id: string): Promise<Message[]> {
    const conversation = await this.resolve(id);
    return conversation ? structuredClone(conversation.messages) : [];
  }

  async getContext(id: string, maxMessages: number = this.maxContextMessages): Promise<ContextEntry[]> {
    return buildContextWindow(await this.getMessages(id), maxMessages);
  }

  /**
   * Write a conversation held in memory back to the store.
   */
  async saveConversation(id: string): Promise<boolean> {
    const conversation = this.conversations.get(id);
    if (!conversation) return false;
    return this.store.save(conversation);
  }

  async listConversations(limit = DEFAULT_LIST_LIMIT, offset = 0): Promise<ConversationSummary[]> {
    return this.store.list(limit, offset);
  }

  async searchConversations(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<ConversationSummary[]> {
    return this.store.search(query, limit);
  }

  async deleteConversation(id: string): Promise<boolean> {
    this.conversations.delete(id);
    const deleted = await this.store.delete(id);
    if (deleted) this.log.info(`Deleted conversation: ${id}`);
    return deleted;
  }

  async getSummary(id: string): Promise<string> {
    const conversation = await this.resolve(id);
    if (!conversation) return "Conversation not found";

    const count = conversation.messages.length;
    if (count === 0) {
      return `Empty conversation created at ${conversation.created_at}`;
    }
    const last = conversation.messages[count - 1].timestamp;
    return `${conversation.title} - ${count} messages, last activity: ${last}`;
  }

  async getStorageStats(): Promise<StoreStats> {
    return this.store.stats();
  }

  /**
   * Run the store's cleanup sweep and forget cached conversations it covered,
   * so a later append cannot bring them back.
   */
  async cleanupOldConversations(days = DEFAULT_CLEANUP_DAYS): Promise<number> {
    const cutoff = cleanupCutoff(days, this.now());
    const deleted = await this.store.cleanup(days);

    for (const [id, conversation] of this.conversations) {
      if (isOlderThan(conversation.updated_at, cutoff)) {
        this.conversations.delete(id);
      }
    }
    return deleted;
  }

  async close(): Promise<void> {
    this.conversations.clear();
    await this.store.close();
  }
}
