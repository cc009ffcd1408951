import { Redis } from "ioredis";
import type { RedisConfig } from "../config.js";
import { parseConversation } from "../codec.js";
import { BackendConnectionError, toErrorMessage } from "../errors.js";
import { getLogger, type Logger } from "../logger.js";
import {
  byUpdatedDesc,
  cleanupCutoff,
  DEFAULT_LIST_LIMIT,
  DEFAULT_SEARCH_LIMIT,
  isOlderThan,
  matchesQuery,
  summarize,
  type ConversationStore,
} from "../storage.js";
import type { Conversation, ConversationSummary, StoreStats } from "../../types.js";

export const CONVERSATIONS_SET = "conversations";
export const SEARCH_INDEX = "conversations_idx";
/** Characters of "role: content" text copied into the indexed `content` field. */
export const SEARCHABLE_CONTENT_LIMIT = 5000;
export const DEFAULT_KEY_TTL_DAYS = 30;

const SUMMARY_FIELDS = ["id", "title", "created_at", "updated_at", "message_count"] as const;

export function conversationKey(id: string): string {
  return `conversation:${id}`;
}

export function messageKey(id: string, index: number): string {
  return `message:${id}:${index}`;
}

/**
 * The Redis commands the store relies on. Kept narrow so tests can run
 * against an in-process fake.
 */
export interface RedisClient {
  ping(): Promise<string>;
  hset(key: string, fields: Record<string, string | number>): Promise<number>;
  hget(key: string, field: string): Promise<string | null>;
  hmget(key: string, fields: readonly string[]): Promise<(string | null)[]>;
  exists(key: string): Promise<number>;
  del(keys: readonly string[]): Promise<number>;
  sadd(key: string, member: string): Promise<number>;
  srem(key: string, member: string): Promise<number>;
  smembers(key: string): Promise<string[]>;
  scard(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
  info(section: string): Promise<string>;
  /** Raw command, used for MODULE and FT.* which have no typed helper. */
  command(name: string, args: readonly (string | number)[]): Promise<unknown>;
  quit(): Promise<void>;
}

export function wrapIoredis(redis: Redis): RedisClient {
  return {
    ping: () => redis.ping(),
    hset: (key, fields) => redis.hset(key, fields),
    hget: (key, field) => redis.hget(key, field),
    hmget: (key, fields) => redis.hmget(key, ...fields),
    exists: (key) => redis.exists(key),
    del: (keys) => redis.del(...keys),
    sadd: (key, member) => redis.sadd(key, member),
    srem: (key, member) => redis.srem(key, member),
    smembers: (key) => redis.smembers(key),
    scard: (key) => redis.scard(key),
    expire: (key, seconds) => redis.expire(key, seconds),
    info: (section) => redis.info(section),
    command: (name, args) => redis.call(name, ...args),
    quit: async () => {
      await redis.quit();
    },
  };
}

/**
 * Parse the `key:value` lines of an INFO reply.
 */
export function parseInfo(text: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const line of text.split(/\r?\n/)) {
    if (!line || line.startsWith("#")) continue;
    const sep = line.indexOf(":");
    if (sep === -1) continue;
    fields[line.slice(0, sep)] = line.slice(sep + 1).trim();
  }
  return fields;
}

/**
 * Escape RediSearch query syntax so user input is matched as plain terms.
 */
export function escapeSearchQuery(query: string): string {
  return query.trim().replace(/[,.<>{}[\]"':;!@#$%^&*()\-+=~|/\\]/g, "\\$&");
}

function toSummary(fields: Record<string, string | null | undefined>): ConversationSummary | null {
  const { id, title, created_at, updated_at, message_count } = fields;
  if (id == null || title == null || updated_at == null) return null;
  const count = message_count == null ? 0 : Number.parseInt(message_count, 10);
  return {
    id,
    title,
    message_count: Number.isNaN(count) ? 0 : count,
    created_at: created_at ?? "",
    updated_at,
  };
}

/**
 * FT.SEARCH replies as [total, key, [field, value, ...], key, [...], ...].
 */
export function parseSearchReply(reply: unknown): ConversationSummary[] {
  if (!Array.isArray(reply)) {
    throw new Error("Unexpected FT.SEARCH reply");
  }

  const results: ConversationSummary[] = [];
  for (let i = 1; i + 1 < reply.length; i += 2) {
    const pairs: unknown = reply[i + 1];
    if (!Array.isArray(pairs)) continue;

    const fields: Record<string, string> = {};
    for (let j = 0; j + 1 < pairs.length; j += 2) {
      fields[String(pairs[j])] = String(pairs[j + 1]);
    }
    const summary = toSummary(fields);
    if (summary) results.push(summary);
  }
  return results;
}

export interface RedisStoreOptions {
  client: RedisClient;
  /** TTL refreshed on every save. */
  keyTtlDays?: number;
  logger?: Logger;
}

/**
 * Redis-backed store.
 *
 * Every save re-arms a TTL on the conversation and message keys, so a
 * conversation nobody touches for `keyTtlDays` disappears on its own,
 * whether or not `cleanup` ever runs. The writes making up a save are not
 * one transaction; a crash between them can leave the summary fields and
 * the `data` body out of step.
 */
export class RedisConversationStore implements ConversationStore {
  readonly kind = "redis" as const;
  readonly keyTtlDays: number;
  private client: RedisClient;
  private log: Logger;
  private searchAvailable = false;

  constructor(options: RedisStoreOptions) {
    this.client = options.client;
    this.keyTtlDays = options.keyTtlDays ?? DEFAULT_KEY_TTL_DAYS;
    this.log = options.logger ?? getLogger("store.redis");
  }

  /**
   * Open a connection and probe for the search module. Throws
   * BackendConnectionError when the server cannot be reached.
   */
  static async connect(config: RedisConfig, logger: Logger = getLogger("store.redis")): Promise<RedisConversationStore> {
    const redis = new Redis({
      host: config.host,
      port: config.port,
      db: config.db,
      password: config.password ?? undefined,
      connectTimeout: config.connectTimeoutMs,
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: config.maxRetries,
      retryStrategy: (times: number) => Math.min(times * 500, 5000),
    });
    redis.on("error", (err: Error) => {
      logger.debug(`Redis client error: ${err.message}`);
    });

    try {
      await redis.connect();
      await redis.ping();
    } catch (err) {
      redis.disconnect();
      throw new BackendConnectionError(
        `Could not connect to Redis at ${config.host}:${config.port}: ${toErrorMessage(err)}`,
        { cause: err }
      );
    }
    logger.info("Connected to Redis successfully");

    const store = new RedisConversationStore({
      client: wrapIoredis(redis),
      keyTtlDays: config.keyTtlDays,
      logger,
    });
    await store.initialize();
    return store;
  }

  get hasSearchIndex(): boolean {
    return this.searchAvailable;
  }

  private get ttlSeconds(): number {
    return Math.max(1, Math.round(this.keyTtlDays * 24 * 60 * 60));
  }

  /**
   * Create the full-text index when the search module is loaded. Never throws.
   */
  async initialize(): Promise<void> {
    try {
      const modules = await this.client.command("MODULE", ["LIST"]);
      if (!JSON.stringify(modules).toLowerCase().includes("search")) {
        this.log.warn("RediSearch module not available - search will scan every conversation");
        return;
      }

      try {
        await this.client.command("FT.CREATE", [
          SEARCH_INDEX,
          "ON", "HASH",
          "PREFIX", 1, "conversation:",
          "SCHEMA",
          "title", "TEXT", "WEIGHT", "2.0",
          "content", "TEXT", "WEIGHT", "1.0",
          "created_ts", "NUMERIC", "SORTABLE",
          "updated_ts", "NUMERIC", "SORTABLE",
          "message_count", "NUMERIC", "SORTABLE",
        ]);
        this.log.info("Created Redis search index for conversations");
      } catch (err) {
        if (!/index already exists/i.test(toErrorMessage(err))) {
          this.log.warn(`Could not create search index: ${toErrorMessage(err)}`);
          return;
        }
      }
      this.searchAvailable = true;
    } catch (err) {
      this.log.warn(`Could not initialize search index: ${toErrorMessage(err)}`);
    }
  }

  async isConnected(): Promise<boolean> {
    try {
      await this.client.ping();
      return true;
    } catch {
      return false;
    }
  }

  private async ensureConnected(): Promise<boolean> {
    if (await this.isConnected()) return true;
    this.log.error("Redis not connected");
    return false;
  }

  async save(conversation: Conversation): Promise<boolean> {
    if (!(await this.ensureConnected())) return false;

    try {
      const key = conversationKey(conversation.id);
      const ttl = this.ttlSeconds;
      const content = conversation.messages
        .map((m) => `${m.role}: ${m.content}`)
        .join(" ")
        .slice(0, SEARCHABLE_CONTENT_LIMIT);

      // A shorter snapshot must not leave the old tail's message keys behind.
      const previousCount = Number.parseInt((await this.client.hget(key, "message_count")) ?? "0", 10);
      const staleKeys: string[] = [];
      for (let i = conversation.messages.length; i < (Number.isNaN(previousCount) ? 0 : previousCount); i++) {
        staleKeys.push(messageKey(conversation.id, i));
      }
      if (staleKeys.length > 0) {
        await this.client.del(staleKeys);
      }

      await this.client.hset(key, {
        id: conversation.id,
        title: conversation.title,
        created_at: conversation.created_at,
        updated_at: conversation.updated_at,
        created_ts: Date.parse(conversation.created_at) || 0,
        updated_ts: Date.parse(conversation.updated_at) || 0,
        message_count: conversation.messages.length,
        content,
        data: JSON.stringify(conversation),
      });

      for (const [index, message] of conversation.messages.entries()) {
        const mkey = messageKey(conversation.id, index);
        await this.client.hset(mkey, {
          conversation_id: conversation.id,
          message_index: index,
          id: message.id,
          role: message.role,
          content: message.content,
          timestamp: message.timestamp,
          metadata: JSON.stringify(message.metadata ?? {}),
        });
        await this.client.expire(mkey, ttl);
      }

      await this.client.sadd(CONVERSATIONS_SET, conversation.id);
      await this.client.expire(key, ttl);

      this.log.debug(`Saved conversation ${conversation.id} to Redis`);
      return true;
    } catch (err) {
      this.log.error(`Error saving conversation ${conversation.id} to Redis: ${toErrorMessage(err)}`);
      return false;
    }
  }

  async load(id: string): Promise<Conversation | null> {
    if (!(await this.ensureConnected())) return null;

    try {
      const data = await this.client.hget(conversationKey(id), "data");
      if (data === null) {
        this.log.warn(`Conversation ${id} not found in Redis`);
        return null;
      }
      const conversation = parseConversation(JSON.parse(data));
      this.log.debug(`Loaded conversation ${id} from Redis`);
      return conversation;
    } catch (err) {
      this.log.error(`Error loading conversation ${id} from Redis: ${toErrorMessage(err)}`);
      return null;
    }
  }

  async delete(id: string): Promise<boolean> {
    if (!(await this.ensureConnected())) return false;

    try {
      const removed = await this.remove(id);
      if (removed) this.log.info(`Deleted conversation ${id} from Redis`);
      return removed;
    } catch (err) {
      this.log.error(`Error deleting conversation ${id} from Redis: ${toErrorMessage(err)}`);
      return false;
    }
  }

  private async remove(id: string): Promise<boolean> {
    const key = conversationKey(id);
    const count = Number.parseInt((await this.client.hget(key, "message_count")) ?? "0", 10);

    const messageKeys: string[] = [];
    for (let i = 0; i < (Number.isNaN(count) ? 0 : count); i++) {
      messageKeys.push(messageKey(id, i));
    }
    if (messageKeys.length > 0) {
      await this.client.del(messageKeys);
    }

    const removed = await this.client.del([key]);
    await this.client.srem(CONVERSATIONS_SET, id);
    return removed > 0;
  }

  async list(limit = DEFAULT_LIST_LIMIT, offset = 0): Promise<ConversationSummary[]> {
    if (!(await this.ensureConnected())) return [];

    try {
      const summaries: ConversationSummary[] = [];
      for (const id of await this.client.smembers(CONVERSATIONS_SET)) {
        const key = conversationKey(id);
        const values = await this.client.hmget(key, SUMMARY_FIELDS);
        const summary = toSummary({
          id: values[0],
          title: values[1],
          created_at: values[2],
          updated_at: values[3],
          message_count: values[4],
        });
        if (summary) {
          summaries.push(summary);
        } else if ((await this.client.exists(key)) === 0) {
          // The hash expired; drop the dangling id.
          await this.client.srem(CONVERSATIONS_SET, id);
          this.log.debug(`Dropped expired conversation ${id} from the index set`);
        }
      }

      summaries.sort(byUpdatedDesc);
      return summaries.slice(offset, offset + limit);
    } catch (err) {
      this.log.error(`Error listing conversations from Redis: ${toErrorMessage(err)}`);
      return [];
    }
  }

  async search(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<ConversationSummary[]> {
    if (!(await this.ensureConnected())) return [];

    try {
      if (this.searchAvailable && query.trim()) {
        try {
          return await this.indexedSearch(query, limit);
        } catch (err) {
          this.log.warn(`Indexed search failed, scanning instead: ${toErrorMessage(err)}`);
        }
      }
      return await this.manualSearch(query, limit);
    } catch (err) {
      this.log.error(`Error searching conversations in Redis: ${toErrorMessage(err)}`);
      return [];
    }
  }

  private async indexedSearch(query: string, limit: number): Promise<ConversationSummary[]> {
    const reply = await this.client.command("FT.SEARCH", [
      SEARCH_INDEX,
      `@title|content:(${escapeSearchQuery(query)})`,
      "RETURN", SUMMARY_FIELDS.length, ...SUMMARY_FIELDS,
      "SORTBY", "updated_ts", "DESC",
      "LIMIT", 0, limit,
    ]);
    return parseSearchReply(reply);
  }

  /**
   * Same substring rule as the file store, applied to each stored body.
   */
  private async manualSearch(query: string, limit: number): Promise<ConversationSummary[]> {
    const matches: ConversationSummary[] = [];
    for (const id of await this.client.smembers(CONVERSATIONS_SET)) {
      const data = await this.client.hget(conversationKey(id), "data");
      if (data === null) continue;

      try {
        const conversation = parseConversation(JSON.parse(data));
        if (matchesQuery(conversation, query)) matches.push(summarize(conversation));
      } catch (err) {
        this.log.warn(`Skipping unreadable conversation ${id}: ${toErrorMessage(err)}`);
      }
    }

    matches.sort(byUpdatedDesc);
    return matches.slice(0, limit);
  }

  async stats(): Promise<StoreStats> {
    if (!(await this.ensureConnected())) return {};

    try {
      const total = await this.client.scard(CONVERSATIONS_SET);
      const memory = parseInfo(await this.client.info("memory"));
      const clients = parseInfo(await this.client.info("clients"));
      const server = parseInfo(await this.client.info("server"));

      return {
        backend: "redis",
        total_conversations: total,
        search_available: this.searchAvailable,
        redis_memory_used: memory.used_memory_human ?? "Unknown",
        redis_connected_clients: Number(clients.connected_clients ?? 0),
        redis_version: server.redis_version ?? "Unknown",
        key_ttl_days: this.keyTtlDays,
      };
    } catch (err) {
      this.log.error(`Error getting conversation stats: ${toErrorMessage(err)}`);
      return {};
    }
  }

  async cleanup(days: number): Promise<number> {
    if (!(await this.ensureConnected())) return 0;

    try {
      const cutoff = cleanupCutoff(days);
      let deleted = 0;

      for (const id of await this.client.smembers(CONVERSATIONS_SET)) {
        const updatedAt = await this.client.hget(conversationKey(id), "updated_at");
        if (updatedAt === null) continue;

        const old = isOlderThan(updatedAt, cutoff);
        if (old === null) {
          this.log.warn(`Skipping conversation ${id}: invalid updated_at "${updatedAt}"`);
          continue;
        }
        if (old && (await this.remove(id))) deleted++;
      }

      this.log.info(`Cleaned up ${deleted} old conversations`);
      return deleted;
    } catch (err) {
      this.log.error(`Error cleaning up old conversations: ${toErrorMessage(err)}`);
      return 0;
    }
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (err) {
      this.log.debug(`Error closing Redis connection: ${toErrorMessage(err)}`);
    }
  }
}
