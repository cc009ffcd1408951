import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, unlinkSync, writeFileSync } from "fs";
import { join } from "path";
import { parseDocument, serializeDocument } from "../codec.js";
import { toErrorMessage } from "../errors.js";
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

const FILE_PREFIX = "conversation_";
const FILE_SUFFIX = ".json";

export interface FileStoreOptions {
  directory: string;
  logger?: Logger;
}

/**
 * One JSON document per conversation in a single directory.
 *
 * list, search and cleanup open and parse every document on each call.
 * Writes overwrite the whole file in place, so a crash mid-write can
 * leave a truncated document behind; scans skip such files.
 */
export class FileConversationStore implements ConversationStore {
  readonly kind = "file" as const;
  readonly directory: string;
  private log: Logger;

  constructor(options: FileStoreOptions) {
    this.directory = options.directory;
    this.log = options.logger ?? getLogger("store.file");
    mkdirSync(this.directory, { recursive: true });
    this.log.debug(`Conversations directory: ${this.directory}`);
  }

  pathFor(id: string): string {
    return join(this.directory, `${FILE_PREFIX}${id}${FILE_SUFFIX}`);
  }

  async save(conversation: Conversation): Promise<boolean> {
    try {
      writeFileSync(this.pathFor(conversation.id), serializeDocument(conversation), "utf-8");
      this.log.debug(`Saved conversation ${conversation.id} to file`);
      return true;
    } catch (err) {
      this.log.error(`Error saving conversation ${conversation.id} to file: ${toErrorMessage(err)}`);
      return false;
    }
  }

  async load(id: string): Promise<Conversation | null> {
    const path = this.pathFor(id);
    if (!existsSync(path)) {
      this.log.warn(`Conversation file not found: ${path}`);
      return null;
    }

    try {
      const conversation = this.readDocument(path);
      this.log.debug(`Loaded conversation ${id} from file`);
      return conversation;
    } catch (err) {
      this.log.error(`Error loading conversation ${id} from file: ${toErrorMessage(err)}`);
      return null;
    }
  }

  async delete(id: string): Promise<boolean> {
    const path = this.pathFor(id);
    try {
      if (!existsSync(path)) {
        this.log.warn(`Conversation file not found: ${path}`);
        return false;
      }
      unlinkSync(path);
      this.log.info(`Deleted conversation file ${path}`);
      return true;
    } catch (err) {
      this.log.error(`Error deleting conversation file ${path}: ${toErrorMessage(err)}`);
      return false;
    }
  }

  async list(limit = DEFAULT_LIST_LIMIT, offset = 0): Promise<ConversationSummary[]> {
    try {
      const summaries = this.scan("reading").map(({ conversation }) => summarize(conversation));
      summaries.sort(byUpdatedDesc);
      return summaries.slice(offset, offset + limit);
    } catch (err) {
      this.log.error(`Error listing conversations from files: ${toErrorMessage(err)}`);
      return [];
    }
  }

  async search(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<ConversationSummary[]> {
    try {
      const matches = this.scan("searching")
        .filter(({ conversation }) => matchesQuery(conversation, query))
        .map(({ conversation }) => summarize(conversation));
      matches.sort(byUpdatedDesc);
      return matches.slice(0, limit);
    } catch (err) {
      this.log.error(`Error searching conversations in files: ${toErrorMessage(err)}`);
      return [];
    }
  }

  async stats(): Promise<StoreStats> {
    try {
      const files = this.documentPaths();
      const totalSize = files.reduce((sum, path) => sum + statSync(path).size, 0);
      return {
        backend: "file",
        total_conversations: files.length,
        storage_size_bytes: totalSize,
        storage_size_mb: Math.round((totalSize / (1024 * 1024)) * 100) / 100,
        storage_directory: this.directory,
      };
    } catch (err) {
      this.log.error(`Error getting conversation stats: ${toErrorMessage(err)}`);
      return {};
    }
  }

  async cleanup(days: number): Promise<number> {
    try {
      const cutoff = cleanupCutoff(days);
      let deleted = 0;

      for (const { path, conversation } of this.scan("processing")) {
        const old = isOlderThan(conversation.updated_at, cutoff);
        if (old === null) {
          this.log.warn(`Skipping ${path}: invalid updated_at "${conversation.updated_at}"`);
          continue;
        }
        if (!old) continue;

        try {
          unlinkSync(path);
          deleted++;
        } catch (err) {
          this.log.warn(`Error removing ${path}: ${toErrorMessage(err)}`);
        }
      }

      this.log.info(`Cleaned up ${deleted} old conversation files`);
      return deleted;
    } catch (err) {
      this.log.error(`Error cleaning up old conversations: ${toErrorMessage(err)}`);
      return 0;
    }
  }

  async close(): Promise<void> {
    // Nothing held open between calls.
  }

  private documentPaths(): string[] {
    return readdirSync(this.directory)
      .filter((name) => name.startsWith(FILE_PREFIX) && name.endsWith(FILE_SUFFIX))
      .map((name) => join(this.directory, name));
  }

  private readDocument(path: string): Conversation {
    return parseDocument(JSON.parse(readFileSync(path, "utf-8")));
  }

  /**
   * Parse every document, logging and skipping the ones that fail.
   */
  private scan(verb: string): { path: string; conversation: Conversation }[] {
    const results: { path: string; conversation: Conversation }[] = [];
    for (const path of this.documentPaths()) {
      try {
        results.push({ path, conversation: this.readDocument(path) });
      } catch (err) {
        this.log.warn(`Error ${verb} conversation file ${path}: ${toErrorMessage(err)}`);
      }
    }
    return results;
  }
}
