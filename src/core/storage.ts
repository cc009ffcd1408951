import type { Conversation, ConversationSummary, StoreStats } from "../types.js";

export type StoreKind = "redis" | "file";

export const DEFAULT_LIST_LIMIT = 50;
export const DEFAULT_SEARCH_LIMIT = 20;

/**
 * Pluggable conversation persistence.
 *
 * Implementations never reject: backend faults are logged and turned into
 * the failure value of each operation (null, false, 0, an empty list or
 * an empty stats record).
 */
export interface ConversationStore {
  readonly kind: StoreKind;
  /** Overwrite whatever is stored for this id. */
  save(conversation: Conversation): Promise<boolean>;
  load(id: string): Promise<Conversation | null>;
  /** True only if a record existed and was removed. */
  delete(id: string): Promise<boolean>;
  /** Sorted by updated_at descending, then paginated. */
  list(limit?: number, offset?: number): Promise<ConversationSummary[]>;
  /** Case-insensitive match on title or any message content. */
  search(query: string, limit?: number): Promise<ConversationSummary[]>;
  stats(): Promise<StoreStats>;
  /** Delete conversations last updated more than `days` ago. */
  cleanup(days: number): Promise<number>;
  close(): Promise<void>;
}

export function summarize(conversation: Conversation): ConversationSummary {
  return {
    id: conversation.id,
    title: conversation.title,
    message_count: conversation.messages.length,
    created_at: conversation.created_at,
    updated_at: conversation.updated_at,
  };
}

/**
 * Substring match shared by every full-scan search path.
 */
export function matchesQuery(conversation: Conversation, query: string): boolean {
  const needle = query.toLowerCase();
  if (conversation.title.toLowerCase().includes(needle)) return true;
  return conversation.messages.some((m) => m.content.toLowerCase().includes(needle));
}

export function byUpdatedDesc(a: ConversationSummary, b: ConversationSummary): number {
  if (a.updated_at === b.updated_at) return 0;
  return a.updated_at < b.updated_at ? 1 : -1;
}

/** Epoch milliseconds of `now - days`. */
export function cleanupCutoff(days: number, now: Date = new Date()): number {
  return now.getTime() - days * 24 * 60 * 60 * 1000;
}

/** Null when the timestamp does not parse. */
export function isOlderThan(timestamp: string, cutoff: number): boolean | null {
  const ms = Date.parse(timestamp);
  if (Number.isNaN(ms)) return null;
  return ms < cutoff;
}
