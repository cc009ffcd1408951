export type MessageRole = "user" | "assistant";

export interface Message {
  id: string;
  role: MessageRole;
  content: string;
  timestamp: string; // ISO 8601, UTC
  metadata?: Record<string, unknown>;
}

export interface Conversation {
  id: string;
  title: string;
  messages: Message[]; // append-only
  created_at: string; // ISO 8601, UTC
  updated_at: string; // ISO 8601, UTC
  metadata?: Record<string, unknown>;
}

export interface ConversationSummary {
  id: string;
  title: string;
  message_count: number;
  created_at: string;
  updated_at: string;
}

// ── Context handed to the responder ─────────────────────

export interface ContextEntry {
  role: MessageRole;
  content: string;
  timestamp: string;
}

/**
 * Backend health/size report. Keys differ per backend; `backend` is
 * present whenever the report is non-empty.
 */
export type StoreStats = Record<string, string | number | boolean>;

/**
 * On-disk shape of one conversation document.
 */
export interface ConversationDocument {
  conversation: Conversation;
  export_timestamp: string;
  version: string;
}
