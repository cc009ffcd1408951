import type { ContextEntry, Message } from "../types.js";

/**
 * The last `maxMessages` messages, oldest first, reduced to what the
 * responder needs. Content is passed through untouched.
 */
export function buildContextWindow(messages: readonly Message[], maxMessages: number): ContextEntry[] {
  if (maxMessages <= 0) return [];

  const recent = messages.length > maxMessages ? messages.slice(-maxMessages) : messages;
  return recent.map((m) => ({
    role: m.role,
    content: m.content,
    timestamp: m.timestamp,
  }));
}
