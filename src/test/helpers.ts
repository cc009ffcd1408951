import { mkdtempSync, rmSync } from "fs";
import { Writable } from "stream";
import { tmpdir } from "os";
import { join } from "path";
import type { Conversation, Message, MessageRole } from "../types.js";

export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "parley-test-"));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export function daysAgo(days: number, from: Date = new Date()): string {
  return new Date(from.getTime() - days * 24 * 60 * 60 * 1000).toISOString();
}

export function makeMessage(index: number, role: MessageRole, content: string, timestamp: string): Message {
  return { id: `msg-${index}`, role, content, timestamp };
}

export function makeConversation(overrides: Partial<Conversation> = {}): Conversation {
  const at = overrides.updated_at ?? "2024-03-01T10:00:00.000Z";
  return {
    id: "conv-1",
    title: "Test conversation",
    messages: [],
    created_at: at,
    updated_at: at,
    ...overrides,
  };
}

/** A conversation whose messages alternate user/assistant. */
export function withMessages(base: Conversation, contents: string[]): Conversation {
  const messages = contents.map((content, i) =>
    makeMessage(i, i % 2 === 0 ? "user" : "assistant", content, base.updated_at)
  );
  return { ...base, messages };
}

/** Collects everything written to it. */
export class OutputCapture extends Writable {
  private chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf-8"));
    callback();
  }

  get text(): string {
    return this.chunks.join("");
  }
}

/** A conversation carrying nested metadata at both levels. */
export function withMetadata(base: Conversation): Conversation {
  const [first, ...rest] = base.messages;
  const messages = first
    ? [{ ...first, metadata: { model: "echo", tokens: { prompt: 3, reply: 7 }, tags: ["a", "b"] } }, ...rest]
    : rest;
  return { ...base, messages, metadata: { source: "test", settings: { temperature: 0.5, pinned: true } } };
}
