import { z } from "zod";
import type { Conversation, ConversationDocument, Message } from "../types.js";

export const DOCUMENT_VERSION = "1.0";

const metadataSchema = z.record(z.unknown()).nullable().optional();

const messageSchema = z.object({
  id: z.string(),
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string(),
  metadata: metadataSchema,
});

const conversationSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  messages: z.array(messageSchema),
  created_at: z.string(),
  updated_at: z.string(),
  metadata: metadataSchema,
});

const documentSchema = z.object({
  conversation: conversationSchema,
  export_timestamp: z.string().optional(),
  version: z.string().optional(),
});

type ParsedMessage = z.infer<typeof messageSchema>;
type ParsedConversation = z.infer<typeof conversationSchema>;

// Older documents carry `metadata: null`; in memory that is an absent field.
function toMessage(parsed: ParsedMessage): Message {
  const message: Message = {
    id: parsed.id,
    role: parsed.role,
    content: parsed.content,
    timestamp: parsed.timestamp,
  };
  if (parsed.metadata) message.metadata = parsed.metadata;
  return message;
}

function toConversation(parsed: ParsedConversation): Conversation {
  const conversation: Conversation = {
    id: parsed.id,
    title: parsed.title,
    messages: parsed.messages.map(toMessage),
    created_at: parsed.created_at,
    updated_at: parsed.updated_at,
  };
  if (parsed.metadata) conversation.metadata = parsed.metadata;
  return conversation;
}

/**
 * Validate a decoded conversation body. Throws a ZodError when the shape is wrong.
 */
export function parseConversation(value: unknown): Conversation {
  return toConversation(conversationSchema.parse(value));
}

export function parseDocument(value: unknown): Conversation {
  return toConversation(documentSchema.parse(value).conversation);
}

export function toDocument(conversation: Conversation, exportedAt: Date = new Date()): ConversationDocument {
  return {
    conversation,
    export_timestamp: exportedAt.toISOString(),
    version: DOCUMENT_VERSION,
  };
}

export function serializeDocument(conversation: Conversation, exportedAt?: Date): string {
  return JSON.stringify(toDocument(conversation, exportedAt), null, 2);
}
