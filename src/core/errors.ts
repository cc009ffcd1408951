export class ParleyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The preferred backend could not be reached at startup.
 */
export class BackendConnectionError extends ParleyError {}

export class ConversationNotFoundError extends ParleyError {
  readonly conversationId: string;

  constructor(conversationId: string) {
    super(`Conversation ${conversationId} not found`);
    this.conversationId = conversationId;
  }
}

export class EmptyMessageError extends ParleyError {
  constructor() {
    super("Message content cannot be empty");
  }
}

export class ResponderError extends ParleyError {}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
