import type { ResponderConfig } from "./config.js";
import { ResponderError, toErrorMessage } from "./errors.js";
import type { ContextEntry } from "../types.js";

/**
 * Turns a context window into the assistant's next reply.
 */
export interface Responder {
  readonly name: string;
  generate(context: ContextEntry[], signal?: AbortSignal): Promise<string>;
}

/**
 * Offline responder. Useful without a model server and in tests.
 */
export class EchoResponder implements Responder {
  readonly name = "echo";

  async generate(context: ContextEntry[]): Promise<string> {
    const lastUser = [...context].reverse().find((entry) => entry.role === "user");
    if (!lastUser) return "Hello! What would you like to talk about?";
    return `You said: ${lastUser.content}`;
  }
}

export interface OllamaResponderOptions {
  host: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

interface OllamaChatReply {
  message?: { content?: unknown };
}

function isChatReply(value: unknown): value is OllamaChatReply {
  return typeof value === "object" && value !== null;
}

/**
 * Chat completion through a local Ollama server (`POST /api/chat`).
 */
export class OllamaResponder implements Responder {
  readonly name = "ollama";
  private options: OllamaResponderOptions;
  private fetchImpl: typeof fetch;

  constructor(options: OllamaResponderOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async generate(context: ContextEntry[], signal?: AbortSignal): Promise<string> {
    const { host, model, temperature, timeoutMs } = this.options;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let body: unknown;
    try {
      const response = await this.fetchImpl(`${host.replace(/\/+$/, "")}/api/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model,
          messages: context.map((entry) => ({ role: entry.role, content: entry.content })),
          stream: false,
          options: { temperature },
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const detail = await response.text().catch(() => "");
        throw new ResponderError(`Ollama returned ${response.status}${detail ? `: ${detail}` : ""}`);
      }
      body = await response.json();
    } catch (err) {
      if (err instanceof ResponderError) throw err;
      const reason = controller.signal.aborted && !signal?.aborted
        ? `timed out after ${timeoutMs}ms`
        : toErrorMessage(err);
      throw new ResponderError(`Ollama request to ${host} failed: ${reason}`, { cause: err });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    const content = isChatReply(body) ? body.message?.content : undefined;
    if (typeof content !== "string") {
      throw new ResponderError("Ollama reply did not contain a message");
    }
    return content.trim();
  }
}

export function createResponder(config: ResponderConfig): Responder {
  if (config.kind === "ollama") {
    return new OllamaResponder({
      host: config.host,
      model: config.model,
      temperature: config.temperature,
      timeoutMs: config.timeoutMs,
    });
  }
  return new EchoResponder();
}
