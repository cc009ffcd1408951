import { createInterface, type Interface } from "readline";

/**
 * Line-at-a-time reader over a readline interface. Lines that arrive
 * before anyone asks are queued, so piped input works the same as typing.
 * `question` resolves to null once the input has ended.
 */
export class LineReader {
  private rl: Interface;
  private queue: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private closed = false;

  constructor(input: NodeJS.ReadableStream, output: NodeJS.WritableStream) {
    this.rl = createInterface({ input, output });

    this.rl.on("line", (line) => {
      const waiting = this.waiting;
      if (waiting) {
        this.waiting = null;
        waiting(line);
      } else {
        this.queue.push(line);
      }
    });

    // Ctrl+C ends the session the same way EOF does.
    this.rl.on("SIGINT", () => this.close());

    this.rl.on("close", () => {
      this.closed = true;
      const waiting = this.waiting;
      this.waiting = null;
      waiting?.(null);
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  question(promptText: string): Promise<string | null> {
    const queued = this.queue.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(null);

    this.rl.setPrompt(promptText);
    this.rl.prompt();
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}
