import { setTimeout as delay } from "timers/promises";
import type { Theme } from "./theme.js";

const CLEAR_LINE = `\r${" ".repeat(30)}\r`;

export interface TypingIndicatorOptions {
  output: NodeJS.WritableStream;
  theme: Theme;
  intervalMs?: number;
}

/**
 * "Assistant is typing..." animation. Only ever writes to the terminal.
 */
export class TypingIndicator {
  private output: NodeJS.WritableStream;
  private theme: Theme;
  private intervalMs: number;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: TypingIndicatorOptions) {
    this.output = options.output;
    this.theme = options.theme;
    this.intervalMs = options.intervalMs ?? 500;
  }

  get active(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.animate(controller.signal);
  }

  /**
   * Signal the animation to end and wait for it, at most `timeoutMs`.
   */
  async stop(timeoutMs = 1000): Promise<void> {
    const controller = this.controller;
    const loop = this.loop;
    if (!controller || !loop) return;

    this.controller = null;
    this.loop = null;
    controller.abort();
    await Promise.race([loop, delay(timeoutMs, undefined, { ref: false })]);
    this.output.write(CLEAR_LINE);
  }

  private async animate(signal: AbortSignal): Promise<void> {
    let frame = 0;
    while (!signal.aborted) {
      const dots = ".".repeat(frame % 4);
      this.output.write(`\r${this.theme.dim(`Assistant is typing${dots}${" ".repeat(3 - dots.length)}`)}`);
      frame++;
      try {
        await delay(this.intervalMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }
    }
  }
}
