import type { Theme } from "./theme.js";
import { formatTime, wrapText } from "./format.js";
import type { Message } from "../types.js";
import { VERSION } from "../version.js";

export interface ChatUIOptions {
  theme: Theme;
  output: NodeJS.WritableStream;
  showTimestamps: boolean;
  wordWrap: boolean;
  /** Terminal width; falls back to 80. */
  width?: number;
}

const HELP: [string, [string, string][]][] = [
  [
    "Chat Commands",
    [
      ["/help, /h", "Show this help message"],
      ["/clear, /c", "Clear the screen"],
      ["/new, /n [title]", "Start a new conversation"],
      ["/quit, /q, /exit", "Exit"],
    ],
  ],
  [
    "Conversation Management",
    [
      ["/history, /hist", "Show current conversation history"],
      ["/save, /s", "Save current conversation"],
      ["/load, /l", "Load a saved conversation"],
      ["/list", "List recent conversations"],
      ["/search [query]", "Search conversations"],
      ["/delete", "Delete the current conversation"],
      ["/stats", "Show storage statistics"],
      ["/cleanup [days]", "Delete conversations not updated for N days"],
    ],
  ],
  [
    "System",
    [
      ["/debug", "Toggle debug logging"],
      ["/colors", "Show color status"],
      ["/sysinfo", "Show system information"],
    ],
  ],
];

/**
 * Everything the interactive session prints goes through here.
 */
export class ChatUI {
  readonly theme: Theme;
  private output: NodeJS.WritableStream;
  private showTimestamps: boolean;
  private wordWrap: boolean;
  private width: number;

  constructor(options: ChatUIOptions) {
    this.theme = options.theme;
    this.output = options.output;
    this.showTimestamps = options.showTimestamps;
    this.wordWrap = options.wordWrap;
    this.width = options.width && options.width > 20 ? options.width : 80;
  }

  print(line = ""): void {
    this.output.write(line + "\n");
  }

  printHeader(): void {
    this.print(this.theme.info(`parley v${VERSION}`));
    this.print(this.theme.dim("Terminal chat with saved, searchable conversations"));
    this.print();
  }

  printWelcome(backend: string, responder: string): void {
    this.print(this.theme.success(`Storage: ${backend}  Responder: ${responder}`));
    this.print(`Type your message and press Enter. Type ${this.theme.bold("/help")} for commands.`);
    this.print();
  }

  printHelp(): void {
    this.print(this.theme.heading("Available Commands:"));
    for (const [section, entries] of HELP) {
      this.print();
      this.print(this.theme.bold(`${section}:`));
      for (const [usage, text] of entries) {
        this.print(`  ${this.theme.command(usage.padEnd(18))} - ${text}`);
      }
    }
    this.print();
    this.print(this.theme.dim("Anything that is not a command is sent to the assistant."));
  }

  printInfo(message: string): void {
    this.print(this.theme.info(`ℹ ${message}`));
  }

  printSuccess(message: string): void {
    this.print(this.theme.success(`✓ ${message}`));
  }

  printWarning(message: string): void {
    this.print(this.theme.warning(`⚠ ${message}`));
  }

  printError(message: string): void {
    this.print(this.theme.error(`✗ ${message}`));
  }

  userPrompt(): string {
    return `${this.theme.user("You:")} `;
  }

  printAssistant(response: string, timestamp: string): void {
    const when = this.showTimestamps ? ` ${this.theme.dim(`(${formatTime(timestamp)})`)}` : "";
    this.print();
    this.print(`${this.theme.assistant("Assistant")}${when}:`);
    for (const line of this.wrap(response, 2)) {
      this.print(`  ${line}`);
    }
    this.print();
  }

  printHistory(messages: readonly Message[]): void {
    if (messages.length === 0) {
      this.printInfo("No messages in current conversation");
      return;
    }

    this.print();
    this.print(this.theme.heading("Conversation History:"));
    this.print("=".repeat(50));
    messages.forEach((m, i) => {
      const who = m.role === "user" ? this.theme.user("You") : this.theme.assistant("Assistant");
      const when = this.showTimestamps ? ` ${this.theme.dim(`(${formatTime(m.timestamp)})`)}` : "";
      this.print();
      this.print(`${this.theme.bold(`${i + 1}.`)} ${who}${when}:`);
      for (const line of this.wrap(m.content, 3)) {
        this.print(`   ${line}`);
      }
    });
    this.print();
    this.print("=".repeat(50));
  }

  clear(): void {
    this.output.write("\x1b[H\x1b[2J");
    this.printHeader();
  }

  private wrap(text: string, indent: number): string[] {
    return this.wordWrap ? wrapText(text, this.width - indent - 2) : text.split("\n");
  }
}
