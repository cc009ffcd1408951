import { arch, platform, release } from "os";
import { ChatUI } from "./ui.js";
import { LineReader } from "./input.js";
import { TypingIndicator } from "./typing.js";
import { createTheme, shouldUseColor } from "./theme.js";
import { describeStats, describeSummary } from "./format.js";
import { openSession, parseDays, toErrorMessage, type GlobalOptions } from "./util.js";
import { configureLogging, getLogger, type LogLevel, type Logger } from "../core/logger.js";
import type { ConversationManager } from "../core/manager.js";
import { createResponder, type Responder } from "../core/responder.js";

export interface ChatSessionDeps {
  manager: ConversationManager;
  responder: Responder;
  ui: ChatUI;
  reader: LineReader;
  typing?: TypingIndicator | null;
  /** Default for /cleanup without an argument. */
  cleanupDays: number;
  /** Level restored when /debug is switched off. */
  logLevel: LogLevel;
  logger?: Logger;
}

export interface RunOptions {
  resumeId?: string;
  title?: string;
}

/**
 * The interactive loop: slash commands plus chat turns. Any failure is
 * reported on one line and the loop carries on.
 */
export class ChatSession {
  private deps: ChatSessionDeps;
  private log: Logger;
  private currentId: string | null = null;
  private running = false;
  private debug = false;

  constructor(deps: ChatSessionDeps) {
    this.deps = deps;
    this.log = deps.logger ?? getLogger("chat");
  }

  get conversationId(): string | null {
    return this.currentId;
  }

  async run(options: RunOptions = {}): Promise<void> {
    const { reader, ui } = this.deps;
    this.running = true;

    if (options.resumeId) {
      await this.resume(options.resumeId, options.title);
    } else {
      await this.startNew(options.title, false);
    }

    while (this.running) {
      const line = await reader.question(ui.userPrompt());
      if (line === null) break;

      const input = line.trim();
      if (!input) continue;

      try {
        if (input.startsWith("/")) {
          await this.handleCommand(input);
        } else {
          await this.processMessage(input);
        }
      } catch (err) {
        ui.printError(`An error occurred: ${toErrorMessage(err)}`);
        this.log.error(`Runtime error: ${toErrorMessage(err)}`);
      }
    }
    this.running = false;
  }

  async handleCommand(input: string): Promise<void> {
    const space = input.indexOf(" ");
    const command = (space === -1 ? input : input.slice(0, space)).toLowerCase();
    const arg = space === -1 ? "" : input.slice(space + 1).trim();
    const { ui } = this.deps;

    switch (command) {
      case "/help":
      case "/h":
        ui.printHelp();
        return;
      case "/clear":
      case "/c":
        ui.clear();
        return;
      case "/new":
      case "/n":
        await this.startNew(arg || undefined, true);
        return;
      case "/history":
      case "/hist":
        await this.showHistory();
        return;
      case "/save":
      case "/s":
        await this.save();
        return;
      case "/load":
      case "/l":
        await this.load();
        return;
      case "/list":
        await this.list();
        return;
      case "/search":
        await this.search(arg);
        return;
      case "/delete":
        await this.deleteCurrent();
        return;
      case "/stats":
        await this.stats();
        return;
      case "/cleanup":
        await this.cleanup(arg);
        return;
      case "/debug":
        this.toggleDebug();
        return;
      case "/colors":
        ui.printInfo(`Colors: ${ui.theme.colors ? "enabled" : "disabled"}`);
        return;
      case "/sysinfo":
        this.showSystemInfo();
        return;
      case "/quit":
      case "/q":
      case "/exit":
        this.running = false;
        return;
      default:
        ui.printError(`Unknown command: ${command}. Type /help for commands.`);
    }
  }

  async processMessage(text: string): Promise<void> {
    const { manager, responder, ui, typing } = this.deps;
    if (!this.currentId) {
      ui.printError("No active conversation");
      return;
    }
    const id = this.currentId;

    const sent = await manager.addMessage(id, "user", text);
    if (!sent.persisted) ui.printWarning("Your message could not be saved to storage");

    typing?.start();
    let reply: string;
    try {
      reply = await responder.generate(await manager.getContext(id));
    } catch (err) {
      await typing?.stop();
      ui.printError(`Failed to generate response: ${toErrorMessage(err)}`);
      this.log.error(`Response generation failed: ${toErrorMessage(err)}`);
      return;
    }
    await typing?.stop();

    if (!reply.trim()) {
      ui.printWarning("The assistant returned an empty response");
      return;
    }

    const { message, persisted } = await manager.addMessage(id, "assistant", reply);
    ui.printAssistant(message.content, message.timestamp);
    if (!persisted) ui.printWarning("The reply could not be saved to storage");
    this.log.debug(`Processed message exchange in conversation ${id}`);
  }

  private async startNew(title: string | undefined, announce: boolean): Promise<void> {
    const conversation = await this.deps.manager.createConversation(title);
    this.currentId = conversation.id;
    if (announce) this.deps.ui.printSuccess(`Started new conversation: ${conversation.title}`);
  }

  private async resume(id: string, title: string | undefined): Promise<void> {
    const { manager, ui } = this.deps;
    if (await manager.loadConversation(id)) {
      this.currentId = id;
      ui.printSuccess(await manager.getSummary(id));
      return;
    }
    ui.printError(`Conversation ${id} not found; starting a new one`);
    await this.startNew(title, false);
  }

  private async showHistory(): Promise<void> {
    if (!this.currentId) {
      this.deps.ui.printError("No active conversation");
      return;
    }
    this.deps.ui.printHistory(await this.deps.manager.getMessages(this.currentId));
  }

  private async save(): Promise<void> {
    const { manager, ui } = this.deps;
    if (!this.currentId) {
      ui.printError("No active conversation to save");
      return;
    }
    if (await manager.saveConversation(this.currentId)) ui.printSuccess("Conversation saved successfully");
    else ui.printError("Failed to save conversation");
  }

  private async load(): Promise<void> {
    const { manager, ui, reader } = this.deps;
    const conversations = await manager.listConversations(10);
    if (conversations.length === 0) {
      ui.printInfo("No saved conversations found");
      return;
    }

    ui.printInfo("Recent conversations:");
    conversations.forEach((c, i) => ui.printInfo(`${i + 1}. ${c.title} (${c.message_count} messages)`));

    const choice = (await reader.question("Enter conversation number to load (or press Enter to cancel): "))?.trim();
    if (!choice) return;

    const index = Number(choice) - 1;
    const picked = Number.isInteger(index) ? conversations[index] : undefined;
    if (!picked) {
      ui.printError("Invalid conversation number");
      return;
    }
    if (await manager.loadConversation(picked.id)) {
      this.currentId = picked.id;
      ui.printSuccess(`Loaded conversation: ${picked.title}`);
    } else {
      ui.printError("Failed to load conversation");
    }
  }

  private async list(): Promise<void> {
    const { manager, ui } = this.deps;
    const conversations = await manager.listConversations(20);
    if (conversations.length === 0) {
      ui.printInfo("No conversations found");
      return;
    }
    ui.printInfo(`Found ${conversations.length} conversations:`);
    for (const c of conversations) ui.printInfo(`• ${describeSummary(c)}`);
  }

  private async search(arg: string): Promise<void> {
    const { manager, ui, reader } = this.deps;
    const query = arg || ((await reader.question("Enter search query: ")) ?? "").trim();
    if (!query) {
      ui.printError("Search query cannot be empty");
      return;
    }

    const results = await manager.searchConversations(query, 10);
    if (results.length === 0) {
      ui.printInfo(`No conversations found matching '${query}'`);
      return;
    }
    ui.printInfo(`Found ${results.length} conversations matching '${query}':`);
    for (const r of results) ui.printInfo(`• ${describeSummary(r)}`);
  }

  private async deleteCurrent(): Promise<void> {
    const { manager, ui } = this.deps;
    if (!this.currentId) {
      ui.printError("No active conversation");
      return;
    }
    if (!(await this.confirm("Delete the current conversation?"))) return;

    if (await manager.deleteConversation(this.currentId)) ui.printSuccess("Conversation deleted");
    else ui.printError("Failed to delete conversation");
    await this.startNew(undefined, true);
  }

  private async stats(): Promise<void> {
    const { manager, ui } = this.deps;
    const stats = await manager.getStorageStats();
    if (Object.keys(stats).length === 0) {
      ui.printError("Could not retrieve statistics");
      return;
    }
    ui.printInfo("Storage Statistics:");
    for (const line of describeStats(stats)) ui.printInfo(`• ${line}`);
  }

  private async cleanup(arg: string): Promise<void> {
    const { manager, ui } = this.deps;
    let days = this.deps.cleanupDays;
    if (arg) {
      const parsed = parseDays(arg);
      if (parsed === null) {
        ui.printError(`Invalid number of days: ${arg}`);
        return;
      }
      days = parsed;
    }
    if (!(await this.confirm(`Delete conversations older than ${days} days?`))) return;

    const deleted = await manager.cleanupOldConversations(days);
    ui.printSuccess(`Cleaned up ${deleted} old conversations`);

    if (this.currentId && !(await manager.getConversation(this.currentId))) {
      await this.startNew(undefined, true);
    }
  }

  private toggleDebug(): void {
    this.debug = !this.debug;
    configureLogging({
      level: this.debug ? "debug" : this.deps.logLevel,
      stderr: this.debug,
    });
    this.deps.ui.printInfo(`Debug mode: ${this.debug ? "ON" : "OFF"}`);
  }

  private showSystemInfo(): void {
    const { ui, manager, responder } = this.deps;
    ui.printInfo("System Information:");
    ui.printInfo(`• Platform: ${platform()} ${release()}`);
    ui.printInfo(`• Architecture: ${arch()}`);
    ui.printInfo(`• Node.js: ${process.version}`);
    ui.printInfo(`• Storage: ${manager.backend}`);
    ui.printInfo(`• Responder: ${responder.name}`);
  }

  private async confirm(question: string): Promise<boolean> {
    const answer = await this.deps.reader.question(this.deps.ui.theme.warning(`${question} (y/N): `));
    const normalized = (answer ?? "").trim().toLowerCase();
    return normalized === "y" || normalized === "yes";
  }
}

export interface ChatCommandOptions {
  resume?: string;
  title?: string;
}

/**
 * Start the interactive shell.
 */
export async function chatCommand(options: ChatCommandOptions, global: GlobalOptions): Promise<void> {
  const { config, manager } = await openSession(global);

  const theme = createTheme({
    colors: shouldUseColor({
      configEnabled: config.ui.colorsEnabled,
      flag: global.color !== false,
      isTTY: process.stdout.isTTY === true,
      env: process.env,
    }),
  });
  const ui = new ChatUI({
    theme,
    output: process.stdout,
    showTimestamps: config.ui.showTimestamps,
    wordWrap: config.ui.wordWrap,
    width: process.stdout.columns,
  });
  const reader = new LineReader(process.stdin, process.stdout);
  const typing =
    config.ui.typingIndicator && process.stdout.isTTY ? new TypingIndicator({ output: process.stdout, theme }) : null;
  const responder = createResponder(config.responder);

  const onTerminate = () => reader.close();
  process.once("SIGTERM", onTerminate);

  const session = new ChatSession({
    manager,
    responder,
    ui,
    reader,
    typing,
    cleanupDays: config.conversation.cleanupDays,
    logLevel: config.logLevel,
  });

  ui.printHeader();
  ui.printWelcome(manager.backend, responder.name);
  try {
    await session.run({ resumeId: options.resume, title: options.title });
  } finally {
    process.off("SIGTERM", onTerminate);
    reader.close();
    await typing?.stop();
    await manager.close();
    ui.printInfo("Goodbye!");
  }
}
