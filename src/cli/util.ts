import { createInterface } from "readline";
import { loadConfig, getDefaultConfigPath, getLogPath, type Config } from "../core/config.js";
import { configureLogging, getLogger, LOG_LEVELS, type LogLevel } from "../core/logger.js";
import { ConversationManager } from "../core/manager.js";
import { selectConversationStore } from "../core/select.js";

export { toErrorMessage } from "../core/errors.js";

/** Options every command inherits from the root program. */
export interface GlobalOptions {
  config?: string;
  debug?: boolean;
  logLevel?: string;
  color?: boolean; // commander turns --no-color into color: false
}

export function prompt(question: string): Promise<string> {
  return new Promise((resolve) => {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface Session {
  config: Config;
  configPath: string;
  manager: ConversationManager;
}

/**
 * Read the config, set up logging and choose the storage backend.
 * The backend choice made here holds for the rest of the process.
 */
export async function openSession(options: GlobalOptions): Promise<Session> {
  const configPath = options.config ?? getDefaultConfigPath();
  const { config, warnings } = loadConfig(configPath);

  if (options.logLevel) {
    const level = options.logLevel.toLowerCase();
    if (isLogLevel(level)) config.logLevel = level;
    else console.error(`Unknown log level "${options.logLevel}"; using ${config.logLevel}`);
  }
  if (options.debug) config.logLevel = "debug";

  configureLogging({
    level: config.logLevel,
    stderr: options.debug === true,
    file: getLogPath(),
  });

  const log = getLogger("cli");
  for (const warning of warnings) log.warn(warning);
  log.info(`Configuration loaded from ${configPath}`);

  const store = await selectConversationStore(config);
  const manager = new ConversationManager(store, {
    maxContextMessages: config.conversation.maxContextMessages,
  });
  return { config, configPath, manager };
}

/**
 * Parse a positive integer option, exiting with a message when it is not one.
 */
export function parseCount(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    console.error(`${name} must be a non-negative integer, got "${value}"`);
    process.exit(1);
  }
  return n;
}

/**
 * A cleanup window in days: a positive number, or null when the value is not one.
 */
export function parseDays(value: string): number | null {
  const days = Number(value.trim());
  return value.trim() !== "" && Number.isFinite(days) && days > 0 ? days : null;
}
