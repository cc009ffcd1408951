import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { homedir } from "os";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import { toErrorMessage } from "./errors.js";

const PARLEY_DIR = process.env.PARLEY_HOME || join(homedir(), ".parley");

export function getParleyDir(): string {
  return PARLEY_DIR;
}

export function getDefaultConfigPath(): string {
  return join(PARLEY_DIR, "config.json");
}

export function getLogPath(): string {
  return join(PARLEY_DIR, "logs", "parley.log");
}

// ── Sections ────────────────────────────────────────────

export interface RedisConfig {
  host: string;
  port: number;
  db: number;
  password: string | null;
  connectTimeoutMs: number;
  /** Reconnect attempts before a command fails. */
  maxRetries: number;
  /** TTL refreshed on every save. Independent of `cleanup`. */
  keyTtlDays: number;
}

export interface ConversationConfig {
  maxContextMessages: number;
  saveDirectory: string;
  cleanupDays: number;
}

export interface UIConfig {
  showTimestamps: boolean;
  wordWrap: boolean;
  colorsEnabled: boolean;
  typingIndicator: boolean;
}

export type ResponderKind = "echo" | "ollama";

export interface ResponderConfig {
  kind: ResponderKind;
  host: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export interface Config {
  useRedis: boolean;
  logLevel: LogLevel;
  redis: RedisConfig;
  conversation: ConversationConfig;
  ui: UIConfig;
  responder: ResponderConfig;
}

export function defaultConfig(home: string = PARLEY_DIR): Config {
  return {
    useRedis: true,
    logLevel: "info",
    redis: {
      host: "localhost",
      port: 6379,
      db: 0,
      password: null,
      connectTimeoutMs: 5000,
      maxRetries: 1,
      keyTtlDays: 30,
    },
    conversation: {
      maxContextMessages: 10,
      saveDirectory: join(home, "conversations"),
      cleanupDays: 30,
    },
    ui: {
      showTimestamps: true,
      wordWrap: true,
      colorsEnabled: true,
      typingIndicator: true,
    },
    responder: {
      kind: "echo",
      host: "http://localhost:11434",
      model: "llama3.2",
      temperature: 0.7,
      timeoutMs: 60_000,
    },
  };
}

// Each schema lists the keys a section accepts; anything else is stripped.

const redisPatchSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    db: z.number().int().min(0),
    password: z.string().nullable(),
    connectTimeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().min(0),
    keyTtlDays: z.number().positive(),
  })
  .partial();

const conversationPatchSchema = z
  .object({
    maxContextMessages: z.number().int().positive(),
    saveDirectory: z.string().min(1),
    cleanupDays: z.number().positive(),
  })
  .partial();

const uiPatchSchema = z
  .object({
    showTimestamps: z.boolean(),
    wordWrap: z.boolean(),
    colorsEnabled: z.boolean(),
    typingIndicator: z.boolean(),
  })
  .partial();

const responderPatchSchema = z
  .object({
    kind: z.enum(["echo", "ollama"]),
    host: z.string().url(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    timeoutMs: z.number().int().positive(),
  })
  .partial();

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

type RedisPatch = z.infer<typeof redisPatchSchema>;
type ConversationPatch = z.infer<typeof conversationPatchSchema>;
type UIPatch = z.infer<typeof uiPatchSchema>;
type ResponderPatch = z.infer<typeof responderPatchSchema>;

export function mergeRedisConfig(base: RedisConfig, patch: RedisPatch): RedisConfig {
  return {
    host: patch.host ?? base.host,
    port: patch.port ?? base.port,
    db: patch.db ?? base.db,
    password: patch.password !== undefined ? patch.password : base.password,
    connectTimeoutMs: patch.connectTimeoutMs ?? base.connectTimeoutMs,
    maxRetries: patch.maxRetries ?? base.maxRetries,
    keyTtlDays: patch.keyTtlDays ?? base.keyTtlDays,
  };
}

export function mergeConversationConfig(
  base: ConversationConfig,
  patch: ConversationPatch
): ConversationConfig {
  return {
    maxContextMessages: patch.maxContextMessages ?? base.maxContextMessages,
    saveDirectory: patch.saveDirectory ?? base.saveDirectory,
    cleanupDays: patch.cleanupDays ?? base.cleanupDays,
  };
}

export function mergeUIConfig(base: UIConfig, patch: UIPatch): UIConfig {
  return {
    showTimestamps: patch.showTimestamps ?? base.showTimestamps,
    wordWrap: patch.wordWrap ?? base.wordWrap,
    colorsEnabled: patch.colorsEnabled ?? base.colorsEnabled,
    typingIndicator: patch.typingIndicator ?? base.typingIndicator,
  };
}

export function mergeResponderConfig(
  base: ResponderConfig,
  patch: ResponderPatch
): ResponderConfig {
  return {
    kind: patch.kind ?? base.kind,
    host: patch.host ?? base.host,
    model: patch.model ?? base.model,
    temperature: patch.temperature ?? base.temperature,
    timeoutMs: patch.timeoutMs ?? base.timeoutMs,
  };
}

const KNOWN_KEYS = new Set(["useRedis", "logLevel", "redis", "conversation", "ui", "responder"]);

export interface ResolvedConfig {
  config: Config;
  /** Problems found while reading the file; the affected values fell back to defaults. */
  warnings: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseSection<T extends z.ZodTypeAny>(
  name: string,
  schema: T,
  value: unknown,
  warnings: string[]
): z.infer<T> | Record<string, never> {
  if (value === undefined) return {};
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${name}.${issue.path.join(".")}` : name;
    warnings.push(`Invalid "${where}" in config (${issue?.message ?? "bad value"}); using defaults for "${name}"`);
    return {};
  }
  return result.data;
}

/**
 * Merge a parsed config file over the defaults, section by section.
 */
export function resolveConfig(raw: unknown, defaults: Config = defaultConfig()): ResolvedConfig {
  const warnings: string[] = [];
  if (!isRecord(raw)) {
    return { config: defaults, warnings: ["Config file is not a JSON object; using defaults"] };
  }

  const unknown = Object.keys(raw).filter((key) => !KNOWN_KEYS.has(key));
  if (unknown.length > 0) {
    warnings.push(`Ignoring unknown config key(s): ${unknown.join(", ")}`);
  }

  let useRedis = defaults.useRedis;
  if (raw.useRedis !== undefined) {
    if (typeof raw.useRedis === "boolean") useRedis = raw.useRedis;
    else warnings.push(`Invalid "useRedis" in config; using ${defaults.useRedis}`);
  }

  let logLevel = defaults.logLevel;
  if (raw.logLevel !== undefined) {
    const parsed = logLevelSchema.safeParse(raw.logLevel);
    if (parsed.success) logLevel = parsed.data;
    else warnings.push(`Invalid "logLevel" in config; expected one of ${LOG_LEVELS.join(", ")}`);
  }

  const config: Config = {
    useRedis,
    logLevel,
    redis: mergeRedisConfig(defaults.redis, parseSection("redis", redisPatchSchema, raw.redis, warnings)),
    conversation: mergeConversationConfig(
      defaults.conversation,
      parseSection("conversation", conversationPatchSchema, raw.conversation, warnings)
    ),
    ui: mergeUIConfig(defaults.ui, parseSection("ui", uiPatchSchema, raw.ui, warnings)),
    responder: mergeResponderConfig(
      defaults.responder,
      parseSection("responder", responderPatchSchema, raw.responder, warnings)
    ),
  };

  return { config, warnings };
}

export function saveConfig(configPath: string, config: Config): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
}

/**
 * Read the config file, writing the defaults there first if it is missing.
 */
export function loadConfig(configPath: string = getDefaultConfigPath()): ResolvedConfig {
  const defaults = defaultConfig();

  if (!existsSync(configPath)) {
    try {
      saveConfig(configPath, defaults);
      return { config: defaults, warnings: [] };
    } catch (err) {
      return {
        config: defaults,
        warnings: [`Could not write default config to ${configPath}: ${toErrorMessage(err)}`],
      };
    }
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    return {
      config: defaults,
      warnings: [`Could not read config ${configPath}: ${toErrorMessage(err)}; using defaults`],
    };
  }

  return resolveConfig(raw, defaults);
}
