import type { Config, RedisConfig } from "./config.js";
import { FileConversationStore } from "./backends/file.js";
import { RedisConversationStore } from "./backends/redis.js";
import { toErrorMessage } from "./errors.js";
import { getLogger, type Logger } from "./logger.js";
import type { ConversationStore } from "./storage.js";

export type RedisConnector = (config: RedisConfig) => Promise<ConversationStore>;

export interface SelectStoreDeps {
  connectRedis?: RedisConnector;
  logger?: Logger;
}

/**
 * Pick the backend for this session: Redis when enabled and reachable,
 * the file store otherwise. Call once at startup; a Redis outage at this
 * point keeps the whole session on files.
 */
export async function selectConversationStore(
  config: Config,
  deps: SelectStoreDeps = {}
): Promise<ConversationStore> {
  const log = deps.logger ?? getLogger("store");
  const connectRedis = deps.connectRedis ?? ((redis: RedisConfig) => RedisConversationStore.connect(redis));
  const fileStore = () => new FileConversationStore({ directory: config.conversation.saveDirectory });

  if (!config.useRedis) {
    log.info("Using file storage for conversations");
    return fileStore();
  }

  try {
    const store = await connectRedis(config.redis);
    log.info("Using Redis for conversation storage");
    return store;
  } catch (err) {
    log.warn(`Failed to initialize Redis storage: ${toErrorMessage(err)}`);
    log.info("Falling back to file storage");
    return fileStore();
  }
}
