import { getDefaultConfigPath, getParleyDir, loadConfig } from "../core/config.js";
import type { GlobalOptions } from "./util.js";

/**
 * Show the effective configuration. Writes the defaults on first run.
 */
export function configCommand(global: GlobalOptions): void {
  const configPath = global.config ?? getDefaultConfigPath();
  const { config, warnings } = loadConfig(configPath);

  for (const warning of warnings) console.error(`Warning: ${warning}`);
  console.log(`Data directory: ${getParleyDir()}`);
  console.log(`Config file: ${configPath}\n`);
  console.log(JSON.stringify(config, null, 2));
}
