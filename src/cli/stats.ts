import { describeStats } from "./format.js";
import { openSession, type GlobalOptions } from "./util.js";

export async function statsCommand(global: GlobalOptions): Promise<void> {
  const { manager } = await openSession(global);

  try {
    const stats = await manager.getStorageStats();
    if (Object.keys(stats).length === 0) {
      console.error("Could not retrieve statistics.");
      process.exitCode = 1;
      return;
    }
    console.log("Storage statistics:\n");
    for (const line of describeStats(stats)) console.log(`  ${line}`);
  } finally {
    await manager.close();
  }
}
