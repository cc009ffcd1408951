import { openSession, parseDays, prompt, type GlobalOptions } from "./util.js";

export async function cleanupCommand(options: { days?: string; yes?: boolean }, global: GlobalOptions): Promise<void> {
  const requested = options.days === undefined ? undefined : parseDays(options.days);
  if (requested === null) {
    console.error(`--days must be a positive number, got "${options.days}"`);
    process.exit(1);
  }

  const { config, manager } = await openSession(global);
  const days = requested ?? config.conversation.cleanupDays;

  try {
    if (!options.yes) {
      const answer = await prompt(`Delete conversations not updated for ${days} days? (y/N): `);
      if (answer.toLowerCase() !== "y") {
        console.log("Aborted.");
        return;
      }
    }

    const deleted = await manager.cleanupOldConversations(days);
    console.log(`Cleaned up ${deleted} old conversation(s).`);
  } finally {
    await manager.close();
  }
}
