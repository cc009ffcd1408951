import { openSession, prompt, type GlobalOptions } from "./util.js";

export async function deleteCommand(id: string, options: { yes?: boolean }, global: GlobalOptions): Promise<void> {
  const { manager } = await openSession(global);

  try {
    const existing = await manager.getConversation(id);
    if (!existing) {
      console.log(`No conversation found with id: ${id}`);
      return;
    }

    if (!options.yes) {
      const answer = await prompt(`Delete "${existing.title}"? (y/N): `);
      if (answer.toLowerCase() !== "y") {
        console.log("Aborted.");
        return;
      }
    }

    if (await manager.deleteConversation(id)) {
      console.log(`Deleted: ${existing.title}`);
    } else {
      console.error(`Failed to delete ${id}.`);
      process.exitCode = 1;
    }
  } finally {
    await manager.close();
  }
}
