import { formatDateTime } from "./format.js";
import { openSession, type GlobalOptions } from "./util.js";

export async function showCommand(id: string, global: GlobalOptions): Promise<void> {
  const { manager } = await openSession(global);

  try {
    const conversation = await manager.getConversation(id);
    if (!conversation) {
      console.error(`Conversation ${id} not found.`);
      process.exitCode = 1;
      return;
    }

    console.log(conversation.title);
    console.log(`  Id:      ${conversation.id}`);
    console.log(`  Created: ${formatDateTime(conversation.created_at)}`);
    console.log(`  Updated: ${formatDateTime(conversation.updated_at)}`);
    console.log();
    for (const m of conversation.messages) {
      const who = m.role === "user" ? "You" : "Assistant";
      console.log(`[${formatDateTime(m.timestamp)}] ${who}:`);
      console.log(`  ${m.content.split("\n").join("\n  ")}`);
    }
    if (conversation.messages.length === 0) console.log("(no messages)");
  } finally {
    await manager.close();
  }
}
