import { writeFileSync } from "fs";
import { serializeDocument } from "../core/codec.js";
import { openSession, type GlobalOptions } from "./util.js";

/**
 * Print a conversation as a portable JSON document, or write it to a file.
 */
export async function exportCommand(
  id: string,
  options: { output?: string },
  global: GlobalOptions
): Promise<void> {
  const { manager } = await openSession(global);

  try {
    const conversation = await manager.getConversation(id);
    if (!conversation) {
      console.error(`Conversation ${id} not found.`);
      process.exitCode = 1;
      return;
    }

    const document = serializeDocument(conversation);
    if (options.output) {
      writeFileSync(options.output, document + "\n");
      console.log(`Exported ${conversation.title} to ${options.output}`);
    } else {
      console.log(document);
    }
  } finally {
    await manager.close();
  }
}
