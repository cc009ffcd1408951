import { describeSummary } from "./format.js";
import { openSession, parseCount, type GlobalOptions } from "./util.js";
import type { ConversationSummary } from "../types.js";

function printSummaries(summaries: ConversationSummary[]): void {
  for (const s of summaries) {
    console.log(`  ${s.id}`);
    console.log(`    ${describeSummary(s)}`);
  }
}

export async function listCommand(
  options: { limit?: string; offset?: string },
  global: GlobalOptions
): Promise<void> {
  const limit = parseCount(options.limit, "--limit", 50);
  const offset = parseCount(options.offset, "--offset", 0);
  const { manager } = await openSession(global);

  try {
    const summaries = await manager.listConversations(limit, offset);
    if (summaries.length === 0) {
      console.log("No conversations found.");
      return;
    }
    console.log(`${summaries.length} conversation(s):\n`);
    printSummaries(summaries);
  } finally {
    await manager.close();
  }
}

export async function searchCommand(
  query: string,
  options: { limit?: string },
  global: GlobalOptions
): Promise<void> {
  if (!query.trim()) {
    console.error("Search query cannot be empty.");
    process.exit(1);
  }
  const limit = parseCount(options.limit, "--limit", 20);
  const { manager } = await openSession(global);

  try {
    const results = await manager.searchConversations(query, limit);
    if (results.length === 0) {
      console.log(`No conversations found matching '${query}'.`);
      return;
    }
    console.log(`${results.length} conversation(s) matching '${query}':\n`);
    printSummaries(results);
  } finally {
    await manager.close();
  }
}
