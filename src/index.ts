#!/usr/bin/env node

import { Command } from "commander";
import { chatCommand } from "./cli/chat.js";
import { listCommand, searchCommand } from "./cli/list.js";
import { showCommand } from "./cli/show.js";
import { exportCommand } from "./cli/export.js";
import { deleteCommand } from "./cli/delete.js";
import { cleanupCommand } from "./cli/cleanup.js";
import { statsCommand } from "./cli/stats.js";
import { configCommand } from "./cli/config.js";
import type { GlobalOptions } from "./cli/util.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("parley")
  .description("Terminal chat with saved, searchable conversations")
  .version(VERSION)
  .option("--config <path>", "Path to the config file")
  .option("--debug", "Log debug output to stderr")
  .option("--log-level <level>", "Log level (debug, info, warn, error)")
  .option("--no-color", "Disable colored output");

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

program
  .command("chat", { isDefault: true })
  .description("Start an interactive chat session")
  .option("-r, --resume <id>", "Resume a saved conversation")
  .option("-t, --title <title>", "Title for a new conversation")
  .action(async (options) => {
    await chatCommand(options, globals());
  });

program
  .command("list")
  .description("List saved conversations, most recently updated first")
  .option("-l, --limit <n>", "Maximum number to show")
  .option("-o, --offset <n>", "Number to skip")
  .action(async (options) => {
    await listCommand(options, globals());
  });

program
  .command("search")
  .description("Search conversation titles and messages")
  .argument("<query>", "Text to look for")
  .option("-l, --limit <n>", "Maximum number of results")
  .action(async (query: string, options) => {
    await searchCommand(query, options, globals());
  });

program
  .command("show")
  .description("Print a conversation")
  .argument("<id>", "Conversation id")
  .action(async (id: string) => {
    await showCommand(id, globals());
  });

program
  .command("export")
  .description("Export a conversation as a JSON document")
  .argument("<id>", "Conversation id")
  .option("-o, --output <file>", "Write to a file instead of stdout")
  .action(async (id: string, options) => {
    await exportCommand(id, options, globals());
  });

program
  .command("delete")
  .description("Delete a conversation")
  .argument("<id>", "Conversation id")
  .option("-y, --yes", "Skip the confirmation prompt")
  .action(async (id: string, options) => {
    await deleteCommand(id, options, globals());
  });

program
  .command("cleanup")
  .description("Delete conversations not updated for a number of days")
  .option("-d, --days <n>", "Age threshold in days (defaults to conversation.cleanupDays)")
  .option("-y, --yes", "Skip the confirmation prompt")
  .action(async (options) => {
    await cleanupCommand(options, globals());
  });

program
  .command("stats")
  .description("Show storage statistics")
  .action(async () => {
    await statsCommand(globals());
  });

program
  .command("config")
  .description("Show the effective configuration and where it lives")
  .action(() => {
    configCommand(globals());
  });

await program.parseAsync();
