#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { Command } from "commander";
import { askCommand } from "./commands/ask.js";
import { chatCommand } from "./commands/chat.js";
import { instructionsCommand } from "./commands/instructions.js";
import { parseCommand } from "./commands/parse.js";
import { sanitizeCommand } from "./commands/sanitize.js";
import { initLogging } from "./log.js";
import { DEFAULT_SETTINGS_PATH } from "./paths.js";

const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
const version =
    typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string" ? pkg.version : "0.0.0";

const program = new Command();

initLogging();

program.name("clibridge").description("Chat with local agent CLIs as a text provider").version(version);

program
    .command("ask")
    .description("Send one message to the CLI backend")
    .argument("<message>", "Message text")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--system <text>", "System instruction for this message")
    .option("--executable <path>", "CLI executable override")
    .option("--agent <id>", "Agent selector override")
    .option("--model <id>", "Model selector override")
    .action(askCommand);

program
    .command("chat")
    .description("Send a conversation history file to the CLI backend")
    .argument("<historyFile>", "JSON array of { role, content } messages")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--executable <path>", "CLI executable override")
    .option("--agent <id>", "Agent selector override")
    .option("--model <id>", "Model selector override")
    .action(chatCommand);

program
    .command("parse")
    .description("Extract attachment markers from stdin and print JSON")
    .action(() => parseCommand());

program
    .command("sanitize")
    .description("Clean raw CLI output from stdin")
    .action(() => sanitizeCommand());

program
    .command("instructions")
    .description("Print delivery instructions for a messaging channel")
    .argument("<channel>", "Channel name, e.g. telegram or slack")
    .action(instructionsCommand);

await program.parseAsync(process.argv);
