#!/usr/bin/env node
import minimist from "minimist";
import { loadConfig, validateConfig } from "./config.js";
import { createContext } from "./context.js";
import { outputError } from "./output.js";
import { parseCommand, UsageError, type Command } from "./command.js";
import { describeError } from "./describeError.js";
import { handleHelp } from "./commands/help.js";
import { handleImport } from "./commands/import.js";
import { handleList } from "./commands/list.js";
import { handleRemove } from "./commands/remove.js";
import { handleChallenge } from "./commands/challenge.js";
import { handleConfig } from "./commands/config.js";

const VERSION = "0.1.0";

const argv = minimist(process.argv.slice(2), {
  // keep key IDs such as 1234567890 as strings
  string: ["_"],
  boolean: ["help", "version"],
  alias: { h: "help", v: "version" },
});

if (argv.version) {
  console.log(VERSION);
  process.exit(0);
}

void main();

async function main(): Promise<void> {
  let command: Command;
  try {
    command = argv.help ? { kind: "help" } : parseCommand(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.usage);
    }
    return outputError(describeError(err).message);
  }

  try {
    // Commands that don't need the key repository
    switch (command.kind) {
      case "help":
        return handleHelp();
      case "config":
        return await handleConfig();
    }

    const config = loadConfig();
    const configError = validateConfig(config);
    if (configError) {
      return outputError(configError);
    }

    const ctx = createContext(config);
    switch (command.kind) {
      case "import":
        return await handleImport(ctx, command.source);
      case "list":
        return await handleList(ctx);
      case "remove":
        return await handleRemove(ctx, command.fingerprint);
      case "challenge":
        return await handleChallenge(ctx, command);
      default: {
        const unhandled: never = command;
        return outputError(`Unknown command: ${JSON.stringify(unhandled)}`);
      }
    }
  } catch (err) {
    const { message, details } = describeError(err);
    return outputError(message, details);
  }
}
