#!/usr/bin/env -S node --import tsx
import { intro, isCancel, log, outro, select } from "@clack/prompts";

import { type Command, COMMANDS } from "./scripts/command.ts";
import { LAUNCHER_BRAND, LAUNCHER_VERSION } from "./scripts/launcher/plan.ts";
import { formatError, logError } from "./scripts/types/errors.ts";

const EXIT_OPTION = "__exit";

const runCommand = async (command: Command, args: string[]) => {
  const sub = command.subcommands?.find((cmd) => cmd.name === args[0]);
  if (sub) {
    await runCommand(sub, args.slice(1));
    return;
  }
  await command.handler(args);
};

const runInteractiveMenu = async () => {
  intro(`${LAUNCHER_BRAND} ${LAUNCHER_VERSION}`);

  const commandChoice = await select({
    message: "Select a command",
    options: [
      ...COMMANDS.map((cmd) => ({
        value: cmd.name,
        label: cmd.name,
        hint: cmd.description,
      })),
      { value: EXIT_OPTION, label: "exit", hint: "Quit" },
    ],
  });

  if (isCancel(commandChoice) || commandChoice === EXIT_OPTION) {
    outro("Bye.");
    return;
  }

  const command = COMMANDS.find((cmd) => cmd.name === commandChoice);
  if (!command) {
    log.error(`Command "${commandChoice}" not found.`);
    return;
  }

  try {
    await (command.interactiveHandler ?? (() => command.handler([])))();
    outro(`"${command.name}" done.`);
  } catch (error) {
    log.error(`"${command.name}" failed: ${formatError(error)}`);
    process.exitCode = 1;
  }
};

const args = process.argv.slice(2);

if (!args[0]) {
  await runInteractiveMenu();
} else {
  const commandName = args[0];
  const command = COMMANDS.find((cmd) => cmd.name === commandName);
  if (command) {
    try {
      await runCommand(command, args.slice(1));
    } catch (error) {
      logError(error, command.name);
      process.exitCode = 1;
    }
  } else {
    console.log(`Command "${commandName}" not found. Try "wmml help".`);
    process.exitCode = 1;
  }
}
