import { type Command, COMMANDS } from "../command.ts";

function usageLine(command: Command): string {
  return `wmml ${command.name}${command.usage ? ` ${command.usage}` : ""}`;
}

const cmd: Command = {
  name: "help",
  description: "Show help information",
  usage: "[command]",
  handler: async (args: string[]) => {
    if (args.length === 0) {
      console.log(
        COMMANDS.map((command) =>
          `- ${command.name}: ${command.description}\n    ${usageLine(command)}`
        ).join("\n\n"),
      );
      return;
    }

    const commandName = args[0];
    const command = COMMANDS.find((c) => c.name === commandName);
    if (command) {
      console.log(`${command.name}: ${command.description}`);
      console.log(`Usage: ${usageLine(command)}`);
    } else {
      console.log(`Command "${commandName}" not found.`);
    }
  },
};

export default cmd;
