import helpCmd from "./commands/help.ts";
import launchCmd from "./commands/launch.ts";
import planCmd from "./commands/plan.ts";
import versionsCmd from "./commands/versions.ts";

export interface Command {
  name: string;
  description: string;
  usage?: string;
  subcommands?: Command[];
  handler: (args: string[]) => Promise<void>;
  interactiveHandler?: () => Promise<void>;
}

export const COMMANDS: Command[] = [
  launchCmd,
  planCmd,
  versionsCmd,
  helpCmd,
];
