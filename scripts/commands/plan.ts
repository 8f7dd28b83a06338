import type { Command } from "../command.ts";
import { loadResolvedConfig } from "../config.ts";
import { planLaunch } from "../launcher/mod.ts";
import {
  LAUNCH_USAGE,
  parseLaunchArgs,
  requireVersion,
} from "./options.ts";

const planCommand: Command = {
  name: "plan",
  description: "Print the launch command without starting the game",
  usage: LAUNCH_USAGE,
  handler: async (args: string[]) => {
    const parsed = parseLaunchArgs(args);
    const version = requireVersion(parsed, "plan");
    const config = loadResolvedConfig(parsed.configPath, parsed.overrides);

    const { commandLine, skipped } = planLaunch(
      config.minecraftRoot,
      version,
      config.playerName,
      config.launch,
      { platform: config.platform },
    );

    console.log(commandLine);
    if (skipped.length > 0) {
      console.log(`\n${skipped.length} library(ies) left out of the classpath`);
    }
  },
};

export default planCommand;
