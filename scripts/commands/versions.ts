import minimist from "minimist";
import type { Command } from "../command.ts";
import { loadResolvedConfig } from "../config.ts";
import { DEFAULTS } from "../config/schema.ts";
import { listInstalledVersions } from "../launcher/host.ts";

const versionsCommand: Command = {
  name: "versions",
  description: "List installed versions",
  usage: "[--root|-r <dir>] [--config|-c <file>]",
  handler: async (args: string[]) => {
    const parsed = minimist(args, {
      string: ["root", "config"],
      alias: { r: "root", c: "config" },
    });
    const root: unknown = parsed.root;
    const configPath: unknown = parsed.config;

    const config = loadResolvedConfig(
      typeof configPath === "string" && configPath ? configPath : DEFAULTS.CONFIG_PATH,
      { minecraftRoot: typeof root === "string" ? root : undefined },
    );

    const versions = listInstalledVersions(config.minecraftRoot);
    if (versions.length === 0) {
      console.log(`No installed versions under ${config.minecraftRoot}`);
      return;
    }
    console.log(versions.map((name) => `- ${name}`).join("\n"));
  },
};

export default versionsCommand;
