import { isCancel, log, select, text } from "@clack/prompts";
import type { Command } from "../command.ts";
import { loadResolvedConfig } from "../config.ts";
import { listInstalledVersions } from "../launcher/host.ts";
import { launch } from "../launcher/mod.ts";
import { DEFAULTS } from "../config/schema.ts";
import {
  LAUNCH_USAGE,
  parseLaunchArgs,
  requireVersion,
} from "./options.ts";

const launchCommand: Command = {
  name: "launch",
  description: "Launch an installed version",
  usage: LAUNCH_USAGE,
  handler: async (args: string[]) => {
    const parsed = parseLaunchArgs(args);
    const version = requireVersion(parsed, "launch");
    const config = loadResolvedConfig(parsed.configPath, parsed.overrides);

    await launch(
      config.minecraftRoot,
      version,
      config.playerName,
      config.launch,
      { platform: config.platform },
    );
  },
  interactiveHandler: async () => {
    const config = loadResolvedConfig(DEFAULTS.CONFIG_PATH);
    const versions = listInstalledVersions(config.minecraftRoot);
    if (versions.length === 0) {
      log.warn(`No installed versions under ${config.minecraftRoot}`);
      return;
    }

    const version = await select<{ value: string; label: string }[], string>({
      message: "Select a version",
      options: versions.map((name) => ({ value: name, label: name })),
    });
    if (isCancel(version)) return;

    const playerName = await text({
      message: "Player name",
      initialValue: config.playerName,
      validate: (value) =>
        value.trim().length === 0 ? "Player name is required" : undefined,
    });
    if (isCancel(playerName)) return;

    const { pid } = await launch(
      config.minecraftRoot,
      version,
      playerName.trim(),
      config.launch,
      { platform: config.platform },
    );
    log.success(`${version} is running (PID ${pid})`);
  },
};

export default launchCommand;
