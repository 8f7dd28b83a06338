import minimist from "minimist";
import { type ConfigOverrides, DEFAULTS } from "../config/schema.ts";
import { ValidationError } from "../types/errors.ts";
import { isString } from "../types/guards.ts";

export const LAUNCH_USAGE =
  "<version> [--player|-p <name>] [--root|-r <dir>] [--java|-j <path>] " +
  "[--memory|-m <MB>] [--system-memory] [--config|-c <file>]";

export type LaunchArgs = {
  version?: string;
  configPath: string;
  overrides: ConfigOverrides;
};

function optionalString(value: unknown): string | undefined {
  return isString(value) && value.length > 0 ? value : undefined;
}

function parseMemory(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  const memory = isString(value) && value.trim().length > 0
    ? Number(value)
    : Number.NaN;
  if (!Number.isInteger(memory) || memory <= 0) {
    throw new ValidationError(
      `--memory expects a positive number of megabytes, got "${String(value)}"`,
      "memory",
    );
  }
  return memory;
}

// minimist reports every declared boolean, so look at argv to tell "unset" from false
function hasFlag(args: string[], name: string): boolean {
  return args.some((arg) =>
    arg === `--${name}` || arg === `--no-${name}` ||
    arg.startsWith(`--${name}=`)
  );
}

export function parseLaunchArgs(args: string[]): LaunchArgs {
  const parsed = minimist(args, {
    // "_" keeps version names like 1.10 from being read as numbers;
    // "memory" turns a bare --memory into "" instead of true
    string: ["_", "player", "root", "java", "memory", "config"],
    boolean: ["system-memory"],
    alias: { p: "player", r: "root", j: "java", m: "memory", c: "config" },
  });

  const version: unknown = parsed._[0];
  const useSystemMemory: unknown = parsed["system-memory"];

  return {
    version: optionalString(version),
    configPath: optionalString(parsed.config) ?? DEFAULTS.CONFIG_PATH,
    overrides: {
      playerName: optionalString(parsed.player),
      minecraftRoot: optionalString(parsed.root),
      javaPath: optionalString(parsed.java),
      memory: parseMemory(parsed.memory),
      useSystemMemory: hasFlag(args, "system-memory")
        ? useSystemMemory === true
        : undefined,
    },
  };
}

export function requireVersion(parsed: LaunchArgs, command: string): string {
  if (!parsed.version) {
    throw new ValidationError(
      `Usage: wmml ${command} ${LAUNCH_USAGE}`,
      "version",
    );
  }
  return parsed.version;
}
