import { type ChildProcess, spawn } from "node:child_process";
import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { SpawnError } from "../types/errors.ts";
import { readManifest } from "./manifest.ts";
import type { CommandLine, ProcessHandle, VersionJson } from "./types.ts";

/**
 * What the launcher needs from the outside world.
 */
export type LauncherHost = {
  readManifest: (path: string) => VersionJson;
  pathExists: (path: string) => boolean;
  spawnDetached: (command: CommandLine) => Promise<ProcessHandle>;
};

export function spawnDetached(command: CommandLine): Promise<ProcessHandle> {
  const { executable } = command;
  return new Promise((resolve, reject) => {
    let child: ChildProcess;
    try {
      child = spawn(executable, command.args, {
        cwd: command.cwd,
        detached: true,
        stdio: "ignore",
      });
    } catch (e) {
      reject(new SpawnError(`Failed to start ${executable}`, executable, e));
      return;
    }

    child.once("error", (e) => {
      reject(new SpawnError(`Failed to start ${executable}`, executable, e));
    });
    child.once("spawn", () => {
      // not waited on: the game outlives the launcher
      child.unref();
      if (child.pid === undefined) {
        reject(new SpawnError(`No PID for ${executable}`, executable));
        return;
      }
      resolve({ pid: child.pid });
    });
  });
}

export function createNodeHost(): LauncherHost {
  return {
    readManifest,
    pathExists: existsSync,
    spawnDetached,
  };
}

/**
 * Names of the versions installed under `<root>/versions`, sorted.
 * A version counts when its directory holds `<name>.json`.
 */
export function listInstalledVersions(
  mcRoot: string,
  pathExists: (path: string) => boolean = existsSync,
): string[] {
  const versionsDir = join(mcRoot, "versions");
  if (!pathExists(versionsDir)) return [];

  return readdirSync(versionsDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .filter((name) => pathExists(join(versionsDir, name, `${name}.json`)))
    .sort();
}
