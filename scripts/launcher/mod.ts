import { resolve, sep } from "node:path";
import type { DependencyResolutionSkip } from "../types/errors.ts";
import {
  composeArgumentList,
  composeArguments,
  createRuntimeContext,
} from "./arguments.ts";
import { buildClasspath, joinClasspath } from "./classpath.ts";
import { createNodeHost, type LauncherHost } from "./host.ts";
import { manifestPath } from "./manifest.ts";
import { assembleLaunchPlan, renderCommandLine, toCommandLine } from "./plan.ts";
import { detectPlatform } from "./platform.ts";
import type {
  LaunchOptions,
  LaunchPlan,
  LaunchResult,
  Logger,
  PlatformInfo,
} from "./types.ts";

export type LaunchDeps = {
  host?: Partial<LauncherHost>;
  platform?: PlatformInfo;
  logger?: Logger;
};

export type PlannedLaunch = {
  gameDir: string;
  plan: LaunchPlan;
  commandLine: string;
  skipped: DependencyResolutionSkip[];
};

/**
 * Absolute root with a trailing separator. Every path in the plan is built
 * from it, so the child sees the same files whatever its working directory.
 */
export function normalizeRoot(mcRoot: string): string {
  const absolute = resolve(mcRoot);
  return absolute.endsWith(sep) ? absolute : absolute + sep;
}

function resolveHost(deps: LaunchDeps): LauncherHost {
  return { ...createNodeHost(), ...deps.host };
}

/**
 * Everything short of starting the process: reads the version JSON and
 * resolves classpath, arguments and command line.
 */
export function planLaunch(
  mcRoot: string,
  versionName: string,
  playerName: string,
  options: LaunchOptions,
  deps: LaunchDeps = {},
): PlannedLaunch {
  const host = resolveHost(deps);
  const platform = deps.platform ?? detectPlatform();
  const logger = deps.logger ?? console;
  const gameDir = normalizeRoot(mcRoot);

  const versionJson = host.readManifest(manifestPath(gameDir, versionName));

  const skipped: DependencyResolutionSkip[] = [];
  const classpath = buildClasspath(gameDir, versionJson, platform, {
    pathExists: host.pathExists,
    onSkip: (skip) => {
      skipped.push(skip);
      logger.warn(`[classpath] ${skip.message}`);
    },
  });

  const context = createRuntimeContext(
    gameDir,
    versionName,
    playerName,
    versionJson,
  );

  const plan = assembleLaunchPlan(
    gameDir,
    versionName,
    versionJson.mainClass,
    joinClasspath(classpath),
    composeArguments(versionJson, context),
    options,
    composeArgumentList(versionJson, context),
  );

  return { gameDir, plan, commandLine: renderCommandLine(plan), skipped };
}

export async function launch(
  mcRoot: string,
  versionName: string,
  playerName: string,
  options: LaunchOptions,
  deps: LaunchDeps = {},
): Promise<LaunchResult> {
  const logger = deps.logger ?? console;
  const host = resolveHost(deps);

  const { gameDir, plan, commandLine } = planLaunch(
    mcRoot,
    versionName,
    playerName,
    options,
    { ...deps, host },
  );

  logger.info(`Launching ${versionName} with command: ${commandLine}`);
  const { pid } = await host.spawnDetached(toCommandLine(plan, gameDir));
  logger.info(`${versionName} launched with PID: ${pid}`);

  return { pid, plan, commandLine };
}
