import { join } from "node:path";
import { DEFAULTS } from "../config/schema.ts";
import type { CommandLine, LaunchOptions, LaunchPlan } from "./types.ts";

export const LAUNCHER_BRAND = "WMML";
export const LAUNCHER_VERSION = "0.1.26";

const NATIVES_DIR_NAME = "natives-windows-x86_64";

export function memoryFlags(options: LaunchOptions): string[] {
  if (options.useSystemMemory || options.memory === undefined) return [];
  return [`-Xmx${options.memory}M`, `-Xms${options.memory}M`];
}

export function fixedJvmFlags(mcRoot: string, versionName: string): string[] {
  const versionDir = join(mcRoot, "versions", versionName);
  const nativesDir = join(versionDir, NATIVES_DIR_NAME);
  return [
    "-Dfile.encoding=GB18030",
    "-Dsun.stdout.encoding=GB18030",
    "-Dsun.stderr.encoding=GB18030",
    "-Djava.rmi.server.useCodebaseOnly=true",
    "-Dcom.sun.jndi.rmi.object.trustURLCodebase=false",
    "-Dcom.sun.jndi.cosnaming.object.trustURLCodebase=false",
    "-Dlog4j2.formatMsgNoLookups=true",
    `-Dlog4j.configurationFile=${join(versionDir, "log4j2.xml")}`,
    `-Dminecraft.client.jar=${join(versionDir, `${versionName}.jar`)}`,
    "-XX:+UnlockExperimentalVMOptions",
    "-XX:+UseG1GC",
    "-XX:G1NewSizePercent=20",
    "-XX:G1ReservePercent=20",
    "-XX:MaxGCPauseMillis=50",
    "-XX:G1HeapRegionSize=32m",
    "-XX:-UseAdaptiveSizePolicy",
    "-XX:-OmitStackTraceInFastThrow",
    "-XX:-DontCompileHugeMethods",
    "-Dfml.ignoreInvalidMinecraftCertificates=true",
    "-Dfml.ignorePatchDiscrepancies=true",
    "-XX:HeapDumpPath=MojangTricksIntelDriversForPerformance_javaw.exe_minecraft.exe.heapdump",
    `-Djava.library.path=${nativesDir}`,
    `-Djna.tmpdir=${nativesDir}`,
    `-Dorg.lwjgl.system.SharedLibraryExtractPath=${nativesDir}`,
    `-Dio.netty.native.workdir=${nativesDir}`,
    `-Dminecraft.launcher.brand=${LAUNCHER_BRAND}`,
    `-Dminecraft.launcher.version=${LAUNCHER_VERSION}`,
  ];
}

export function assembleLaunchPlan(
  mcRoot: string,
  versionName: string,
  mainClass: string,
  classpath: string,
  gameArguments: string,
  options: LaunchOptions,
  gameArgv: readonly string[] = splitArguments(gameArguments),
): LaunchPlan {
  return Object.freeze({
    executable: options.javaPath || DEFAULTS.JAVA_PATH,
    flags: Object.freeze([
      ...memoryFlags(options),
      ...fixedJvmFlags(mcRoot, versionName),
    ]),
    classpath,
    mainClass,
    gameArguments,
    gameArgv: Object.freeze([...gameArgv]),
  });
}

/**
 * Shell-style rendering of the plan, for logs and `plan` output.
 */
export function renderCommandLine(plan: LaunchPlan): string {
  return [
    plan.executable,
    ...plan.flags,
    "-cp",
    `"${plan.classpath}"`,
    plan.mainClass,
    plan.gameArguments,
  ].filter((part) => part.length > 0).join(" ");
}

/**
 * Splits on whitespace; a double-quoted run stays one argument, quotes dropped.
 */
export function splitArguments(args: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let quoted = false;
  let pending = false;

  for (const ch of args) {
    if (ch === '"') {
      quoted = !quoted;
      pending = true;
      continue;
    }
    if (!quoted && /\s/.test(ch)) {
      if (pending) {
        tokens.push(current);
        current = "";
        pending = false;
      }
      continue;
    }
    current += ch;
    pending = true;
  }
  if (pending) tokens.push(current);
  return tokens;
}

export function toCommandLine(plan: LaunchPlan, cwd?: string): CommandLine {
  return {
    executable: plan.executable,
    args: [
      ...plan.flags,
      "-cp",
      plan.classpath,
      plan.mainClass,
      ...plan.gameArgv,
    ],
    cwd,
  };
}
