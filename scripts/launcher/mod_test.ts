import assert from "node:assert/strict";
import { delimiter, join, resolve, sep } from "node:path";
import { test } from "node:test";
import { ManifestReadError, SpawnError } from "../types/errors.ts";
import type { LauncherHost } from "./host.ts";
import { launch, normalizeRoot, planLaunch } from "./mod.ts";
import type {
  CommandLine,
  Logger,
  PlatformInfo,
  VersionJson,
} from "./types.ts";

const ROOT = join("/games", ".minecraft");
const GAME_DIR = ROOT + sep;
const windows64: PlatformInfo = {
  osName: "windows",
  osArch: "x86_64",
  archBits: "64",
};

const VERSION: VersionJson = {
  id: "1.20.1",
  mainClass: "net.minecraft.client.main.Main",
  assets: "5",
  libraries: [
    { name: "com.google.code.gson:gson:2.10" },
    { name: "missing:lib:1.0" },
  ],
  minecraftArguments: "--username ${auth_player_name} --version ${version_name}",
};

const GSON = join(
  GAME_DIR,
  "libraries",
  "com/google/code/gson",
  "gson",
  "2.10",
  "gson-2.10.jar",
);

type Recorded = { info: string[]; warn: string[]; error: string[] };

const recordingLogger = (): Logger & { lines: Recorded } => {
  const lines: Recorded = { info: [], warn: [], error: [] };
  return {
    lines,
    info: (message: string) => lines.info.push(message),
    warn: (message: string) => lines.warn.push(message),
    error: (message: string) => lines.error.push(message),
  };
};

const fakeHost = (spawned: CommandLine[]): LauncherHost => ({
  readManifest: (path) => {
    if (path !== join(GAME_DIR, "versions", "1.20.1", "1.20.1.json")) {
      throw new ManifestReadError(`Could not read version JSON ${path}`, path);
    }
    return VERSION;
  },
  pathExists: (path) => path === GSON,
  spawnDetached: (command) => {
    spawned.push(command);
    return Promise.resolve({ pid: 4242 });
  },
});

test("normalizeRoot appends a trailing separator once", () => {
  assert.equal(normalizeRoot(ROOT), GAME_DIR);
  assert.equal(normalizeRoot(GAME_DIR), GAME_DIR);
  assert.equal(normalizeRoot(".minecraft/"), resolve(".minecraft") + sep);
});

const anyManifestHost = (
  versionJson: VersionJson,
  spawned: CommandLine[],
): LauncherHost => ({
  readManifest: () => versionJson,
  pathExists: () => false,
  spawnDetached: (command) => {
    spawned.push(command);
    return Promise.resolve({ pid: 7 });
  },
});

test("launch passes absolute paths for a relative root", async () => {
  const spawned: CommandLine[] = [];
  await launch(".minecraft", "1.20.1", "Alice", {}, {
    host: anyManifestHost(VERSION, spawned),
    platform: windows64,
    logger: recordingLogger(),
  });

  const absoluteRoot = resolve(".minecraft");
  const { args, cwd } = spawned[0];
  assert.equal(cwd, absoluteRoot + sep);
  assert.equal(
    args[args.indexOf("-cp") + 1],
    join(absoluteRoot, "versions", "1.20.1", "1.20.1.jar"),
  );
  assert.ok(
    args.includes(
      `-Djava.library.path=${
        join(absoluteRoot, "versions", "1.20.1", "natives-windows-x86_64")
      }`,
    ),
  );
});

test("launch keeps values containing spaces as single arguments", async () => {
  const spawned: CommandLine[] = [];
  const root = join("/home", "John Doe", ".minecraft");
  const versionJson: VersionJson = {
    ...VERSION,
    minecraftArguments:
      "--username ${auth_player_name} --gameDir ${game_directory} --versionType ${version_type}",
  };

  const result = await launch(root, "1.20.1", "Jane Roe", {}, {
    host: anyManifestHost(versionJson, spawned),
    platform: windows64,
    logger: recordingLogger(),
  });

  assert.deepEqual(spawned[0].args.slice(-6), [
    "--username",
    "Jane Roe",
    "--gameDir",
    normalizeRoot(root),
    "--versionType",
    "WMML 0.1.26",
  ]);
  assert.equal(
    result.plan.gameArguments,
    `--username Jane Roe --gameDir ${normalizeRoot(root)} --versionType "WMML 0.1.26"`,
  );
});

test("planLaunch resolves classpath, arguments and command line", () => {
  const logger = recordingLogger();
  const planned = planLaunch(
    ROOT,
    "1.20.1",
    "Alice",
    { memory: 2048 },
    { host: fakeHost([]), platform: windows64, logger },
  );

  assert.equal(planned.gameDir, GAME_DIR);
  assert.equal(
    planned.plan.classpath,
    [join(GAME_DIR, "versions", "1.20.1", "1.20.1.jar"), GSON].join(delimiter),
  );
  assert.equal(planned.plan.gameArguments, "--username Alice --version 1.20.1");
  assert.equal(planned.plan.mainClass, "net.minecraft.client.main.Main");
  assert.deepEqual(planned.plan.flags.slice(0, 2), ["-Xmx2048M", "-Xms2048M"]);
  assert.equal(planned.skipped.length, 1);
  assert.equal(planned.skipped[0].coordinate, "missing:lib:1.0");
  assert.deepEqual(logger.lines.warn, [
    '[classpath] Skipping library "missing:lib:1.0": no artifact found',
  ]);
});

test("launch spawns the planned command and returns the pid", async () => {
  const spawned: CommandLine[] = [];
  const logger = recordingLogger();

  const result = await launch(
    ROOT,
    "1.20.1",
    "Alice",
    {},
    { host: fakeHost(spawned), platform: windows64, logger },
  );

  assert.equal(result.pid, 4242);
  assert.equal(spawned.length, 1);
  assert.equal(spawned[0].executable, "java");
  assert.equal(spawned[0].cwd, GAME_DIR);
  assert.deepEqual(spawned[0].args.slice(-5), [
    "net.minecraft.client.main.Main",
    "--username",
    "Alice",
    "--version",
    "1.20.1",
  ]);
  assert.deepEqual(logger.lines.info, [
    `Launching 1.20.1 with command: ${result.commandLine}`,
    "1.20.1 launched with PID: 4242",
  ]);
});

test("launch propagates ManifestReadError without spawning", async () => {
  const spawned: CommandLine[] = [];

  await assert.rejects(
    launch(ROOT, "9.9.9", "Alice", {}, {
      host: fakeHost(spawned),
      platform: windows64,
      logger: recordingLogger(),
    }),
    ManifestReadError,
  );
  assert.equal(spawned.length, 0);
});

test("launch propagates SpawnError after composing the command", async () => {
  const logger = recordingLogger();
  const host: LauncherHost = {
    ...fakeHost([]),
    spawnDetached: (command) =>
      Promise.reject(
        new SpawnError(`Failed to start ${command.executable}`, command.executable),
      ),
  };

  await assert.rejects(
    launch(ROOT, "1.20.1", "Alice", { javaPath: "/no/java" }, {
      host,
      platform: windows64,
      logger,
    }),
    (e: unknown) => e instanceof SpawnError && e.executable === "/no/java",
  );
  assert.equal(logger.lines.info.length, 1);
  assert.ok(logger.lines.info[0].startsWith("Launching 1.20.1 with command: /no/java "));
});
