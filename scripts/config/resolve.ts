/**
 * 設定の検証と解決
 */
import { arch as hostArch } from "node:os";
import { join } from "node:path";
import { detectPlatform, platformFrom } from "../launcher/platform.ts";
import { ConfigError } from "../types/errors.ts";
import { isDefined, isObject, isString } from "../types/guards.ts";
import { err, map, ok, type Result } from "../types/result.ts";
import {
  type ConfigOverrides,
  DEFAULTS,
  ENV,
  type JavaConfig,
  type PlatformConfig,
  type ResolvedConfig,
  type WMMLConfigSchema,
} from "./schema.ts";

type Env = Record<string, string | undefined>;

/**
 * 文字列値の合体（最初の有効な値を返す）
 */
function coalesceString(
  ...values: Array<string | undefined | null>
): string | undefined {
  for (const value of values) {
    if (value === undefined || value === null || value === "") continue;
    return value;
  }
  return undefined;
}

/**
 * 最初に定義されている値を返す
 */
function coalesce<T>(...values: Array<T | undefined>): T | undefined {
  return values.find((value): value is T => value !== undefined);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function optionalString(
  section: Record<string, unknown>,
  key: string,
  field: string,
): Result<string | undefined, string> {
  const value = section[key];
  if (value === undefined || value === null) return ok(undefined);
  return isString(value) ? ok(value) : err(`"${field}" must be a string`);
}

function parseJavaSection(raw: unknown): Result<JavaConfig, string> {
  if (raw === undefined || raw === null) return ok({});
  if (!isObject(raw)) return err(`"java" must be a mapping`);

  const path = optionalString(raw, "path", "java.path");
  if (!path.ok) return path;

  const java: JavaConfig = { path: path.value };
  if (isDefined(raw.memory)) {
    if (!isPositiveInteger(raw.memory)) {
      return err(`"java.memory" must be a positive integer (MB)`);
    }
    java.memory = raw.memory;
  }
  if (isDefined(raw.use_system_memory)) {
    if (typeof raw.use_system_memory !== "boolean") {
      return err(`"java.use_system_memory" must be true or false`);
    }
    java.use_system_memory = raw.use_system_memory;
  }
  return ok(java);
}

function parsePlatformSection(raw: unknown): Result<PlatformConfig, string> {
  if (raw === undefined || raw === null) return ok({});
  if (!isObject(raw)) return err(`"platform" must be a mapping`);

  const os = optionalString(raw, "os", "platform.os");
  if (!os.ok) return os;
  return map(
    optionalString(raw, "arch", "platform.arch"),
    (arch) => ({ os: os.value, arch }),
  );
}

/**
 * YAMLから読み込んだ値を設定スキーマとして検証
 */
export function parseConfig(
  data: unknown,
  path: string,
): Result<WMMLConfigSchema, ConfigError> {
  const fail = (reason: string) =>
    err(new ConfigError(`Invalid config ${path}: ${reason}`, path));

  // 空ファイルはデフォルト扱い
  if (data === undefined || data === null) return ok({});
  if (!isObject(data)) return fail("top level must be a mapping");

  const root = optionalString(data, "minecraft_root", "minecraft_root");
  if (!root.ok) return fail(root.error);
  const player = optionalString(data, "player_name", "player_name");
  if (!player.ok) return fail(player.error);
  const java = parseJavaSection(data.java);
  if (!java.ok) return fail(java.error);
  const platform = parsePlatformSection(data.platform);
  if (!platform.ok) return fail(platform.error);

  return ok({
    minecraft_root: root.value,
    player_name: player.value,
    java: java.value,
    platform: platform.value,
  });
}

/**
 * 設定全体を解決
 * 優先順位: コマンドライン > 環境変数 > 設定ファイル > JAVA_HOME > デフォルト
 */
export function resolveConfig(
  config: WMMLConfigSchema,
  env: Env = process.env,
  overrides: ConfigOverrides = {},
  nodeArch: string = hostArch(),
): ResolvedConfig {
  const javaHome = coalesceString(env[ENV.JAVA_HOME]);

  const minecraftRoot = coalesceString(
    overrides.minecraftRoot,
    env[ENV.MINECRAFT_ROOT],
    config.minecraft_root,
  ) ?? DEFAULTS.MINECRAFT_ROOT;

  const playerName = coalesceString(
    overrides.playerName,
    env[ENV.PLAYER_NAME],
    config.player_name,
  ) ?? DEFAULTS.PLAYER_NAME;

  const javaPath = coalesceString(
    overrides.javaPath,
    config.java?.path,
    javaHome ? join(javaHome, "bin", "java") : undefined,
  ) ?? DEFAULTS.JAVA_PATH;

  const osName = coalesceString(config.platform?.os) ?? DEFAULTS.PLATFORM_OS;
  const osArch = coalesceString(config.platform?.arch);

  return {
    minecraftRoot,
    playerName,
    launch: {
      javaPath,
      memory: coalesce(overrides.memory, config.java?.memory),
      useSystemMemory: coalesce(
        overrides.useSystemMemory,
        config.java?.use_system_memory,
      ) ?? DEFAULTS.USE_SYSTEM_MEMORY,
    },
    platform: osArch
      ? platformFrom(osName, osArch)
      : detectPlatform(nodeArch, osName),
  };
}
