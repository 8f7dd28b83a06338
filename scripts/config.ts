import { existsSync, readFileSync } from "node:fs";
import { parse } from "yaml";
import { parseConfig, resolveConfig } from "./config/resolve.ts";
import {
  type ConfigOverrides,
  DEFAULTS,
  type ResolvedConfig,
  type WMMLConfigSchema,
} from "./config/schema.ts";
import { ConfigError } from "./types/errors.ts";
import { mapErr, tryCatchSync, unwrap } from "./types/result.ts";

/**
 * Reads the YAML config. A missing file means defaults; an unreadable or
 * invalid one is a ConfigError.
 */
export function loadConfig(path: string = DEFAULTS.CONFIG_PATH): WMMLConfigSchema {
  if (!existsSync(path)) return {};

  const text = unwrap(mapErr(
    tryCatchSync(() => readFileSync(path, "utf-8")),
    (e) => new ConfigError(`Could not read config ${path}`, path, e),
  ));

  const data = unwrap(mapErr(
    tryCatchSync((): unknown => parse(text)),
    (e) => new ConfigError(`Config ${path} is not valid YAML`, path, e),
  ));

  return unwrap(parseConfig(data, path));
}

export function loadResolvedConfig(
  path: string = DEFAULTS.CONFIG_PATH,
  overrides: ConfigOverrides = {},
): ResolvedConfig {
  return resolveConfig(loadConfig(path), process.env, overrides);
}
