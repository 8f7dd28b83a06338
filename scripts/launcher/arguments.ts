import { join } from "node:path";
import { LAUNCHER_BRAND, LAUNCHER_VERSION } from "./plan.ts";
import type { RuntimeContext, VersionJson } from "./types.ts";

// Authentication is not supported: offline identity values are fixed.
export const OFFLINE_UUID = "00000000-0000-0000-0000-000000000000";
export const OFFLINE_ACCESS_TOKEN = "00000000000000000000000000000000";
export const OFFLINE_USER_TYPE = "legacy";
export const VERSION_TYPE = `"${LAUNCHER_BRAND} ${LAUNCHER_VERSION}"`;

export function createRuntimeContext(
  gameDir: string,
  versionName: string,
  playerName: string,
  versionJson: VersionJson,
): RuntimeContext {
  return {
    playerName,
    versionName,
    gameDirectory: gameDir,
    assetsRoot: join(gameDir, "assets"),
    assetsIndexName: versionJson.assets,
    authUuid: OFFLINE_UUID,
    authAccessToken: OFFLINE_ACCESS_TOKEN,
    userType: OFFLINE_USER_TYPE,
    versionType: VERSION_TYPE,
  };
}

function placeholders(context: RuntimeContext): [string, string][] {
  return [
    ["${auth_player_name}", context.playerName],
    ["${version_name}", context.versionName],
    ["${game_directory}", context.gameDirectory],
    ["${assets_root}", context.assetsRoot],
    ["${assets_index_name}", context.assetsIndexName],
    ["${auth_uuid}", context.authUuid],
    ["${auth_access_token}", context.authAccessToken],
    ["${user_type}", context.userType],
    ["${version_type}", context.versionType],
  ];
}

/**
 * Collects the game argument template. A legacy `minecraftArguments` string
 * and the string tokens of `arguments.game` both contribute when both exist.
 */
export function collectArgumentTemplate(versionJson: VersionJson): string {
  let args = versionJson.minecraftArguments ?? "";
  for (const arg of versionJson.arguments?.game ?? []) {
    if (typeof arg === "string") {
      args += " " + arg;
    }
  }
  return args;
}

export function substitutePlaceholders(
  template: string,
  context: RuntimeContext,
): string {
  return placeholders(context).reduce(
    // replacer function: values are inserted as-is, `$&` and friends included
    (args, [token, value]) => args.replaceAll(token, () => value),
    template,
  );
}

export function composeArguments(
  versionJson: VersionJson,
  context: RuntimeContext,
): string {
  return substitutePlaceholders(collectArgumentTemplate(versionJson), context)
    .trim();
}

function unquote(token: string): string {
  return token.length >= 2 && token.startsWith('"') && token.endsWith('"')
    ? token.slice(1, -1)
    : token;
}

/**
 * Argument vector for starting the game without a shell. The template is
 * tokenized before substitution, so a value containing spaces (a game
 * directory, a player name) stays one argument. A token wholly wrapped in
 * double quotes, such as the version type, loses the quotes.
 */
export function composeArgumentList(
  versionJson: VersionJson,
  context: RuntimeContext,
): string[] {
  const legacy = (versionJson.minecraftArguments ?? "")
    .split(/\s+/)
    .filter((token) => token.length > 0);
  const modern = (versionJson.arguments?.game ?? [])
    .filter((arg): arg is string => typeof arg === "string");

  return [...legacy, ...modern].map((token) =>
    unquote(substitutePlaceholders(token, context))
  );
}
