import { readFileSync } from "node:fs";
import { join } from "node:path";
import { ManifestReadError } from "../types/errors.ts";
import {
  isNonEmptyString,
  isObject,
  isString,
  isStringRecord,
} from "../types/guards.ts";
import {
  andThen,
  err,
  mapErr,
  ok,
  type Result,
  tryCatchSync,
  unwrap,
} from "../types/result.ts";
import type {
  Argument,
  Library,
  Rule,
  RuleAction,
  VersionJson,
} from "./types.ts";

export function manifestPath(mcRoot: string, versionName: string): string {
  return join(mcRoot, "versions", versionName, `${versionName}.json`);
}

function isRuleAction(value: unknown): value is RuleAction {
  return value === "allow" || value === "disallow";
}

// Malformed rules degrade instead of failing: an unusable `os` becomes no
// constraint, an unknown action is dropped (it would change nothing anyway).
function parseRule(raw: unknown): Rule | undefined {
  if (!isObject(raw)) return undefined;
  if (!isRuleAction(raw.action)) return undefined;

  const rule: Rule = { action: raw.action };
  if (isObject(raw.os) && isString(raw.os.name)) {
    rule.os = { name: raw.os.name };
    if (isString(raw.os.arch)) rule.os.arch = raw.os.arch;
  }
  return rule;
}

function parseLibrary(raw: unknown): Library | undefined {
  if (!isObject(raw)) return undefined;

  // A missing name still flows through and is skipped as a malformed coordinate.
  const lib: Library = { name: isString(raw.name) ? raw.name : "" };
  if (Array.isArray(raw.rules)) {
    lib.rules = raw.rules
      .map(parseRule)
      .filter((rule): rule is Rule => rule !== undefined);
  }
  if (isStringRecord(raw.natives)) {
    lib.natives = raw.natives;
  }
  return lib;
}

function parseGameArguments(raw: unknown): Argument[] | undefined {
  if (!isObject(raw) || !Array.isArray(raw.game)) return undefined;
  return raw.game.filter((arg): arg is Argument =>
    isString(arg) || isObject(arg)
  );
}

function resolveAssetsName(raw: Record<string, unknown>): string {
  if (isString(raw.assets)) return raw.assets;
  if (isObject(raw.assetIndex) && isString(raw.assetIndex.id)) {
    return raw.assetIndex.id;
  }
  return "";
}

/**
 * Validates a parsed version JSON document.
 * `id` and `mainClass` are required; everything else degrades to empty.
 */
export function parseManifest(
  data: unknown,
  path: string,
): Result<VersionJson, ManifestReadError> {
  if (!isObject(data)) {
    return err(
      new ManifestReadError(`Version JSON ${path} is not an object`, path),
    );
  }
  if (!isNonEmptyString(data.id)) {
    return err(
      new ManifestReadError(`Version JSON ${path} has no "id"`, path),
    );
  }
  if (!isNonEmptyString(data.mainClass)) {
    return err(
      new ManifestReadError(`Version JSON ${path} has no "mainClass"`, path),
    );
  }

  const libraries = Array.isArray(data.libraries)
    ? data.libraries
      .map(parseLibrary)
      .filter((lib): lib is Library => lib !== undefined)
    : [];

  const versionJson: VersionJson = {
    id: data.id,
    mainClass: data.mainClass,
    assets: resolveAssetsName(data),
    libraries,
  };
  if (isString(data.minecraftArguments)) {
    versionJson.minecraftArguments = data.minecraftArguments;
  }
  const game = parseGameArguments(data.arguments);
  if (game) {
    versionJson.arguments = { game };
  }
  return ok(versionJson);
}

export function readManifest(path: string): VersionJson {
  const text = unwrap(mapErr(
    tryCatchSync(() => readFileSync(path, "utf-8")),
    (e) => new ManifestReadError(`Could not read version JSON ${path}`, path, e),
  ));

  const data = mapErr(
    tryCatchSync((): unknown => JSON.parse(text)),
    (e) => new ManifestReadError(`Version JSON ${path} is not valid JSON`, path, e),
  );
  return unwrap(andThen(data, (value) => parseManifest(value, path)));
}
