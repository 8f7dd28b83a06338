import { delimiter, join } from "node:path";
import { DependencyResolutionSkip, logWarning } from "../types/errors.ts";
import { err, ok, type Result } from "../types/result.ts";
import { evaluateRules } from "./rules.ts";
import type { Library, PlatformInfo, VersionJson } from "./types.ts";

export type Coordinate = {
  group: string;
  artifact: string;
  version: string;
};

export type LibraryResolver = {
  pathExists: (path: string) => boolean;
  onSkip?: (skip: DependencyResolutionSkip) => void;
};

export function parseCoordinate(name: string): Result<Coordinate, string> {
  const parts = name.split(":");
  if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
    return err(name);
  }
  const [group, artifact, version] = parts;
  return ok({ group, artifact, version });
}

export function versionJarPath(mcRoot: string, versionId: string): string {
  return join(mcRoot, "versions", versionId, `${versionId}.jar`);
}

/**
 * Resolves one library to a jar under `<root>/libraries`.
 * The native variant for the current OS wins over the plain artifact when it exists.
 */
export function resolveLibraryPath(
  mcRoot: string,
  lib: Library,
  platform: PlatformInfo,
  pathExists: (path: string) => boolean,
): Result<string, DependencyResolutionSkip> {
  const coordinate = parseCoordinate(lib.name);
  if (!coordinate.ok) {
    return err(new DependencyResolutionSkip(lib.name, "malformed-coordinate"));
  }
  const { group, artifact, version } = coordinate.value;

  const basePath = join(
    mcRoot,
    "libraries",
    group.replace(/\./g, "/"),
    artifact,
    version,
  );
  const baseFile = `${artifact}-${version}`;
  const candidates: string[] = [];

  const classifier = lib.natives?.[platform.osName];
  if (classifier !== undefined) {
    const resolved = classifier.replaceAll("${arch}", platform.archBits);
    const nativePath = join(basePath, `${baseFile}-${resolved}.jar`);
    if (pathExists(nativePath)) return ok(nativePath);
    candidates.push(nativePath);
  }

  const jarPath = join(basePath, `${baseFile}.jar`);
  if (pathExists(jarPath)) return ok(jarPath);
  candidates.push(jarPath);

  return err(
    new DependencyResolutionSkip(lib.name, "missing-artifact", candidates),
  );
}

/**
 * Classpath entries in launch order: the version jar, then every applicable
 * library that resolved to an existing file. Never throws.
 */
export function buildClasspath(
  mcRoot: string,
  versionJson: VersionJson,
  platform: PlatformInfo,
  resolver: LibraryResolver,
): string[] {
  const onSkip = resolver.onSkip ??
    ((skip: DependencyResolutionSkip) => logWarning(skip, "classpath"));
  const cp = [versionJarPath(mcRoot, versionJson.id)];

  for (const lib of versionJson.libraries) {
    if (!evaluateRules(lib.rules, platform)) continue;

    const resolved = resolveLibraryPath(
      mcRoot,
      lib,
      platform,
      resolver.pathExists,
    );
    if (resolved.ok) {
      cp.push(resolved.value);
    } else {
      onSkip(resolved.error);
    }
  }
  return cp;
}

export function joinClasspath(
  entries: readonly string[],
  separator: string = delimiter,
): string {
  return entries.join(separator);
}
