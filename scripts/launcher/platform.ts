import { arch as hostArch } from "node:os";
import { DEFAULTS } from "../config/schema.ts";
import type { PlatformInfo } from "./types.ts";

const ARCH_LABELS: Record<string, string> = {
  x64: "x86_64",
  ia32: "x86",
};

const SIXTY_FOUR_BIT = new Set(["x64", "arm64", "ppc64", "s390x", "riscv64"]);

// Rules and natives match the default OS unless one is configured.
export function detectPlatform(
  nodeArch: string = hostArch(),
  osName: string = DEFAULTS.PLATFORM_OS,
): PlatformInfo {
  return {
    osName,
    osArch: ARCH_LABELS[nodeArch] ?? nodeArch,
    archBits: SIXTY_FOUR_BIT.has(nodeArch) ? "64" : "32",
  };
}

/**
 * Builds a platform from explicit labels (config or CLI overrides).
 * `archBits` follows the label: only the known 64-bit names count as 64.
 */
export function platformFrom(osName: string, osArch: string): PlatformInfo {
  const bits = ["x86_64", "x64", "amd64", "arm64", "aarch64"].includes(osArch)
    ? "64"
    : "32";
  return { osName, osArch, archBits: bits };
}
