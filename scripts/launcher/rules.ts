import type { PlatformInfo, Rule } from "./types.ts";

function applyRule(
  decision: boolean,
  rule: Rule,
  platform: PlatformInfo,
): boolean {
  const os = rule.os;
  const osMatches = os !== undefined && os.name === platform.osName;

  if (rule.action === "allow") {
    if (!os) return true;
    if (!osMatches) return false;
    return os.arch === undefined || os.arch === platform.osArch;
  }

  if (rule.action === "disallow") {
    if (!os || osMatches) return false;
    return decision;
  }

  return decision;
}

/**
 * Decides whether a library applies to `platform`.
 * No rules means included; otherwise the last rule that touches the decision wins.
 */
export function evaluateRules(
  rules: readonly Rule[] | undefined,
  platform: PlatformInfo,
): boolean {
  if (!rules || rules.length === 0) return true;
  return rules.reduce(
    (decision, rule) => applyRule(decision, rule, platform),
    true,
  );
}
