import assert from "node:assert/strict";
import { test } from "node:test";
import { evaluateRules } from "./rules.ts";
import type { PlatformInfo, Rule } from "./types.ts";

const windows64: PlatformInfo = {
  osName: "windows",
  osArch: "x86_64",
  archBits: "64",
};
const linux64: PlatformInfo = { osName: "linux", osArch: "x86_64", archBits: "64" };
const windows32: PlatformInfo = { osName: "windows", osArch: "x86", archBits: "32" };

test("evaluateRules includes libraries without rules", () => {
  assert.equal(evaluateRules(undefined, windows64), true);
  assert.equal(evaluateRules([], linux64), true);
});

test("evaluateRules: allow for windows includes on windows/x86_64", () => {
  const rules: Rule[] = [{ action: "allow", os: { name: "windows" } }];
  assert.equal(evaluateRules(rules, windows64), true);
});

test("evaluateRules: allow for windows excludes on linux/x86_64", () => {
  const rules: Rule[] = [{ action: "allow", os: { name: "windows" } }];
  assert.equal(evaluateRules(rules, linux64), false);
});

test("evaluateRules: allow with arch only matches that arch", () => {
  const rules: Rule[] = [{
    action: "allow",
    os: { name: "windows", arch: "x86" },
  }];
  assert.equal(evaluateRules(rules, windows32), true);
  assert.equal(evaluateRules(rules, windows64), false);
});

test("evaluateRules: unconditional disallow excludes", () => {
  assert.equal(evaluateRules([{ action: "disallow" }], windows64), false);
});

test("evaluateRules: disallow for the current OS excludes", () => {
  const rules: Rule[] = [
    { action: "allow" },
    { action: "disallow", os: { name: "windows" } },
  ];
  assert.equal(evaluateRules(rules, windows64), false);
});

test("evaluateRules: disallow for another OS keeps the previous decision", () => {
  const rules: Rule[] = [
    { action: "allow" },
    { action: "disallow", os: { name: "osx" } },
  ];
  assert.equal(evaluateRules(rules, windows64), true);

  const excluded: Rule[] = [
    { action: "allow", os: { name: "osx" } },
    { action: "disallow", os: { name: "linux" } },
  ];
  assert.equal(evaluateRules(excluded, windows64), false);
});

test("evaluateRules: the last rule that applies wins", () => {
  const rules: Rule[] = [
    { action: "disallow" },
    { action: "allow", os: { name: "windows" } },
  ];
  assert.equal(evaluateRules(rules, windows64), true);
  assert.equal(evaluateRules(rules, linux64), false);

  const reversed: Rule[] = [
    { action: "allow", os: { name: "windows" } },
    { action: "disallow" },
  ];
  assert.equal(evaluateRules(reversed, windows64), false);
});

test("evaluateRules: an allow for another OS overrides an earlier allow", () => {
  const rules: Rule[] = [
    { action: "allow" },
    { action: "allow", os: { name: "osx" } },
  ];
  assert.equal(evaluateRules(rules, windows64), false);
});
