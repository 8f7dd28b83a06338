import assert from "node:assert/strict";
import { join } from "node:path";
import { afterEach, beforeEach, test } from "node:test";
import { setupTestContext, type TestContext } from "../../tests/helpers/test-context.ts";
import { SpawnError } from "../types/errors.ts";
import { listInstalledVersions, spawnDetached } from "./host.ts";

let ctx: TestContext;

beforeEach(() => {
  ctx = setupTestContext();
});

afterEach(() => {
  ctx.cleanup();
});

test("listInstalledVersions returns versions with a manifest, sorted", () => {
  ctx.createFile("versions/1.20.1/1.20.1.json", "{}");
  ctx.createFile("versions/1.12.2/1.12.2.json", "{}");
  ctx.createDir("versions/partial");
  ctx.createFile("versions/stray.json", "{}");

  assert.deepEqual(listInstalledVersions(ctx.tempDir), ["1.12.2", "1.20.1"]);
});

test("listInstalledVersions is empty without a versions directory", () => {
  assert.deepEqual(listInstalledVersions(join(ctx.tempDir, "nowhere")), []);
});

test("spawnDetached rejects with SpawnError for a missing executable", async () => {
  const executable = join(ctx.tempDir, "no-such-java");
  await assert.rejects(
    spawnDetached({ executable, args: [] }),
    (e: unknown) => e instanceof SpawnError && e.executable === executable,
  );
});

test("spawnDetached resolves the pid of a started process", async () => {
  const handle = await spawnDetached({
    executable: process.execPath,
    args: ["-e", ""],
    cwd: ctx.tempDir,
  });
  assert.equal(typeof handle.pid, "number");
  assert.ok(handle.pid > 0);
});
