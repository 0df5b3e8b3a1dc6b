import { execFile } from "node:child_process";
import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { buildAgentEnv, createSentinelDir, installVcsShim, SHIM_SCRIPT } from "./isolation.js";

function runShim(file: string): Promise<{ code: number | string | null | undefined; stderr: string }> {
  return new Promise((resolve) => {
    execFile("/bin/sh", [file, "status"], { encoding: "utf8" }, (err, _stdout, stderr) => {
      resolve({ code: err ? err.code : 0, stderr });
    });
  });
}

describe("workspace/isolation", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "jjcage-isolation-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true }).catch(() => {});
  });

  it("creates the .git sentinel directory idempotently", async () => {
    const sentinel = await createSentinelDir(dir);
    await createSentinelDir(dir);
    expect(sentinel).toBe(path.join(dir, ".git"));
    expect((await stat(sentinel)).isDirectory()).toBe(true);
  });

  it("installs an executable git shim", async () => {
    const shimDir = await installVcsShim(dir);
    const script = path.join(shimDir, "git");

    expect(shimDir).toBe(path.join(dir, ".jj", ".jjcage-bin"));
    expect(await readFile(script, "utf8")).toBe(SHIM_SCRIPT);
    expect((await stat(script)).mode & 0o777).toBe(0o755);
  });

  it.skipIf(process.platform === "win32")("shim fails with a fixed message", async () => {
    const script = path.join(await installVcsShim(dir), "git");
    const result = await runShim(script);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe("git disabled for agents; use jj\n");
  });

  it("wraps filesystem failures", async () => {
    await writeFile(path.join(dir, ".git"), "gitdir: elsewhere", "utf8");
    await expect(createSentinelDir(dir)).rejects.toMatchObject({ code: "IO_ERROR" });
  });

  it("prepends the shim directory to PATH without touching the base env", () => {
    const base = { PATH: "/usr/bin:/bin", HOME: "/home/me" };
    const env = buildAgentEnv("/tmp/repo-alpha/.jj/.jjcage-bin", base);

    expect(env.PATH).toBe(`/tmp/repo-alpha/.jj/.jjcage-bin${path.delimiter}/usr/bin:/bin`);
    expect(env.HOME).toBe("/home/me");
    expect(base.PATH).toBe("/usr/bin:/bin");
  });

  it("uses the shim directory alone when PATH is empty", () => {
    expect(buildAgentEnv("/shim", {}).PATH).toBe("/shim");
  });
});
