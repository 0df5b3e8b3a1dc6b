import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { VcsCommandError } from "../errors.js";
import { createTempRepo, type TempRepo } from "../testing/tempRepo.js";
import { pathExists } from "../utils/fs.js";
import { writeAgentMarker } from "./agentMarker.js";
import { cleanupWorkspace, type SetupArtifact } from "./cleanup.js";
import { createSentinelDir, installVcsShim } from "./isolation.js";
import { agentWorkspacePaths, markerPath, type AgentWorkspacePaths } from "./workspacePath.js";

describe("workspace/cleanupWorkspace", () => {
  let repo: TempRepo;
  let ws: AgentWorkspacePaths;

  beforeEach(async () => {
    repo = await createTempRepo();
    ws = agentWorkspacePaths(repo.root, "alpha");
    await repo.vcs.workspaceAdd(ws.path, { cwd: repo.root });
    await createSentinelDir(ws.path);
    await writeAgentMarker(ws.path, { rootPath: repo.root, name: "alpha", agent: "codex" });
    await installVcsShim(ws.path);
  });

  afterEach(async () => {
    await repo.dispose();
  });

  it("removes every artifact, the registration and the directory", async () => {
    const warn = vi.fn();
    const report = await cleanupWorkspace({ vcs: repo.vcs, warn }, ws);

    expect(report.warnings).toEqual([]);
    expect(warn).not.toHaveBeenCalled();
    expect(await pathExists(ws.path)).toBe(false);
    expect(repo.vcs.registeredNames()).toEqual(["default"]);
    expect(repo.vcs.calls.filter((c) => c.method === "workspaceForget")).toEqual([
      { method: "workspaceForget", args: ["repo-alpha", repo.root] },
    ]);
  });

  it("is idempotent", async () => {
    const warn = vi.fn();
    await cleanupWorkspace({ vcs: repo.vcs, warn }, ws);
    const second = await cleanupWorkspace({ vcs: repo.vcs, warn }, ws);

    expect(second.warnings).toEqual([]);
    expect(warn).not.toHaveBeenCalled();
    expect(await pathExists(ws.path)).toBe(false);
  });

  it("tolerates artifacts that are already gone", async () => {
    await cleanupWorkspace({ vcs: repo.vcs, warn: vi.fn() }, ws, new Set<SetupArtifact>());
    // 目录没了，但注册还在
    expect(repo.vcs.registeredNames()).toContain("repo-alpha");

    const report = await cleanupWorkspace({ vcs: repo.vcs, warn: vi.fn() }, ws);
    expect(report.warnings).toEqual([]);
    expect(repo.vcs.registeredNames()).toEqual(["default"]);
  });

  it("skips forget when the workspace was never registered", async () => {
    await cleanupWorkspace({ vcs: repo.vcs, warn: vi.fn() }, ws, new Set<SetupArtifact>(["sentinel", "marker"]));
    expect(repo.vcs.calls.some((c) => c.method === "workspaceForget")).toBe(false);
    expect(await pathExists(ws.path)).toBe(false);
  });

  it("keeps going after a forget failure and reports it as a warning", async () => {
    repo.vcs.failures.set("workspaceForget", new VcsCommandError("workspace", "Error: lock held", 1));
    const warn = vi.fn();

    const report = await cleanupWorkspace({ vcs: repo.vcs, warn }, ws);

    expect(report.warnings).toEqual(["failed to forget workspace: jj workspace: Error: lock held"]);
    expect(warn).toHaveBeenCalledWith("failed to forget workspace", {
      workspace: "repo-alpha",
      err: "jj workspace: Error: lock held",
    });
    expect(await pathExists(ws.path)).toBe(false);
  });

  it("removes the marker even when the sentinel is missing", async () => {
    const other = agentWorkspacePaths(repo.root, "beta");
    await mkdir(path.join(other.path, ".jj"), { recursive: true });
    await writeFile(markerPath(other.path), "{}", "utf8");

    const report = await cleanupWorkspace({ vcs: repo.vcs, warn: vi.fn() }, other, new Set<SetupArtifact>(["marker"]));
    expect(report.warnings).toEqual([]);
    expect(await pathExists(other.path)).toBe(false);
  });
});
