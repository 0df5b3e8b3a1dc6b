import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { NotARepositoryError, NotRootWorkspaceError } from "../errors.js";
import { createTempRepo, type TempRepo } from "../testing/tempRepo.js";
import { writeAgentMarker } from "./agentMarker.js";
import { ensureRootWorkspace, resolveRoot } from "./rootResolution.js";
import { markerPath, siblingPath } from "./workspacePath.js";

describe("workspace/resolveRoot", () => {
  let repo: TempRepo;
  let agentPath = "";

  beforeEach(async () => {
    repo = await createTempRepo();
    agentPath = siblingPath(repo.root, "alpha");
    await repo.vcs.workspaceAdd(agentPath, { cwd: repo.root });
    await writeAgentMarker(agentPath, { rootPath: repo.root, name: "alpha", agent: "codex" });
  });

  afterEach(async () => {
    await repo.dispose();
  });

  it("returns the jj root when run from the root workspace", async () => {
    expect(await resolveRoot(repo.vcs, path.join(repo.root, "src"))).toBe(repo.root);
  });

  it("follows the marker from inside an agent workspace", async () => {
    const fromAgent = await resolveRoot(repo.vcs, path.join(agentPath, "src", "lib"));
    const fromRoot = await resolveRoot(repo.vcs, repo.root);
    expect(fromAgent).toBe(repo.root);
    expect(fromAgent).toBe(fromRoot);
  });

  it("treats a corrupt marker as being at the root", async () => {
    await writeFile(markerPath(agentPath), "garbage", "utf8");
    expect(await resolveRoot(repo.vcs, agentPath)).toBe(agentPath);
  });

  it("follows a marker that only carries root_workspace", async () => {
    await writeFile(markerPath(agentPath), JSON.stringify({ root_workspace: repo.root }), "utf8");
    expect(await resolveRoot(repo.vcs, agentPath)).toBe(repo.root);
  });

  it("ignores a marker whose root_workspace is empty", async () => {
    await writeFile(markerPath(agentPath), JSON.stringify({ root_workspace: "", name: "alpha" }), "utf8");
    expect(await resolveRoot(repo.vcs, agentPath)).toBe(agentPath);
  });

  it("follows only one level of indirection", async () => {
    const nested = siblingPath(repo.root, "nested");
    await repo.vcs.workspaceAdd(nested, { cwd: repo.root });
    // marker 指向另一个 agent 工作区时不再继续跟
    await writeAgentMarker(nested, { rootPath: agentPath, name: "nested", agent: "codex" });
    expect(await resolveRoot(repo.vcs, nested)).toBe(agentPath);
  });

  it("propagates not-a-repository", async () => {
    const outside = path.join(repo.parent, "elsewhere");
    await mkdir(outside);
    await expect(resolveRoot(repo.vcs, outside)).rejects.toBeInstanceOf(NotARepositoryError);
  });

  it("ensureRootWorkspace rejects agent workspaces", async () => {
    await expect(ensureRootWorkspace(repo.root)).resolves.toBeUndefined();
    await expect(ensureRootWorkspace(agentPath)).rejects.toBeInstanceOf(NotRootWorkspaceError);
  });
});
