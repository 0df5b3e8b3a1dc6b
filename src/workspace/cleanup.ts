import { rm, unlink } from "node:fs/promises";

import type { Logger } from "../context.js";
import { WorkspaceNotFoundError, errorMessage } from "../errors.js";
import { pathExists } from "../utils/fs.js";
import type { Vcs } from "../vcs/types.js";
import { markerPath, sentinelDir, type AgentWorkspacePaths } from "./workspacePath.js";

export type SetupArtifact = "registration" | "sentinel" | "marker" | "shim";

export const ALL_ARTIFACTS: ReadonlySet<SetupArtifact> = new Set<SetupArtifact>([
  "registration",
  "sentinel",
  "marker",
  "shim",
]);

export type CleanupReport = {
  warnings: string[];
};

/**
 * 按固定顺序清理一个 agent 工作区；每一步互不依赖，失败只记 warning，永不抛出。
 * 重复调用是安全的：文件类产物都先检查是否存在。
 *
 * `artifacts` 只决定是否需要 `jj workspace forget`；目录本身总会尝试删除。
 */
export async function cleanupWorkspace(
  deps: { vcs: Vcs; warn: Logger; log?: Logger },
  target: AgentWorkspacePaths,
  artifacts: ReadonlySet<SetupArtifact> = ALL_ARTIFACTS,
): Promise<CleanupReport> {
  const warnings: string[] = [];
  const report = (msg: string, err: unknown) => {
    const text = `${msg}: ${errorMessage(err)}`;
    warnings.push(text);
    deps.warn(msg, { workspace: target.vcsWorkspaceId, err: errorMessage(err) });
  };

  // 先删 .git：jj 在看到“外来 VCS”时行为会不同，先移除再 forget 更干净
  const sentinel = sentinelDir(target.path);
  try {
    if (await pathExists(sentinel)) await rm(sentinel, { recursive: true, force: true });
  } catch (err) {
    report("failed to remove .git directory", err);
  }

  const marker = markerPath(target.path);
  try {
    if (await pathExists(marker)) await unlink(marker);
  } catch (err) {
    report("failed to remove agent marker", err);
  }

  if (artifacts.has("registration")) {
    try {
      await deps.vcs.workspaceForget(target.vcsWorkspaceId, target.rootPath);
    } catch (err) {
      // 已经被 forget 过（重复清理）不算失败
      if (err instanceof WorkspaceNotFoundError) {
        deps.log?.("workspace already forgotten", { workspace: target.vcsWorkspaceId });
      } else {
        report("failed to forget workspace", err);
      }
    }
  }

  try {
    await rm(target.path, { recursive: true, force: true });
  } catch (err) {
    report("failed to remove workspace directory", err);
  }

  deps.log?.("workspace cleanup finished", {
    workspace: target.vcsWorkspaceId,
    warnings: warnings.length,
  });
  return { warnings };
}
