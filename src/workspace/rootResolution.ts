import { NotRootWorkspaceError } from "../errors.js";
import type { Vcs } from "../vcs/types.js";
import { hasAgentMarker, readMarkerRootWorkspace } from "./agentMarker.js";

/**
 * 当前在 agent 工作区里时，顺着 marker 回到真正的根工作区（只跟一层）；
 * 否则就是 jj 报告的工作区根。marker 损坏时按“当前就是根”处理。
 */
export async function resolveRoot(vcs: Vcs, currentDir: string): Promise<string> {
  const currentRoot = await vcs.workspaceRoot(currentDir);
  return (await readMarkerRootWorkspace(currentRoot)) ?? currentRoot;
}

export async function ensureRootWorkspace(root: string): Promise<void> {
  if (await hasAgentMarker(root)) throw new NotRootWorkspaceError();
}
