import path from "node:path";

import { suggestAgentNames } from "../utils/suggest.js";
import type { Vcs } from "../vcs/types.js";
import type { WorkspaceRecord } from "../vcs/workspaceList.js";
import { readAgentMarker } from "./agentMarker.js";

export const DEFAULT_WORKSPACE = "default";

export type AgentWorkspaceEntry = {
  agentName: string;
  record: WorkspaceRecord;
  agentKind: string;
};

export type AgentLookupResult =
  | { found: true; agentName: string; vcsWorkspaceId: string }
  | { found: false; agentName: string; suggestions: string[] };

/**
 * 只认 `<root 目录名>-<name>` 命名且目录里有可读 marker 的工作区；
 * 同名但没有 marker 的兄弟目录不是我们创建的。
 */
export async function listAgentWorkspaces(vcs: Vcs, root: string): Promise<AgentWorkspaceEntry[]> {
  const workspaces = await vcs.workspaceList(root);
  const prefix = `${path.basename(root)}-`;
  const parent = path.dirname(root);

  const out: AgentWorkspaceEntry[] = [];
  for (const ws of workspaces) {
    if (ws.name === DEFAULT_WORKSPACE) continue;
    if (!ws.name.startsWith(prefix)) continue;
    const agentName = ws.name.slice(prefix.length);
    if (!agentName) continue;

    const marker = await readAgentMarker(path.join(parent, ws.name));
    if (!marker) continue;
    out.push({ agentName, record: ws, agentKind: marker.agent });
  }
  return out;
}

export async function lookupAgentWorkspace(vcs: Vcs, root: string, name: string): Promise<AgentLookupResult> {
  const entries = await listAgentWorkspaces(vcs, root);
  const hit = entries.find((e) => e.agentName === name);
  if (hit) return { found: true, agentName: name, vcsWorkspaceId: hit.record.name };

  const known = entries.map((e) => e.agentName).sort();
  return { found: false, agentName: name, suggestions: suggestAgentNames(name, known) };
}
