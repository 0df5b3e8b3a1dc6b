import path from "node:path";

import { InvalidAgentNameError } from "../errors.js";

export const AGENT_MARKER_FILE = path.join(".jj", "jjcage-agent.json");
export const SHIM_DIR = path.join(".jj", ".jjcage-bin");
export const SENTINEL_DIR = ".git";

export type AgentWorkspacePaths = {
  rootPath: string;
  name: string;
  path: string;
  vcsWorkspaceId: string;
};

export function validateAgentName(name: string): string {
  const raw = String(name ?? "");
  if (!raw.trim()) throw new InvalidAgentNameError("agent name must not be empty");
  if (raw !== raw.trim()) {
    throw new InvalidAgentNameError(`agent name '${raw}' must not have leading or trailing whitespace`);
  }
  if (raw.includes("/") || raw.includes("\\")) {
    throw new InvalidAgentNameError(`agent name '${raw}' must not contain a path separator`);
  }
  if (raw === "." || raw === "..") {
    throw new InvalidAgentNameError(`agent name '${raw}' is not allowed`);
  }
  return raw;
}

export function vcsWorkspaceId(rootPath: string, agentName: string): string {
  return `${path.basename(rootPath)}-${agentName}`;
}

/** <parent>/<root 目录名>-<agentName> */
export function siblingPath(rootPath: string, agentName: string): string {
  return path.join(path.dirname(rootPath), vcsWorkspaceId(rootPath, agentName));
}

export function agentWorkspacePaths(rootPath: string, agentName: string): AgentWorkspacePaths {
  return {
    rootPath,
    name: agentName,
    path: siblingPath(rootPath, agentName),
    vcsWorkspaceId: vcsWorkspaceId(rootPath, agentName),
  };
}

export function markerPath(workspacePath: string): string {
  return path.join(workspacePath, AGENT_MARKER_FILE);
}

export function shimDir(workspacePath: string): string {
  return path.join(workspacePath, SHIM_DIR);
}

export function sentinelDir(workspacePath: string): string {
  return path.join(workspacePath, SENTINEL_DIR);
}
