export type WorkspaceRecord = {
  name: string;
  changeId: string;
  commitId: string;
  summary: string;
};

// default: wpxqlmox f3c3a79d (no description set)
const WORKSPACE_LINE_RE = /^(\S+): (\S+) (\S+) (.*)$/;

export function parseWorkspaceLine(line: string): WorkspaceRecord | null {
  const match = WORKSPACE_LINE_RE.exec(line);
  if (!match) return null;
  const [, name, changeId, commitId, summary] = match;
  return { name, changeId, commitId, summary };
}

export function parseWorkspaceList(output: string): WorkspaceRecord[] {
  return String(output ?? "")
    .split(/\r?\n/g)
    .filter(Boolean)
    .map(parseWorkspaceLine)
    .filter((ws): ws is WorkspaceRecord => ws !== null);
}
