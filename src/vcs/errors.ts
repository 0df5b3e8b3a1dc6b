import {
  NotARepositoryError,
  VcsCommandError,
  WorkspaceAlreadyExistsError,
  WorkspaceNotFoundError,
  type JjcageError,
} from "../errors.js";

export type VcsErrorKind = "not_a_repository" | "workspace_exists" | "workspace_not_found" | "command_failed";

/**
 * jj 没有结构化的错误码，只能按 stderr 文案匹配。
 * 顺序有意义；jj 改了措辞时这里要跟着改（见 errors.test.ts 里的原文）。
 */
const STDERR_PATTERNS: ReadonlyArray<readonly [pattern: string, kind: VcsErrorKind]> = [
  ["There is no jj repo in", "not_a_repository"],
  ["already exists", "workspace_exists"],
  ["No such workspace", "workspace_not_found"],
];

export function classifyVcsError(stderr: string): VcsErrorKind {
  const text = String(stderr ?? "").toLowerCase();
  for (const [pattern, kind] of STDERR_PATTERNS) {
    if (text.includes(pattern.toLowerCase())) return kind;
  }
  return "command_failed";
}

export function toVcsError(command: string, stderr: string, exitCode: number): JjcageError {
  switch (classifyVcsError(stderr)) {
    case "not_a_repository":
      return new NotARepositoryError(stderr);
    case "workspace_exists":
      return new WorkspaceAlreadyExistsError(stderr);
    case "workspace_not_found":
      return new WorkspaceNotFoundError(stderr);
    case "command_failed":
      return new VcsCommandError(command, stderr, exitCode);
  }
}
