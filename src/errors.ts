export type JjcageErrorCode =
  | "NOT_A_REPOSITORY"
  | "WORKSPACE_EXISTS"
  | "WORKSPACE_NOT_FOUND"
  | "COMMAND_FAILED"
  | "PERMISSION_DENIED"
  | "IO_ERROR"
  | "INVALID_AGENT_NAME"
  | "NOT_ROOT_WORKSPACE"
  | "CONFIG_INVALID";

export class JjcageError extends Error {
  constructor(
    message: string,
    public readonly code: JjcageErrorCode,
    public readonly details?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotARepositoryError extends JjcageError {
  constructor(stderr: string) {
    super("not in a jj repository", "NOT_A_REPOSITORY", stderr);
  }
}

export class WorkspaceAlreadyExistsError extends JjcageError {
  constructor(stderr: string) {
    super("workspace already exists", "WORKSPACE_EXISTS", stderr);
  }
}

export class WorkspaceNotFoundError extends JjcageError {
  constructor(stderr: string) {
    super("no such workspace", "WORKSPACE_NOT_FOUND", stderr);
  }
}

export class VcsCommandError extends JjcageError {
  constructor(
    public readonly command: string,
    public readonly stderr: string,
    public readonly exitCode: number,
  ) {
    super(`jj ${command}: ${stderr}`, "COMMAND_FAILED", stderr);
  }
}

export class WorkspacePermissionError extends JjcageError {
  constructor(message: string, details?: string) {
    super(message, "PERMISSION_DENIED", details);
  }
}

export class WorkspaceIOError extends JjcageError {
  constructor(message: string, details?: string) {
    super(message, "IO_ERROR", details);
  }
}

export class InvalidAgentNameError extends JjcageError {
  constructor(message: string) {
    super(message, "INVALID_AGENT_NAME");
  }
}

export class NotRootWorkspaceError extends JjcageError {
  constructor(message = "look must be run from the root workspace") {
    super(message, "NOT_ROOT_WORKSPACE");
  }
}

export class ConfigError extends JjcageError {
  constructor(message: string) {
    super(message, "CONFIG_INVALID");
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function errnoCode(err: unknown): string | null {
  if (!err || typeof err !== "object" || !("code" in err)) return null;
  return typeof err.code === "string" ? err.code : null;
}

/**
 * 把 node:fs 抛出的错误归类：EACCES/EPERM/EROFS 视为权限问题，其余都是 IO 错误。
 */
export function wrapFsError(action: string, err: unknown): JjcageError {
  if (err instanceof JjcageError) return err;
  const code = errnoCode(err);
  const message = `${action}: ${errorMessage(err)}`;
  if (code === "EACCES" || code === "EPERM" || code === "EROFS") {
    return new WorkspacePermissionError(message, code);
  }
  return new WorkspaceIOError(message, code ?? undefined);
}
