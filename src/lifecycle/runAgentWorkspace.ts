import type { AgentDefinition } from "../config.js";
import type { CliContext } from "../context.js";
import {
  NotARepositoryError,
  WorkspaceAlreadyExistsError,
  errorMessage,
  wrapFsError,
  type JjcageError,
} from "../errors.js";
import { writeAgentMarker } from "../workspace/agentMarker.js";
import { cleanupWorkspace, type CleanupReport, type SetupArtifact } from "../workspace/cleanup.js";
import { buildAgentEnv, createSentinelDir, installVcsShim } from "../workspace/isolation.js";
import { resolveRoot } from "../workspace/rootResolution.js";
import { agentWorkspacePaths, shimDir, type AgentWorkspacePaths } from "../workspace/workspacePath.js";
import type { AgentExit, AgentLauncher } from "./agentProcess.js";
import { checkParentWritable } from "./preflight.js";
import type { KeepAnswer } from "./prompt.js";

export type RunStage = "resolve_root" | "preflight" | "create_workspace" | "setup";

export type RunOutcome =
  | { status: "failed"; stage: RunStage; error: JjcageError }
  | { status: "removed"; workspace: AgentWorkspacePaths; agent: AgentExit; cleanup: CleanupReport }
  | { status: "kept"; workspace: AgentWorkspacePaths; agent: AgentExit };

export type RunAgentOpts = {
  name: string;
  agent: AgentDefinition;
  currentDir: string;
};

export type LifecycleIO = {
  launchAgent: AgentLauncher;
  askKeep: () => Promise<KeepAnswer>;
  baseEnv?: NodeJS.ProcessEnv;
};

type StepOutcome = { ok: true } | { ok: false; error: JjcageError };

type SetupStep = {
  artifact: SetupArtifact;
  action: string;
  run: () => Promise<unknown>;
};

export const STALE_CONFIG_KEY = "snapshot.auto-update-stale";
export const UNCOMMITTED_MARKER = "Working copy changes:";

async function attempt(step: SetupStep): Promise<StepOutcome> {
  try {
    await step.run();
    return { ok: true };
  } catch (err) {
    return { ok: false, error: wrapFsError(step.action, err) };
  }
}

function printCleanupWarnings(ctx: Pick<CliContext, "printError">, report: CleanupReport): void {
  for (const w of report.warnings) ctx.printError(`Warning: ${w}`);
}

function displayName(kind: string): string {
  return kind ? `${kind.charAt(0).toUpperCase()}${kind.slice(1)}` : kind;
}

export async function hasUncommittedChanges(ctx: Pick<CliContext, "vcs" | "log">, workspacePath: string): Promise<boolean> {
  try {
    const out = await ctx.vcs.status(workspacePath);
    return out.includes(UNCOMMITTED_MARKER);
  } catch (err) {
    ctx.log("status check failed", { workspacePath, err: errorMessage(err) });
    return false;
  }
}

/**
 * 创建 → 隔离 → 运行 agent → 询问保留或清理。
 *
 * 一旦 `jj workspace add` 成功，之后任何一步失败都会带着“已创建的产物”调用清理，
 * 不会留下注册在 jj 里却只建了一半的工作区。
 */
export async function runAgentWorkspace(ctx: CliContext, opts: RunAgentOpts, io: LifecycleIO): Promise<RunOutcome> {
  let root: string;
  try {
    root = await resolveRoot(ctx.vcs, opts.currentDir);
  } catch (err) {
    const error = wrapFsError("failed to resolve workspace root", err);
    ctx.printError(error instanceof NotARepositoryError ? "Error: not in a jj repository" : `Error: ${error.message}`);
    return { status: "failed", stage: "resolve_root", error };
  }

  try {
    await checkParentWritable(root);
  } catch (err) {
    const error = wrapFsError("preflight failed", err);
    ctx.printError(`Error: ${error.message}`);
    return { status: "failed", stage: "preflight", error };
  }

  const workspace = agentWorkspacePaths(root, opts.name);
  ctx.log("creating agent workspace", { root, workspace: workspace.vcsWorkspaceId, path: workspace.path });

  try {
    await ctx.vcs.workspaceAdd(workspace.path, { cwd: root });
  } catch (err) {
    const error = wrapFsError("failed to create workspace", err);
    if (error instanceof WorkspaceAlreadyExistsError) {
      ctx.printError(`Error: workspace '${opts.name}' already exists`);
      ctx.printError("Use 'jjcage list' to see existing workspaces");
    } else {
      ctx.printError(`Error creating workspace: ${error.message}`);
    }
    return { status: "failed", stage: "create_workspace", error };
  }

  const created = new Set<SetupArtifact>(["registration"]);

  // 以下两步只是优化，失败不影响正确性
  await ctx.vcs.setRepoConfig(STALE_CONFIG_KEY, "true", workspace.path).catch((err: unknown) => {
    ctx.log("set auto-update-stale failed", { err: errorMessage(err) });
  });
  await ctx.vcs.status(workspace.path).catch((err: unknown) => {
    ctx.log("initial status failed", { err: errorMessage(err) });
  });

  const steps: SetupStep[] = [
    {
      artifact: "sentinel",
      action: "failed to create .git directory",
      run: () => createSentinelDir(workspace.path),
    },
    {
      artifact: "marker",
      action: "failed to write agent marker",
      run: () => writeAgentMarker(workspace.path, { rootPath: root, name: opts.name, agent: opts.agent.kind }),
    },
    {
      artifact: "shim",
      action: "failed to create git shim",
      run: () => installVcsShim(workspace.path),
    },
  ];

  for (const step of steps) {
    // 先登记：失败的步骤可能已经留下了部分文件
    created.add(step.artifact);
    const outcome = await attempt(step);
    if (!outcome.ok) {
      ctx.printError(`Error: ${outcome.error.message}`);
      printCleanupWarnings(ctx, await cleanupWorkspace(ctx, workspace, created));
      return { status: "failed", stage: "setup", error: outcome.error };
    }
  }

  const env = buildAgentEnv(shimDir(workspace.path), io.baseEnv ?? process.env);
  const agent = await io.launchAgent({
    command: opts.agent.command,
    cwd: workspace.path,
    env,
    log: ctx.log,
  });

  if (agent.error) {
    ctx.printError(`\nfailed to start ${opts.agent.kind}: ${agent.error}`);
  } else if (agent.code !== 0) {
    const how = agent.code === null ? `signal ${agent.signal ?? "unknown"}` : `code ${agent.code}`;
    ctx.printError(`\n${displayName(opts.agent.kind)} exited with ${how}`);
  }

  if (await hasUncommittedChanges(ctx, workspace.path)) {
    ctx.print("\nWarning: This workspace has uncommitted changes!");
  }

  const answer = await io.askKeep();
  if (answer === "affirmative") {
    ctx.print(`Workspace kept at: ${workspace.path}`);
    return { status: "kept", workspace, agent };
  }

  const cleanup = await cleanupWorkspace(ctx, workspace, created);
  printCleanupWarnings(ctx, cleanup);
  ctx.print(`Workspace '${opts.name}' removed`);
  return { status: "removed", workspace, agent, cleanup };
}
