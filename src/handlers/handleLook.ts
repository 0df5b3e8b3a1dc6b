import type { CliContext } from "../context.js";
import { NotARepositoryError, NotRootWorkspaceError, errorMessage } from "../errors.js";
import { lookupAgentWorkspace, type AgentLookupResult } from "../workspace/listing.js";
import { ensureRootWorkspace } from "../workspace/rootResolution.js";

/**
 * 在根工作区基于某个 agent 工作区的最新修订新建一个修订（`jj new "<id>"@`）。
 * 必须在根工作区执行，这里刻意不跟随 marker。
 */
export async function handleLook(ctx: CliContext, currentDir: string, agentName: string): Promise<number> {
  let root: string;
  try {
    root = await ctx.vcs.workspaceRoot(currentDir);
    await ensureRootWorkspace(root);
  } catch (err) {
    if (err instanceof NotARepositoryError) {
      ctx.printError("Error: not in a jj repository");
      return 1;
    }
    if (err instanceof NotRootWorkspaceError) {
      ctx.printError(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  let lookup: AgentLookupResult;
  try {
    lookup = await lookupAgentWorkspace(ctx.vcs, root, agentName);
  } catch (err) {
    ctx.printError(`Error listing workspaces: ${errorMessage(err)}`);
    return 1;
  }

  if (!lookup.found) {
    ctx.printError(`Error: agent workspace '${agentName}' not found`);
    if (lookup.suggestions.length) ctx.printError(`Did you mean: ${lookup.suggestions.join(", ")}`);
    return 1;
  }

  try {
    await ctx.vcs.newRevision(`"${lookup.vcsWorkspaceId}"@`, root);
  } catch (err) {
    ctx.printError(`Error creating new revision: ${errorMessage(err)}`);
    return 1;
  }

  ctx.print(`Created new revision from '${agentName}'`);
  return 0;
}
