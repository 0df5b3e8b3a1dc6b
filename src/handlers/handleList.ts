import type { CliContext } from "../context.js";
import { NotARepositoryError, errorMessage } from "../errors.js";
import { listAgentWorkspaces, type AgentWorkspaceEntry } from "../workspace/listing.js";
import { resolveRoot } from "../workspace/rootResolution.js";

export async function handleList(ctx: CliContext, currentDir: string): Promise<number> {
  let root: string;
  try {
    root = await resolveRoot(ctx.vcs, currentDir);
  } catch (err) {
    if (err instanceof NotARepositoryError) {
      ctx.printError("Error: not in a jj repository");
      return 1;
    }
    throw err;
  }

  let entries: AgentWorkspaceEntry[];
  try {
    entries = await listAgentWorkspaces(ctx.vcs, root);
  } catch (err) {
    ctx.printError(`Error listing workspaces: ${errorMessage(err)}`);
    return 1;
  }

  if (!entries.length) {
    ctx.print("No workspaces");
    return 0;
  }
  for (const e of entries) {
    ctx.print(`${e.agentName} [${e.agentKind}]: ${e.record.changeId} ${e.record.commitId} ${e.record.summary}`);
  }
  return 0;
}
