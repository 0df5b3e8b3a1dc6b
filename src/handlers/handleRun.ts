import type { CliContext } from "../context.js";
import { InvalidAgentNameError } from "../errors.js";
import { launchAgent } from "../lifecycle/agentProcess.js";
import { askKeepWorkspace } from "../lifecycle/prompt.js";
import { runAgentWorkspace, type LifecycleIO } from "../lifecycle/runAgentWorkspace.js";
import { validateAgentName } from "../workspace/workspacePath.js";

export const defaultLifecycleIO: LifecycleIO = {
  launchAgent,
  askKeep: () => askKeepWorkspace(),
};

export async function handleRun(
  ctx: CliContext,
  opts: { currentDir: string; name: string; agentKind: string },
  io: LifecycleIO = defaultLifecycleIO,
): Promise<number> {
  let name: string;
  try {
    name = validateAgentName(opts.name);
  } catch (err) {
    if (err instanceof InvalidAgentNameError) {
      ctx.printError(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const agent = ctx.cfg.agents[opts.agentKind];
  if (!agent) {
    const known = Object.keys(ctx.cfg.agents).sort().join(", ");
    ctx.printError(`Error: unknown agent '${opts.agentKind}' (available: ${known})`);
    return 1;
  }

  const outcome = await runAgentWorkspace(ctx, { name, agent, currentDir: opts.currentDir }, io);
  return outcome.status === "failed" ? 1 : 0;
}
