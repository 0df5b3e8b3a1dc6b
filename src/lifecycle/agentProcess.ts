import { spawn } from "node:child_process";

import type { Logger } from "../context.js";
import { errorMessage } from "../errors.js";

export type AgentExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
  // 进程没能启动（比如可执行文件不存在）
  error?: string;
};

export type LaunchAgentOpts = {
  command: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
  log?: Logger;
};

export type AgentLauncher = (opts: LaunchAgentOpts) => Promise<AgentExit>;

/**
 * 前台运行 agent：终端直接交给子进程，阻塞到它退出。
 * 运行期间忽略本进程的 SIGINT，Ctrl-C 由 agent 自己处理。
 */
export const launchAgent: AgentLauncher = async (opts) => {
  if (!opts.command.length) throw new Error("agent command is empty");
  const [cmd, ...args] = opts.command;

  opts.log?.("spawn agent", { cmd, args, cwd: opts.cwd });

  const ignoreSigint = () => {};
  process.on("SIGINT", ignoreSigint);
  try {
    return await new Promise<AgentExit>((resolve) => {
      const proc = spawn(cmd, args, {
        cwd: opts.cwd,
        env: opts.env,
        stdio: "inherit",
      });
      proc.once("error", (err) => {
        opts.log?.("agent spawn error", { err: errorMessage(err) });
        resolve({ code: null, signal: null, error: errorMessage(err) });
      });
      proc.once("exit", (code, signal) => {
        resolve({ code, signal });
      });
    });
  } finally {
    process.off("SIGINT", ignoreSigint);
  }
};
