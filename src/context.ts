import type { LoadedConfig } from "./config.js";
import type { Vcs } from "./vcs/types.js";

export type Logger = (msg: string, extra?: Record<string, unknown>) => void;
export type PrintFn = (line: string) => void;

export type CliContext = {
  cfg: LoadedConfig;
  vcs: Vcs;
  log: Logger;
  // 清理失败等需要提醒但不中断流程的情况
  warn: Logger;
  print: PrintFn;
  printError: PrintFn;
};
