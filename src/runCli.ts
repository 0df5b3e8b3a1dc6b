import { loadConfig } from "./config.js";
import type { CliContext, Logger, PrintFn } from "./context.js";
import { handleList } from "./handlers/handleList.js";
import { handleLook } from "./handlers/handleLook.js";
import { handleRun } from "./handlers/handleRun.js";
import type { LifecycleIO } from "./lifecycle/runAgentWorkspace.js";
import { createLogger, loggerFns } from "./logger.js";
import { hasFlag, pickArg, positionalArgs } from "./utils/args.js";
import type { Vcs } from "./vcs/types.js";
import { VcsClient } from "./vcs/vcsClient.js";

const VALUE_OPTIONS = ["--agent", "-a", "--config"];

export function usage(version: string, agents: string[], defaultAgent: string): string {
  return [
    `jjcage ${version} - Launch AI agents in isolated jj workspaces`,
    "",
    "Usage:",
    "  jjcage [--agent <kind>] <name>   create workspace <name> and run the agent in it",
    "  jjcage list                       list agent workspaces of this repository",
    "  jjcage look <name>                new revision on top of an agent workspace",
    "",
    "Options:",
    `  -a, --agent <kind>   agent to run (${agents.join(", ")}; default: ${defaultAgent})`,
    "  --config <file>      config file (default: ~/.config/jjcage/config.toml)",
    "  --version            show version and exit",
    "  -h, --help           show help and exit",
  ].join("\n");
}

export type RunCliOpts = {
  argv?: string[];
  cwd?: string;
  version: string;
  print?: PrintFn;
  printError?: PrintFn;
  // 测试用：替换 jj 客户端、agent 启动和提示
  vcs?: Vcs;
  io?: LifecycleIO;
  logger?: { log: Logger; warn: Logger };
};

export async function runCli(opts: RunCliOpts): Promise<number> {
  const argv = opts.argv ?? process.argv.slice(2);
  const cwd = opts.cwd ?? process.cwd();
  const print = opts.print ?? ((line: string) => process.stdout.write(`${line}\n`));
  const printError = opts.printError ?? ((line: string) => process.stderr.write(`${line}\n`));

  if (hasFlag(argv, "--version")) {
    print(`jjcage ${opts.version}`);
    return 0;
  }

  const cfg = await loadConfig({ configPath: pickArg(argv, "--config"), cwd });

  if (hasFlag(argv, "--help", "-h")) {
    print(usage(opts.version, Object.keys(cfg.agents).sort(), cfg.defaultAgent));
    return 0;
  }

  const { log, warn } = opts.logger ?? loggerFns(createLogger());
  const ctx: CliContext = {
    cfg,
    vcs: opts.vcs ?? new VcsClient({ jjPath: cfg.jjPath, log }),
    log,
    warn,
    print,
    printError,
  };
  log("config loaded", { source: cfg.source, jjPath: cfg.jjPath });

  const [command, arg] = positionalArgs(argv, VALUE_OPTIONS);
  if (!command) {
    printError(usage(opts.version, Object.keys(cfg.agents).sort(), cfg.defaultAgent));
    return 1;
  }

  if (command === "list") return await handleList(ctx, cwd);

  if (command === "look") {
    if (!arg) {
      printError("Error: look requires an agent name");
      return 1;
    }
    return await handleLook(ctx, cwd, arg);
  }

  const agentKind = pickArg(argv, "--agent", "-a") ?? cfg.defaultAgent;
  return await handleRun(ctx, { currentDir: cwd, name: command, agentKind }, opts.io);
}
