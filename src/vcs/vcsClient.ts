import { execFile } from "node:child_process";

import type { Logger } from "../context.js";
import { VcsCommandError } from "../errors.js";
import { toVcsError } from "./errors.js";
import type { Vcs, WorkspaceAddOpts } from "./types.js";
import { parseWorkspaceList, type WorkspaceRecord } from "./workspaceList.js";

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export class VcsClient implements Vcs {
  constructor(
    private readonly opts: {
      jjPath?: string;
      log?: Logger;
    } = {},
  ) {}

  get jjPath(): string {
    return this.opts.jjPath?.trim() || "jj";
  }

  execute(args: string[], cwd?: string): Promise<string> {
    const command = args[0] ?? "";
    this.opts.log?.("jj exec", { args, cwd });

    return new Promise<string>((resolve, reject) => {
      execFile(
        this.jjPath,
        args,
        { cwd, encoding: "utf8", maxBuffer: MAX_OUTPUT_BYTES },
        (err, stdout, stderr) => {
          if (!err) {
            resolve(String(stdout ?? ""));
            return;
          }
          const errText = String(stderr ?? "").trim();
          // 进程没能启动（ENOENT 等）时 code 是字符串，没有退出码可言
          if (typeof err.code !== "number") {
            reject(new VcsCommandError(command, errText || err.message, -1));
            return;
          }
          reject(toVcsError(command, errText, err.code));
        },
      );
    });
  }

  async workspaceRoot(cwd: string): Promise<string> {
    const out = await this.execute(["workspace", "root"], cwd);
    return out.trim();
  }

  async workspaceAdd(path: string, opts: WorkspaceAddOpts): Promise<void> {
    const args = ["workspace", "add", path];
    if (opts.revision?.trim()) args.push("-r", opts.revision.trim());
    await this.execute(args, opts.cwd);
  }

  async workspaceForget(workspaceId: string, cwd: string): Promise<void> {
    await this.execute(["workspace", "forget", workspaceId], cwd);
  }

  async workspaceList(cwd: string): Promise<WorkspaceRecord[]> {
    const out = await this.execute(["workspace", "list"], cwd);
    return parseWorkspaceList(out);
  }

  async status(cwd: string): Promise<string> {
    return await this.execute(["status"], cwd);
  }

  async setRepoConfig(key: string, value: string, cwd: string): Promise<void> {
    await this.execute(["config", "set", "--repo", key, value], cwd);
  }

  async newRevision(revision: string, cwd: string): Promise<void> {
    await this.execute(["new", revision], cwd);
  }
}
