import type { WorkspaceRecord } from "./workspaceList.js";

export type WorkspaceAddOpts = {
  cwd: string;
  revision?: string;
};

/**
 * jj 的最小操作面。所有调用都显式带 cwd，不依赖进程当前目录。
 */
export interface Vcs {
  workspaceRoot(cwd: string): Promise<string>;
  workspaceAdd(path: string, opts: WorkspaceAddOpts): Promise<void>;
  /** 只从 jj 注销，不删除目录。 */
  workspaceForget(workspaceId: string, cwd: string): Promise<void>;
  workspaceList(cwd: string): Promise<WorkspaceRecord[]>;
  status(cwd: string): Promise<string>;
  setRepoConfig(key: string, value: string, cwd: string): Promise<void>;
  newRevision(revision: string, cwd: string): Promise<void>;
}
