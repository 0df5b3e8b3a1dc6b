import { unlink, writeFile } from "node:fs/promises";
import path from "node:path";

import { WorkspacePermissionError, errorMessage } from "../errors.js";

export const WRITE_PROBE_FILE = ".jjcage-write-test";

/**
 * 兄弟工作区要建在 root 的父目录里；在做任何有副作用的操作前先确认可写。
 */
export async function checkParentWritable(rootPath: string): Promise<void> {
  const parent = path.dirname(rootPath);
  const probe = path.join(parent, WRITE_PROBE_FILE);
  try {
    await writeFile(probe, "test", "utf8");
    await unlink(probe);
  } catch (err) {
    throw new WorkspacePermissionError(`parent directory ${parent} is not writable: ${errorMessage(err)}`);
  }
}
