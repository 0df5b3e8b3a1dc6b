import { mkdir, mkdtemp, realpath, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { FakeVcs } from "./fakeVcs.js";

export type TempRepo = {
  parent: string;
  root: string;
  vcs: FakeVcs;
  dispose: () => Promise<void>;
};

/** <tmp>/repo 作为根工作区，兄弟工作区会建在 <tmp> 下。 */
export async function createTempRepo(name = "repo"): Promise<TempRepo> {
  const parent = await realpath(await mkdtemp(path.join(os.tmpdir(), "jjcage-test-")));
  const root = path.join(parent, name);
  await mkdir(path.join(root, ".jj"), { recursive: true });
  return {
    parent,
    root,
    vcs: new FakeVcs(root),
    dispose: () => rm(parent, { recursive: true, force: true }),
  };
}
