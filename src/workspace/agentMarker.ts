import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { wrapFsError } from "../errors.js";
import { pathExists } from "../utils/fs.js";
import { markerPath } from "./workspacePath.js";

const agentMarkerSchema = z.object({
  root_workspace: z.string().min(1),
  name: z.string().min(1),
  created_at: z.string(),
  // 早期的 marker 没有 agent 字段，当时只支持 claude
  agent: z.string().min(1).default("claude"),
});

export type AgentMarker = z.infer<typeof agentMarkerSchema>;

export async function writeAgentMarker(
  workspacePath: string,
  opts: { rootPath: string; name: string; agent: string; now?: Date },
): Promise<AgentMarker> {
  const marker: AgentMarker = {
    root_workspace: opts.rootPath,
    name: opts.name,
    created_at: (opts.now ?? new Date()).toISOString(),
    agent: opts.agent,
  };

  const file = markerPath(workspacePath);
  try {
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, `${JSON.stringify(marker, null, 2)}\n`, "utf8");
  } catch (err) {
    throw wrapFsError(`failed to write agent marker ${file}`, err);
  }
  return marker;
}

const markerRootSchema = agentMarkerSchema.pick({ root_workspace: true });

async function readMarkerJson(workspacePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(markerPath(workspacePath), "utf8");
  } catch {
    return null;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/**
 * 文件不存在或内容损坏都返回 null：一个坏掉的 marker 不应该影响其它工作区的列举。
 */
export async function readAgentMarker(workspacePath: string): Promise<AgentMarker | null> {
  const parsed = agentMarkerSchema.safeParse(await readMarkerJson(workspacePath));
  return parsed.success ? parsed.data : null;
}

/** 只取 root_workspace；其它字段缺失或不合法都不影响。 */
export async function readMarkerRootWorkspace(workspacePath: string): Promise<string | null> {
  const parsed = markerRootSchema.safeParse(await readMarkerJson(workspacePath));
  return parsed.success ? parsed.data.root_workspace : null;
}

export async function hasAgentMarker(workspacePath: string): Promise<boolean> {
  return await pathExists(markerPath(workspacePath));
}
