import { chmod, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { wrapFsError } from "../errors.js";
import { sentinelDir, shimDir } from "./workspacePath.js";

export const SHIM_NAME = "git";
export const SHIM_MESSAGE = "git disabled for agents; use jj";

export const SHIM_SCRIPT = ["#!/bin/sh", `echo "${SHIM_MESSAGE}" >&2`, "exit 1", ""].join("\n");

/**
 * 空的 .git 目录：让 agent 认为这里已经有 VCS，不会自己去 git init，
 * 同时把它的项目根限定在这个工作区。
 */
export async function createSentinelDir(workspacePath: string): Promise<string> {
  const dir = sentinelDir(workspacePath);
  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw wrapFsError(`failed to create ${dir}`, err);
  }
  return dir;
}

export async function installVcsShim(workspacePath: string): Promise<string> {
  const dir = shimDir(workspacePath);
  const script = path.join(dir, SHIM_NAME);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(script, SHIM_SCRIPT, "utf8");
    await chmod(script, 0o755);
  } catch (err) {
    throw wrapFsError(`failed to create git shim ${script}`, err);
  }
  return dir;
}

export function buildAgentEnv(
  shimPath: string,
  baseEnv: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...baseEnv };
  const current = env.PATH ?? "";
  env.PATH = current ? `${shimPath}${path.delimiter}${current}` : shimPath;
  return env;
}
