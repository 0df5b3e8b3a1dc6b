import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parse as parseToml } from "@iarna/toml";
import { z } from "zod";

import { ConfigError, errorMessage } from "./errors.js";
import { pathExists } from "./utils/fs.js";

export const BUILTIN_AGENTS: Readonly<Record<string, { command: string[] }>> = {
  codex: { command: ["codex"] },
  claude: { command: ["claude"] },
};

export const DEFAULT_AGENT = "codex";

const agentSchema = z.object({
  command: z.array(z.string().min(1)).min(1),
});

const configSchema = z.object({
  jj_path: z.string().min(1).default("jj"),
  default_agent: z.string().min(1).optional(),
  agents: z.record(z.string().min(1), agentSchema).optional(),
});

export type RawConfig = z.infer<typeof configSchema>;

export type AgentDefinition = {
  kind: string;
  command: string[];
};

export type LoadedConfig = {
  jjPath: string;
  defaultAgent: string;
  agents: Record<string, AgentDefinition>;
  // 实际读取的配置文件；用内置默认值时为 null
  source: string | null;
};

export function defaultConfigPath(): string {
  const base = process.env.XDG_CONFIG_HOME?.trim() || path.join(os.homedir(), ".config");
  return path.join(base, "jjcage", "config.toml");
}

export function resolveConfig(raw: unknown, source: string | null = null): LoadedConfig {
  const parsed = configSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`invalid config ${source ?? "(defaults)"}: ${parsed.error.message}`);
  }

  const agents: Record<string, AgentDefinition> = {};
  for (const [kind, def] of Object.entries({ ...BUILTIN_AGENTS, ...parsed.data.agents })) {
    agents[kind] = { kind, command: [...def.command] };
  }

  const defaultAgent = parsed.data.default_agent?.trim() || DEFAULT_AGENT;
  if (!agents[defaultAgent]) {
    throw new ConfigError(
      `invalid config ${source ?? "(defaults)"}: default_agent "${defaultAgent}" is not a configured agent`,
    );
  }

  return {
    jjPath: parsed.data.jj_path,
    defaultAgent,
    agents,
    source,
  };
}

async function parseConfigFile(abs: string): Promise<unknown> {
  const raw = await readFile(abs, "utf8");
  try {
    return path.extname(abs).toLowerCase() === ".toml" ? parseToml(raw) : JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`invalid config ${abs}: ${errorMessage(err)}`);
  }
}

/**
 * 显式指定（--config / JJCAGE_CONFIG）的文件必须存在；
 * 默认位置的文件不存在时直接使用内置配置。
 */
export async function loadConfig(opts?: { configPath?: string | null; cwd?: string }): Promise<LoadedConfig> {
  const explicit = opts?.configPath?.trim() || process.env.JJCAGE_CONFIG?.trim() || "";
  const cwd = opts?.cwd ?? process.cwd();

  if (explicit) {
    const abs = path.isAbsolute(explicit) ? explicit : path.join(cwd, explicit);
    if (!(await pathExists(abs))) throw new ConfigError(`config file not found: ${abs}`);
    return resolveConfig(await parseConfigFile(abs), abs);
  }

  const fallback = defaultConfigPath();
  if (!(await pathExists(fallback))) return resolveConfig({}, null);
  return resolveConfig(await parseConfigFile(fallback), fallback);
}
