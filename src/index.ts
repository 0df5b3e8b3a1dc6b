#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { errorMessage } from "./errors.js";
import { runCli } from "./runCli.js";

// src/ 和 dist/ 都在包根目录下一层
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "..", "package.json");

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch {
    // 版本号读不到不影响使用
  }
  return "unknown";
}

runCli({ version: readVersion() })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
