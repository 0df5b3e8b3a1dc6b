export function pickArg(args: string[], ...names: string[]): string | null {
  for (const name of names) {
    const idx = args.indexOf(name);
    if (idx !== -1 && args[idx + 1]) return args[idx + 1];
    for (const a of args) {
      if (a.startsWith(`${name}=`)) return a.slice(name.length + 1);
    }
  }
  return null;
}

export function hasFlag(args: string[], ...names: string[]): boolean {
  return names.some((name) => args.includes(name));
}

/**
 * 去掉带值的选项（`--agent codex` / `--agent=codex`）后剩下的位置参数。
 */
export function positionalArgs(args: string[], valueOptions: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (valueOptions.includes(a)) {
      i += 1;
      continue;
    }
    if (a.startsWith("-")) continue;
    out.push(a);
  }
  return out;
}
