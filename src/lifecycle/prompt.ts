import readline from "node:readline";

export type KeepAnswer = "affirmative" | "negative" | "aborted";

export const KEEP_PROMPT = "\nKeep workspace for inspection? [y/N] ";

export function parseKeepAnswer(raw: string): KeepAnswer {
  const answer = String(raw ?? "").trim().toLowerCase();
  return answer === "y" || answer === "yes" ? "affirmative" : "negative";
}

/**
 * EOF 和 Ctrl-C 都返回 "aborted"，调用方按“不保留”处理。
 */
export function askKeepWorkspace(
  io: { input: NodeJS.ReadableStream; output: NodeJS.WritableStream } = {
    input: process.stdin,
    output: process.stdout,
  },
): Promise<KeepAnswer> {
  const rl = readline.createInterface({ input: io.input, output: io.output });

  return new Promise<KeepAnswer>((resolve) => {
    let settled = false;
    const finish = (answer: KeepAnswer) => {
      if (settled) return;
      settled = true;
      rl.close();
      resolve(answer);
    };

    rl.on("SIGINT", () => finish("aborted"));
    rl.on("close", () => finish("aborted"));
    rl.question(KEEP_PROMPT, (answer) => finish(parseKeepAnswer(answer)));
  });
}
