import pino, { type Logger as PinoLogger } from "pino";

import type { Logger } from "./context.js";

export type { Logger };

export function createLogger(env: NodeJS.ProcessEnv = process.env) {
  const level = env.LOG_LEVEL?.trim() ? env.LOG_LEVEL.trim() : "warn";

  // stdout 留给 list 等命令的输出，日志一律走 stderr
  const pretty = env.LOG_PRETTY === "1" || (env.NODE_ENV !== "production" && process.stderr.isTTY);

  const transport = pretty
    ? pino.transport({
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          messageFormat: "{msg}",
        },
      })
    : pino.destination(2);

  return pino(
    {
      name: "jjcage",
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );
}

export function loggerFns(logger: PinoLogger): { log: Logger; warn: Logger } {
  const log: Logger = (msg, extra) => {
    if (extra) logger.debug(extra, msg);
    else logger.debug(msg);
  };
  const warn: Logger = (msg, extra) => {
    if (extra) logger.warn(extra, msg);
    else logger.warn(msg);
  };
  return { log, warn };
}
