import { logger } from "../logger.js";

function logErr(kind: string, err: unknown): void {
  if (err instanceof Error) {
    logger.error(`${kind}: ${err.message}`, { kind, stack: err.stack });
  } else {
    logger.error(`${kind}: ${String(err)}`, { kind, err });
  }
}

export function installGlobalErrorHandlers(): void {
  process.on("uncaughtException", (err: Error) => {
    logErr("uncaughtException", err);
    process.exitCode = 1;
  });

  process.on("unhandledRejection", (reason: unknown) => {
    logErr("unhandledRejection", reason);
    process.exitCode = 1;
  });

  process.on("warning", (w: Error) => {
    logger.warn(`Process warning: ${w.name}: ${w.message}`, { stack: w.stack });
  });
}
