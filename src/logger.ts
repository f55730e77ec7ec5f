import path from "node:path";
import { createLogger, format, transports, type Logger } from "winston";
import { config } from "./config.js";

const isProd = config.NODE_ENV === "production";
const isTest = config.NODE_ENV === "test";
const level = config.LOG_LEVEL ?? (isProd ? "info" : "debug");

const base = format.combine(
  format.timestamp(),
  format.errors({ stack: true }),
  format.splat()
);

// Pretty for dev, JSON for prod
const devFmt = format.combine(
  format.colorize({ all: true }),
  format.printf((info) => {
    const { timestamp, level, message, stack, ...meta } = info;
    const metaStr = Object.keys(meta).length
      ? `\n${JSON.stringify(meta, null, 2)}`
      : "";
    return `${String(timestamp)} ${level} ${String(message)}${
      stack ? `\n${String(stack)}` : ""
    }${metaStr}`;
  })
);

const prodFmt = format.json();

const logFile = (name: string): string => path.join(config.LOG_DIR, name);

// stdout belongs to the painted answer sheet; console logging goes to stderr.
const consoleTransport = new transports.Console({
  stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
});

export const logger: Logger = createLogger({
  level,
  silent: isTest,
  format: isProd ? format.combine(base, prodFmt) : format.combine(base, devFmt),
  transports: isTest
    ? [consoleTransport]
    : [
        consoleTransport,
        new transports.File({ filename: logFile("app.log"), level: "info" }),
        new transports.File({ filename: logFile("error.log"), level: "error" }),
      ],
  exceptionHandlers: isTest
    ? undefined
    : [new transports.File({ filename: logFile("exceptions.log") })],
  rejectionHandlers: isTest
    ? undefined
    : [new transports.File({ filename: logFile("rejections.log") })],
});
