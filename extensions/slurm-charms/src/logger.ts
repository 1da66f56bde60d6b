import pino from "pino";

export type Logger = pino.Logger;

const BASE_LEVEL = process.env.LOG_LEVEL ?? "info";
const IS_TEST = process.env.NODE_ENV === "test" || Boolean(process.env.VITEST);

export function createLogger(name: string): Logger {
  return pino({
    name,
    level: IS_TEST ? "silent" : BASE_LEVEL,
  });
}
