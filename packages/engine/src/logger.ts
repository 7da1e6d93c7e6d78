/**
 * Logger factory
 */

import pino, { type Logger } from "pino";

/**
 * Library default: components log nothing unless handed a logger
 */
export const silentLogger: Logger = pino({ enabled: false });

export function createLogger(options: { level?: string; pretty?: boolean } = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  // Logs go to stderr; stdout carries capsule output
  if (options.pretty === false) return pino({ level }, pino.destination(2));
  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
        destination: 2,
      },
    },
  });
}
