import * as fs from "node:fs";
import * as path from "node:path";
import { Layer, Logger, LogLevel } from "effect";

export interface LoggerOptions {
  logFile: string;
  /** Enables debug level and mirrors every line to stderr */
  debug: boolean;
}

/**
 * Render a log message; Effect passes several arguments as an array
 */
export function formatLogMessage(message: unknown): string {
  const parts = Array.isArray(message) ? message : [message];
  return parts
    .map((part) => {
      if (typeof part === "string") return part;
      if (part instanceof Error) return part.stack ?? part.message;
      try {
        return JSON.stringify(part);
      } catch {
        return String(part);
      }
    })
    .join(" ");
}

/**
 * Create a logger layer that appends to the log file and, in debug mode,
 * mirrors to stderr. Stdout carries the bridge protocol and is never written.
 */
export const createLoggerLayer = (options: LoggerOptions): Layer.Layer<never> => {
  let fileWritable = true;
  try {
    fs.mkdirSync(path.dirname(options.logFile), { recursive: true });
  } catch (error) {
    fileWritable = false;
    process.stderr.write(
      `[Logger] Cannot create log directory for ${options.logFile}: ${formatLogMessage(error)}\n`,
    );
  }

  const bridgeLogger = Logger.make(({ logLevel, message, date }) => {
    const line = `[${date.toISOString()}] [${logLevel.label}] ${formatLogMessage(message)}\n`;

    if (fileWritable) {
      try {
        fs.appendFileSync(options.logFile, line);
      } catch (error) {
        fileWritable = false;
        process.stderr.write(
          `[Logger] Disabled file logging: ${formatLogMessage(error)}\n`,
        );
      }
    }
    if (options.debug) {
      process.stderr.write(line);
    }
  });

  return Layer.merge(
    Logger.replace(Logger.defaultLogger, bridgeLogger),
    Logger.minimumLogLevel(options.debug ? LogLevel.Debug : LogLevel.Info),
  );
};
