import fs from "fs";
import path from "path";

export type LogLevel = "INFO" | "WARN" | "OK" | "ERROR";

export type Logger = {
  info(msg: string): void;
  warn(msg: string): void;
  ok(msg: string): void;
  error(msg: string): void;
  child(tag: string): Logger;
};

export type LogSink = (line: string, level: LogLevel) => void;

export function consoleSink(logFile?: string): LogSink {
  if (logFile) fs.mkdirSync(path.dirname(logFile), { recursive: true });
  return (line, level) => {
    if (level === "ERROR") console.error(line);
    else console.log(line);
    // Also append to a log file for unattended runs
    if (logFile) fs.appendFileSync(logFile, line + "\n", "utf8");
  };
}

export function createLogger(sink: LogSink, tag?: string, clock: () => Date = () => new Date()): Logger {
  const emit = (level: LogLevel, msg: string) => {
    const prefix = tag ? `[${tag}] ` : "";
    sink(`[${clock().toISOString()}] [${level}] ${prefix}${msg}`, level);
  };
  return {
    info: (msg) => emit("INFO", msg),
    warn: (msg) => emit("WARN", msg),
    ok: (msg) => emit("OK", msg),
    error: (msg) => emit("ERROR", msg),
    child: (child) => createLogger(sink, tag ? `${tag} ${child}` : child, clock)
  };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return `Error: ${String(err)}`;
}
