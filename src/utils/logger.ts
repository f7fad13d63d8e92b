/**
 * Logger
 *
 * Daily log files with size-based rotation, mirrored to the console.
 * File output starts once configureLogger() is given a directory.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";

const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB
const MAX_LOG_FILES = 7; // Keep 7 days of logs
const LOG_PREFIX = "pptmp4-";

const LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
const logLevelSchema = z.enum(LEVELS);

export type LogLevel = z.infer<typeof logLevelSchema>;

interface LoggerOptions {
  directory?: string | null;
  level?: LogLevel;
  console?: boolean;
}

function levelFromEnv(): LogLevel {
  const parsed = logLevelSchema.safeParse(process.env.PPTMP4_LOG_LEVEL?.toLowerCase());
  return parsed.success ? parsed.data : "info";
}

let logDir: string | null = null;
let minLevel: LogLevel = levelFromEnv();
let mirrorToConsole = true;

/**
 * Get log file path for today
 */
function getLogFilePath(): string | null {
  if (!logDir) return null;
  const today = new Date().toISOString().split("T")[0];
  return path.join(logDir, `${LOG_PREFIX}${today}.log`);
}

function listLogFiles(): Array<{ name: string; path: string; size: number; mtime: Date }> {
  if (!logDir) return [];
  const dir = logDir;
  return fs
    .readdirSync(dir)
    .filter((f) => f.startsWith(LOG_PREFIX) && f.endsWith(".log"))
    .map((f) => {
      const filePath = path.join(dir, f);
      const stats = fs.statSync(filePath);
      return { name: f, path: filePath, size: stats.size, mtime: stats.mtime };
    })
    .sort((a, b) => b.mtime.getTime() - a.mtime.getTime());
}

/**
 * Clean up old log files
 */
function cleanupOldLogs(): void {
  try {
    for (const file of listLogFiles().slice(MAX_LOG_FILES)) {
      fs.unlinkSync(file.path);
    }
  } catch (error) {
    console.error("Failed to clean up old logs:", error);
  }
}

/**
 * Rotate log file if it's too large
 */
function rotateLogIfNeeded(logFile: string): void {
  if (fs.existsSync(logFile) && fs.statSync(logFile).size > MAX_LOG_SIZE) {
    fs.renameSync(logFile, logFile.replace(".log", `-${Date.now()}.log`));
  }
}

function isEnabled(level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(minLevel) && minLevel !== "silent";
}

/**
 * Write log entry to file
 */
function writeLog(level: Exclude<LogLevel, "silent">, message: string, data?: unknown): void {
  if (!isEnabled(level)) return;

  const tag = level.toUpperCase();
  const timestamp = new Date().toISOString();
  const logFile = getLogFilePath();

  if (logFile) {
    const logLine = `[${timestamp}] [${tag}] ${message}${
      data !== undefined ? `\n${JSON.stringify(data, null, 2)}` : ""
    }\n`;
    try {
      rotateLogIfNeeded(logFile);
      fs.appendFileSync(logFile, logLine, "utf8");
    } catch (error) {
      console.error("Failed to write log:", error);
    }
  }

  if (!mirrorToConsole) return;
  const extra = data ?? "";
  if (level === "error") {
    console.error(`[${tag}] ${message}`, extra);
  } else if (level === "warn") {
    console.warn(`[${tag}] ${message}`, extra);
  } else {
    console.log(`[${tag}] ${message}`, extra);
  }
}

/**
 * Point the logger at a directory and adjust its output
 */
export function configureLogger(options: LoggerOptions): void {
  if (options.level) minLevel = options.level;
  if (options.console !== undefined) mirrorToConsole = options.console;
  if (options.directory === undefined) return;

  logDir = options.directory;
  if (!logDir) return;
  try {
    fs.mkdirSync(logDir, { recursive: true });
    cleanupOldLogs();
  } catch (error) {
    console.error("Failed to create log directory:", error);
    logDir = null;
  }
}

/**
 * Logger utility
 */
export const logger = {
  info: (message: string, data?: unknown) => writeLog("info", message, data),
  warn: (message: string, data?: unknown) => writeLog("warn", message, data),
  error: (message: string, data?: unknown) => writeLog("error", message, data),
  debug: (message: string, data?: unknown) => writeLog("debug", message, data),

  getLogFilePath: (): string | null => getLogFilePath(),
};
