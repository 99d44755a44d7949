import { getErrorDetails } from "./errorTypes.js";
import { appendFileSync, mkdirSync, existsSync } from "fs";
import { join } from "path";
import { logBuffer, type LogEntry, type LogLevel } from "../services/LogBuffer.js";

export type { LogLevel };

interface LogContext {
  [key: string]: unknown;
}

let logDirectory: string | null = null;

/** Directory for orchestrator.log when ORCHESTRATOR_LOG_DIR is not set. */
export function initializeLogger(directory: string): void {
  logDirectory = directory;
}

function getLogDirectory(): string {
  if (process.env.ORCHESTRATOR_LOG_DIR) {
    return process.env.ORCHESTRATOR_LOG_DIR;
  }

  if (logDirectory) {
    return logDirectory;
  }

  return join(process.cwd(), "logs");
}

function getLogFilePath(): string {
  return join(getLogDirectory(), "orchestrator.log");
}

const SENSITIVE_KEYS = new Set([
  "token",
  "password",
  "apikey",
  "api_key",
  "secret",
  "accesstoken",
  "refreshtoken",
  "connectionstring",
]);

const IS_DEBUG_BOOT = Boolean(process.env.ORCHESTRATOR_DEBUG);
const IS_TEST = process.env.NODE_ENV === "test";

let fileLoggingEnabled = !IS_TEST && process.env.ORCHESTRATOR_DISABLE_FILE_LOGGING !== "1";
let verboseLogging = IS_DEBUG_BOOT;

export function setVerboseLogging(enabled: boolean): void {
  verboseLogging = enabled;
}

export function isVerboseLogging(): boolean {
  return verboseLogging;
}

function getCallerSource(): string | undefined {
  const stack = new Error().stack?.split("\n");
  if (!stack || stack.length < 5) return undefined;

  const callerLine = stack[4];
  if (!callerLine) return undefined;

  const match = callerLine.match(/\(([^)]+)\)/) || callerLine.match(/at\s+(.+)$/);
  const fullPath = match?.[1];
  if (!fullPath) return undefined;

  const pathParts = fullPath.split(/[/\\]/);
  const fileName = pathParts[pathParts.length - 1]?.split(":")[0];

  return fileName?.replace(/\.[tj]s$/, "");
}

function safeStringify(value: unknown): string {
  const seen = new WeakSet<object>();
  try {
    return JSON.stringify(
      value,
      (key, val: unknown) => {
        if (SENSITIVE_KEYS.has(key.toLowerCase())) return "[redacted]";

        if (typeof val === "bigint") return val.toString();

        if (val && typeof val === "object") {
          if (seen.has(val)) return "[Circular]";
          seen.add(val);
        }

        return val;
      },
      2
    );
  } catch (error) {
    return `[Unable to stringify: ${String(error)}]`;
  }
}

function writeToLogFile(level: LogLevel, message: string, context?: LogContext): void {
  if (!fileLoggingEnabled) return;
  if (level === "debug" && !isVerboseLogging()) return;

  try {
    const logDir = getLogDirectory();
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }

    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : "";
    const logLine = `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}\n`;

    appendFileSync(getLogFilePath(), logLine, "utf8");
  } catch (error) {
    // Stop retrying on every call once the log file is unwritable.
    fileLoggingEnabled = false;
    console.error(`[ERROR] Disabling file logging: ${String(error)}`);
  }
}

function redactSensitiveData(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      result[key] = "[redacted]";
    } else {
      result[key] = redactValue(value);
    }
  }
  return result;
}

function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (isPlainRecord(value)) {
    return redactSensitiveData(value);
  }
  return value;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function log(level: LogLevel, message: string, context?: LogContext): LogEntry {
  // Only capture source in verbose mode or for errors/warnings
  const source =
    isVerboseLogging() || level === "warn" || level === "error" ? getCallerSource() : undefined;

  const safeContext = context ? redactSensitiveData(context) : undefined;

  const entry = logBuffer.push({
    timestamp: Date.now(),
    level,
    message,
    context: safeContext,
    source,
  });

  writeToLogFile(level, message, safeContext);

  return entry;
}

export function logDebug(message: string, context?: LogContext): void {
  log("debug", message, context);
  if (isVerboseLogging() && !IS_TEST) {
    console.log(`[DEBUG] ${message}`, context ? safeStringify(context) : "");
  }
}

export function logInfo(message: string, context?: LogContext): void {
  log("info", message, context);
  if (isVerboseLogging() && !IS_TEST) {
    console.log(`[INFO] ${message}`, context ? safeStringify(context) : "");
  }
}

export function logWarn(message: string, context?: LogContext): void {
  log("warn", message, context);
  if (isVerboseLogging() && !IS_TEST) {
    console.warn(`[WARN] ${message}`, context ? safeStringify(context) : "");
  }
}

export function logError(message: string, error?: unknown, context?: LogContext): void {
  const errorDetails = error ? getErrorDetails(error) : undefined;
  const fullContext = { ...context, error: errorDetails };
  log("error", message, fullContext);

  if (IS_TEST) return;

  console.error(
    `[ERROR] ${message}`,
    errorDetails ? safeStringify(errorDetails) : "",
    context ? safeStringify(context) : ""
  );
}
