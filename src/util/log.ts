/**
 * Simple file-based logging for debugging.
 *
 * Set ROOM_LIST_LOG_FILE to a path to enable it; without it every call is a no-op.
 */
import { Cause, Exit } from "effect";
import * as fs from "fs";

const LOG_FILE = process.env.ROOM_LIST_LOG_FILE;

if (LOG_FILE) {
  try {
    fs.writeFileSync(
      LOG_FILE,
      `=== Room List Log Started ${new Date().toISOString()} ===\n`,
    );
  } catch {
    // unwritable log file: every later line is dropped as well
  }
}

const write = (line: string) => {
  if (!LOG_FILE) return;
  try {
    fs.appendFileSync(LOG_FILE, line);
  } catch {
    // drop the line
  }
};

const formatData = (data: unknown) =>
  data !== undefined ? ` | ${JSON.stringify(data)}` : "";

export function log(category: string, message: string, data?: unknown) {
  const timestamp = new Date().toISOString();
  write(`[${timestamp}] [${category}] ${message}${formatData(data)}\n`);
}

export function logWarning(category: string, message: string, data?: unknown) {
  const timestamp = new Date().toISOString();
  write(`[${timestamp}] [${category}] WARNING: ${message}${formatData(data)}\n`);
}

const hasTag = (
  error: unknown,
): error is { _tag: string; message?: unknown; cause?: unknown } =>
  error !== null &&
  typeof error === "object" &&
  "_tag" in error &&
  typeof error._tag === "string";

/**
 * Format an error for logging, handling Effect errors properly.
 */
export function formatError(error: unknown): string {
  if (Cause.isCause(error)) {
    return Cause.pretty(error);
  }

  if (Exit.isExit(error) && Exit.isFailure(error)) {
    return Cause.pretty(error.cause);
  }

  // Tagged errors (Data.TaggedError and friends)
  if (hasTag(error)) {
    const parts: string[] = [`[${error._tag}]`];

    if (typeof error.message === "string" && error.message) {
      parts.push(error.message);
    }

    if (error.cause !== undefined) {
      parts.push(`\nCaused by: ${formatError(error.cause)}`);
    }

    return parts.join(" ");
  }

  if (error instanceof Error) {
    return `${error.message}\n${error.stack}`;
  }

  if (error !== null && typeof error === "object") {
    try {
      return JSON.stringify(error, null, 2);
    } catch {
      return String(error);
    }
  }

  return String(error);
}

export function logError(category: string, message: string, error: unknown) {
  const timestamp = new Date().toISOString();
  write(
    `[${timestamp}] [${category}] ERROR: ${message} | ${formatError(error)}\n`,
  );
}
