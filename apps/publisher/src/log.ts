// apps/publisher/src/log.ts
//
// The engine writes only through PublishLog, the orchestrator's build log.

import { appendFile } from "node:fs/promises";

export type PublishLog = {
  info: (message: string) => void;
  warn: (message: string) => void;
  /** Failure of one step that must not abort the run. */
  fatal: (message: string) => void;
};

export type LogLevel = "info" | "warn" | "fatal";
export type LogLine = { level: LogLevel; message: string };

const PREFIX = "[scan-build]";

export const consoleLog: PublishLog = {
  info: (message) => console.log(`${PREFIX} ${message}`),
  warn: (message) => console.warn(`${PREFIX} WARNING: ${message}`),
  fatal: (message) => console.error(`${PREFIX} ERROR: ${message}`),
};

/** Collects lines in memory; `lines` is appended to in call order. */
export function memoryLog(): PublishLog & { lines: LogLine[] } {
  const lines: LogLine[] = [];
  return {
    lines,
    info: (message) => lines.push({ level: "info", message }),
    warn: (message) => lines.push({ level: "warn", message }),
    fatal: (message) => lines.push({ level: "fatal", message }),
  };
}

/** Appends one JSON line to the file named by AUDIT_LOG_PATH, when set. */
export async function appendAuditLog(
  entry: Record<string, unknown>,
  auditLogPath: string | undefined = process.env.AUDIT_LOG_PATH
): Promise<void> {
  if (!auditLogPath) return;
  const line = JSON.stringify({ ts: Date.now(), ...entry }) + "\n";
  try {
    await appendFile(auditLogPath, line, "utf-8");
  } catch (err) {
    console.warn(`${PREFIX} WARNING: audit log not written: ${err instanceof Error ? err.message : String(err)}`);
  }
}
