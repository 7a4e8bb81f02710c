// apps/publisher/src/summaryStore.ts
//
// Reads and writes bugSummary.json, the per-run record the next run diffs against.

import path from "node:path";
import { readFile, writeFile } from "node:fs/promises";
import Ajv from "ajv";
import type { BugRecord, BugSummary } from "shared-types";
import { ensureDir, errorMessage, hasErrorCode } from "./fsUtils";
import type { PublishLog } from "./log";

export const BUG_SUMMARY_FILE = "bugSummary.json";
export const SUMMARY_VERSION = "v1";

const bugRecordSchema = {
  type: "object",
  required: ["reportFileName"],
  additionalProperties: false,
  properties: {
    reportFileName: { type: "string", minLength: 1 },
    bugType: { type: "string" },
    bugDescription: { type: "string" },
    bugCategory: { type: "string" },
    sourceFile: { type: "string" },
    isNew: { type: "boolean" },
    readError: { type: "string" },
  },
};

const bugSummarySchema = {
  type: "object",
  required: ["summaryVersion", "runId", "generatedAt", "bugCount", "bugs"],
  additionalProperties: false,
  properties: {
    summaryVersion: { const: SUMMARY_VERSION },
    runId: { type: "integer", minimum: 1 },
    generatedAt: { type: "number" },
    bugCount: { type: "integer", minimum: 0 },
    bugs: { type: "array", items: bugRecordSchema },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateBugSummary = ajv.compile<BugSummary>(bugSummarySchema);

export function createBugSummary(runId: number, bugs: BugRecord[], now: number = Date.now()): BugSummary {
  return {
    summaryVersion: SUMMARY_VERSION,
    runId,
    generatedAt: now,
    bugCount: bugs.length,
    bugs,
  };
}

export function serializeBugSummary(summary: BugSummary): string {
  return JSON.stringify(summary, null, 2) + "\n";
}

export type SummaryParseResult = { ok: true; summary: BugSummary } | { ok: false; error: string };

export function parseBugSummaryDetailed(raw: string): SummaryParseResult {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${errorMessage(err)}` };
  }
  if (!validateBugSummary(value)) {
    return { ok: false, error: ajv.errorsText(validateBugSummary.errors) };
  }
  if (value.bugCount !== value.bugs.length) {
    return { ok: false, error: `bugCount ${value.bugCount} does not match ${value.bugs.length} bugs` };
  }
  return { ok: true, summary: value };
}

/** Null for anything that is not a valid v1 summary. */
export function parseBugSummary(raw: string): BugSummary | null {
  const res = parseBugSummaryDetailed(raw);
  return res.ok ? res.summary : null;
}

/** Write failures reject. */
export async function writeBugSummary(dir: string, summary: BugSummary): Promise<string> {
  await ensureDir(dir);
  const file = path.join(dir, BUG_SUMMARY_FILE);
  await writeFile(file, serializeBugSummary(summary), "utf-8");
  return file;
}

/** A missing, unreadable or corrupt file is treated as "no summary". */
export async function loadBugSummary(file: string, log: PublishLog): Promise<BugSummary | null> {
  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (err) {
    if (!hasErrorCode(err, "ENOENT")) {
      log.warn(`Unable to read bug summary ${file}: ${errorMessage(err)}`);
    }
    return null;
  }
  const res = parseBugSummaryDetailed(raw);
  if (!res.ok) {
    log.warn(`Ignoring corrupt bug summary ${file}: ${res.error}`);
    return null;
  }
  return res.summary;
}
