// apps/publisher/src/runHistory.ts
//
// File-based PreviousRunAccessor for an archive laid out as
//   <artifactsRoot>/<runId>/<outputFolder>/bugSummary.json

import path from "node:path";
import { readdir } from "node:fs/promises";
import type { Dirent } from "node:fs";
import type { PreviousRun, PreviousRunAccessor } from "shared-types";
import { BUG_SUMMARY_FILE, loadBugSummary } from "./summaryStore";
import type { PublishLog } from "./log";

export function runArtifactsDir(artifactsRoot: string, runId: number): string {
  return path.join(artifactsRoot, String(runId));
}

/** Numbered run directories below `artifactsRoot`, ascending. */
export async function listRunIds(artifactsRoot: string): Promise<number[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(artifactsRoot, { withFileTypes: true });
  } catch {
    return [];
  }
  return entries
    .filter((e) => e.isDirectory() && /^\d+$/.test(e.name))
    .map((e) => Number.parseInt(e.name, 10))
    .sort((a, b) => a - b);
}

/**
 * Only the run right before `runId` is consulted. If that run left no valid
 * summary (it failed early, or never ran the publisher) the result is null;
 * older runs are not searched.
 */
export function createRunDirectoryHistory(params: {
  artifactsRoot: string;
  outputFolder: string;
  log: PublishLog;
}): PreviousRunAccessor {
  const { artifactsRoot, outputFolder, log } = params;
  return async (runId: number): Promise<PreviousRun | null> => {
    const earlier = (await listRunIds(artifactsRoot)).filter((id) => id < runId);
    const previousId = earlier[earlier.length - 1];
    if (previousId === undefined) return null;

    const file = path.join(runArtifactsDir(artifactsRoot, previousId), outputFolder, BUG_SUMMARY_FILE);
    const summary = await loadBugSummary(file, log);
    if (!summary) return null;

    return {
      runId: previousId,
      bugCount: summary.bugCount,
      loadBugSummary: async () => summary,
    };
  };
}
