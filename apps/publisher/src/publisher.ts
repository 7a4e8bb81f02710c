// apps/publisher/src/publisher.ts
//
// One publish step: archive the scan-build output of this run, turn every
// report into a BugRecord, diff against the previous run, persist the summary
// and evaluate the bug threshold. The orchestrator owns the run status; this
// module only hands back the verdict.

import path from "node:path";
import type { BugRecord, BugSummary, PreviousRunAccessor, PublishResult, PublisherConfig } from "shared-types";
import { readBugRecord } from "./bugRecord";
import { diffBugSets, sameBug, type BugEquality } from "./bugDiff";
import { appendAuditLog, consoleLog, type PublishLog } from "./log";
import { archiveScannerOutput, ensureWorkspaceOutputFolder, locateBugReports } from "./reportLocator";
import { createBugSummary, writeBugSummary } from "./summaryStore";
import { evaluateThreshold } from "./threshold";
import { errorMessage } from "./fsUtils";

export type PublishParams = {
  config: PublisherConfig;
  runId: number;
  /** Live workspace; also the root that source paths are shortened against. */
  workspaceDir: string;
  /** This run's archive folder. */
  artifactsDir: string;
  previousRun: PreviousRunAccessor;
  log?: PublishLog;
  equals?: BugEquality;
  now?: number;
};

export async function publishScanResults(params: PublishParams): Promise<PublishResult> {
  const { config, runId, workspaceDir, artifactsDir, previousRun } = params;
  const log = params.log ?? consoleLog;
  const equals = params.equals ?? sameBug;

  log.info("Publishing scan-build results");

  const workspaceOutputDir = path.resolve(workspaceDir, config.scanBuildOutputFolder);
  const archiveDir = path.resolve(artifactsDir, config.scanBuildOutputFolder);

  try {
    await ensureWorkspaceOutputFolder(workspaceDir, config.scanBuildOutputFolder);
  } catch (err) {
    log.warn(`Unable to create scan-build output folder ${workspaceOutputDir}: ${errorMessage(err)}`);
  }

  const archived = await archiveScannerOutput({ workspaceOutputDir, archiveDir, log });

  let reports: string[] = [];
  try {
    reports = await locateBugReports(archiveDir);
  } catch (err) {
    log.warn(`No scan-build reports found in ${archiveDir}: ${errorMessage(err)}`);
  }

  let previousSummary: BugSummary | null = null;
  try {
    const previous = await previousRun(runId);
    previousSummary = previous ? await previous.loadBugSummary() : null;
  } catch (err) {
    log.warn(`Unable to load the previous bug summary: ${errorMessage(err)}`);
  }

  const found: BugRecord[] = [];
  let unreadable = 0;
  for (const reportPath of reports) {
    const { bug, missingMarkers } = await readBugRecord({ reportPath, workspaceRoot: workspaceDir, log });
    if (bug.readError !== undefined) {
      unreadable += 1;
    } else if (missingMarkers.length > 0) {
      log.info(`${bug.reportFileName}: no ${missingMarkers.join(", ")} marker`);
    }
    found.push(bug);
  }

  const diff = diffBugSets(found, previousSummary, equals);
  const summary = createBugSummary(runId, diff.bugs, params.now);
  const summaryPath = await writeBugSummary(archiveDir, summary);

  const verdict = evaluateThreshold({
    bugCount: summary.bugCount,
    enabled: config.markBuildUnstableWhenThresholdIsExceeded,
    threshold: config.bugThreshold,
  });

  log.info(
    `scan-build bugs: ${summary.bugCount}` +
      (previousSummary ? ` (new: ${diff.newBugs.length}, fixed: ${diff.resolvedBugs.length}, since run ${previousSummary.runId})` : "")
  );
  if (verdict.exceeded) {
    log.info("scan-build threshold exceeded.");
  }

  await appendAuditLog({
    component: "publisher",
    event: "publish",
    run_id: runId,
    archive: archived,
    reports: reports.length,
    unreadable_reports: unreadable,
    bug_count: summary.bugCount,
    new_bug_count: diff.newBugs.length,
    threshold_exceeded: verdict.exceeded,
  });

  const result: PublishResult = {
    summary,
    verdict,
    summaryPath,
    newBugCount: diff.newBugs.length,
    resolvedBugs: diff.resolvedBugs,
  };
  if (previousSummary) result.previousRunId = previousSummary.runId;
  return result;
}
