// apps/publisher/src/bugRecord.ts
//
// One report file -> one BugRecord. A report that cannot be read or carries no
// markers still yields a record.

import path from "node:path";
import { readFile } from "node:fs/promises";
import type { BugRecord, MarkerName } from "shared-types";
import { BUG_MARKERS, extractMarkers } from "./markers";
import { relativizeSourcePath } from "./pathNormalizer";
import type { PublishLog } from "./log";

export type BugExtraction = {
  bug: BugRecord;
  /** Markers absent from the report. Every marker is listed when the file could not be read. */
  missingMarkers: MarkerName[];
};

export function buildBugRecord(params: {
  reportFileName: string;
  contents: string;
  workspaceRoot: string;
}): BugExtraction {
  const markers = extractMarkers(params.contents);
  const bug: BugRecord = { reportFileName: params.reportFileName };

  if (markers.BUGTYPE.found) bug.bugType = markers.BUGTYPE.value;
  if (markers.BUGDESC.found) bug.bugDescription = markers.BUGDESC.value;
  if (markers.BUGCATEGORY.found) bug.bugCategory = markers.BUGCATEGORY.value;
  if (markers.BUGFILE.found) bug.sourceFile = relativizeSourcePath(markers.BUGFILE.value, params.workspaceRoot);

  const missingMarkers = BUG_MARKERS.filter((m) => !markers[m].found);
  return { bug, missingMarkers };
}

export async function readBugRecord(params: {
  reportPath: string;
  workspaceRoot: string;
  log: PublishLog;
}): Promise<BugExtraction> {
  const reportFileName = path.basename(params.reportPath);
  let contents: string;
  try {
    contents = await readFile(params.reportPath, "utf-8");
  } catch (err) {
    const readError = err instanceof Error ? err.message : String(err);
    params.log.warn(`Unable to read file or locate scan-build markers in content: ${params.reportPath} (${readError})`);
    return { bug: { reportFileName, readError }, missingMarkers: [...BUG_MARKERS] };
  }
  return buildBugRecord({ reportFileName, contents, workspaceRoot: params.workspaceRoot });
}
