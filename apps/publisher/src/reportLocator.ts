// apps/publisher/src/reportLocator.ts
//
// Finds scan-build output. scan-build never writes into the configured folder
// directly: each invocation creates a uniquely named sub-folder (a timestamp)
// holding index.html and one report-<hash>.html per bug.

import path from "node:path";
import { readdir } from "node:fs/promises";
import type { Dirent } from "node:fs";
import { copyDirRecursive, ensureDir, errorMessage } from "./fsUtils";
import type { PublishLog } from "./log";

const BUG_REPORT_NAME = /^report-[^/\\]*\.html$/;

export function isBugReportName(name: string): boolean {
  return BUG_REPORT_NAME.test(name);
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Every report-*.html below `rootDir`, depth first with entries in name order.
 * Rejects when `rootDir` itself cannot be read; unreadable sub-directories are skipped.
 */
export async function locateBugReports(rootDir: string): Promise<string[]> {
  const entries = await readdir(rootDir, { withFileTypes: true });
  return collectReports(rootDir, entries);
}

async function collectReports(dir: string, entries: Dirent[]): Promise<string[]> {
  const out: string[] = [];
  for (const entry of [...entries].sort(byName)) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      let children: Dirent[];
      try {
        children = await readdir(fullPath, { withFileTypes: true });
      } catch {
        continue;
      }
      out.push(...(await collectReports(fullPath, children)));
    } else if (entry.isFile() && isBugReportName(entry.name)) {
      out.push(fullPath);
    }
  }
  return out;
}

/**
 * The sub-folder scan-build created inside `workspaceOutputDir`, or null when
 * there is none. With several sub-folders the first in name order is taken;
 * older scans left in the workspace are not told apart from the latest one.
 */
export async function locateScannerOutputFolder(workspaceOutputDir: string): Promise<string | null> {
  let entries: Dirent[];
  try {
    entries = await readdir(workspaceOutputDir, { withFileTypes: true });
  } catch {
    return null;
  }
  const first = entries.filter((e) => e.isDirectory()).sort(byName)[0];
  return first ? path.join(workspaceOutputDir, first.name) : null;
}

export async function ensureWorkspaceOutputFolder(workspaceDir: string, outputFolder: string): Promise<string> {
  const dir = path.resolve(workspaceDir, outputFolder);
  await ensureDir(dir);
  return dir;
}

export type ArchiveOutcome = "copied" | "no_output_folder" | "copy_failed";

/**
 * Copies the scan-build sub-folder into the run's archive so later runs read
 * stable paths. Never rejects: a failed copy only means fewer reports are found.
 */
export async function archiveScannerOutput(params: {
  workspaceOutputDir: string;
  archiveDir: string;
  log: PublishLog;
}): Promise<ArchiveOutcome> {
  const { workspaceOutputDir, archiveDir, log } = params;
  const scanFolder = await locateScannerOutputFolder(workspaceOutputDir);
  if (!scanFolder) {
    log.warn(`Could not locate a unique scan-build output folder in: ${workspaceOutputDir}`);
    return "no_output_folder";
  }
  try {
    await copyDirRecursive(scanFolder, archiveDir);
    return "copied";
  } catch (err) {
    log.fatal(`Unable to copy scan-build output to build archive folder. (${errorMessage(err)})`);
    return "copy_failed";
  }
}
