// apps/publisher/src/bugDiff.ts
//
// Marks bugs of the current run that the previous run did not report.

import type { BugRecord, BugSummary } from "shared-types";

/** Decides whether two bugs from different runs are the same finding. */
export type BugEquality = (a: BugRecord, b: BugRecord) => boolean;

/**
 * Default identity: bugType, bugDescription, bugCategory and sourceFile must all
 * be equal, an absent field matching only an absent field. reportFileName is
 * regenerated by every scan-build run and never takes part; neither does isNew.
 * A bug whose report could not be read carries no identity and matches nothing.
 * Swap this out (see BugEquality) for looser matching of moved bugs.
 */
export const sameBug: BugEquality = (a, b) =>
  a.readError === undefined &&
  b.readError === undefined &&
  a.bugType === b.bugType &&
  a.bugDescription === b.bugDescription &&
  a.bugCategory === b.bugCategory &&
  a.sourceFile === b.sourceFile;

export function summaryContains(summary: BugSummary, bug: BugRecord, equals: BugEquality = sameBug): boolean {
  return summary.bugs.some((b) => equals(b, bug));
}

/**
 * Returns copies of `current` with isNew set. Without a previous summary there is
 * no history to compare against, so isNew stays unset rather than true.
 */
export function markNewBugs(
  current: readonly BugRecord[],
  previous: BugSummary | null,
  equals: BugEquality = sameBug
): BugRecord[] {
  if (!previous) return current.map((b) => ({ ...b }));
  return current.map((b) => ({ ...b, isNew: !summaryContains(previous, b, equals) }));
}

export type BugSetDiff = {
  bugs: BugRecord[];
  newBugs: BugRecord[];
  /** Bugs of the previous run with no equal bug in the current run. */
  resolvedBugs: BugRecord[];
};

export function diffBugSets(
  current: readonly BugRecord[],
  previous: BugSummary | null,
  equals: BugEquality = sameBug
): BugSetDiff {
  const bugs = markNewBugs(current, previous, equals);
  const newBugs = bugs.filter((b) => b.isNew === true);
  const resolvedBugs = previous ? previous.bugs.filter((p) => !current.some((c) => equals(p, c))) : [];
  return { bugs, newBugs, resolvedBugs };
}
