// packages/shared-types/src/index.ts
//
// Contract types shared between the publisher engine and its orchestrators.
// NO runtime logic, only types.

/* ------------------------------------------------------------------ */
/*  Primitives                                                         */
/* ------------------------------------------------------------------ */

export type SummaryVersion = "v1";

export type MarkerName = "BUGTYPE" | "BUGDESC" | "BUGFILE" | "BUGCATEGORY";

/* ------------------------------------------------------------------ */
/*  Bugs                                                               */
/* ------------------------------------------------------------------ */

/** One scan-build finding, parsed from a single `report-*.html` file. */
export type BugRecord = {
    /** Basename of the report file. Run-scoped: never part of bug identity. */
    reportFileName: string;
    bugType?: string;
    bugDescription?: string;
    bugCategory?: string;
    /** Source path, relative to the workspace root when it could be shortened. */
    sourceFile?: string;
    /** Only set when a previous summary was available to compare against. */
    isNew?: boolean;
    /** Set when the report could not be read; such a bug never matches another. */
    readError?: string;
};

/** Every bug found by one run, in report discovery order. */
export type BugSummary = {
    summaryVersion: SummaryVersion;
    runId: number;
    generatedAt: number;
    bugCount: number;
    bugs: BugRecord[];
};

/* ------------------------------------------------------------------ */
/*  Threshold                                                          */
/* ------------------------------------------------------------------ */

export type ThresholdVerdict = {
    bugCount: number;
    threshold: number;
    enabled: boolean;
    exceeded: boolean;
};

/* ------------------------------------------------------------------ */
/*  Configuration                                                      */
/* ------------------------------------------------------------------ */

export type PublisherConfig = {
    /** Folder scan-build writes into, relative to the workspace. */
    scanBuildOutputFolder: string;
    markBuildUnstableWhenThresholdIsExceeded: boolean;
    bugThreshold: number;
};

/* ------------------------------------------------------------------ */
/*  Run history (supplied by the orchestrator)                         */
/* ------------------------------------------------------------------ */

/** Handle on an earlier run that recorded a bug summary. */
export type PreviousRun = {
    runId: number;
    bugCount: number;
    loadBugSummary: () => Promise<BugSummary | null>;
};

/**
 * Looks up the run immediately before `runId`. Resolves to null when there is
 * none, or when that run never recorded a summary.
 */
export type PreviousRunAccessor = (runId: number) => Promise<PreviousRun | null>;

/* ------------------------------------------------------------------ */
/*  Result handed back to the orchestrator                             */
/* ------------------------------------------------------------------ */

export type PublishResult = {
    summary: BugSummary;
    verdict: ThresholdVerdict;
    summaryPath: string;
    newBugCount: number;
    resolvedBugs: BugRecord[];
    previousRunId?: number;
};
