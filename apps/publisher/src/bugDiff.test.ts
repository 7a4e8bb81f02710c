// apps/publisher/src/bugDiff.test.ts
import { describe, expect, it } from "vitest";
import type { BugRecord } from "shared-types";
import { diffBugSets, markNewBugs, sameBug, summaryContains, type BugEquality } from "./bugDiff";
import { createBugSummary } from "./summaryStore";

const leak: BugRecord = {
  reportFileName: "report-aaa.html",
  bugType: "leak",
  bugDescription: "leak in foo",
  bugCategory: "Memory error",
  sourceFile: "/src/foo.c",
};

const deadStore: BugRecord = {
  reportFileName: "report-bbb.html",
  bugType: "Dead assignment",
  bugDescription: "Value stored to 'x' is never read",
  bugCategory: "Dead store",
  sourceFile: "/src/bar.c",
};

describe("sameBug", () => {
  it("ignores the report file name", () => {
    expect(sameBug(leak, { ...leak, reportFileName: "report-zzz.html" })).toBe(true);
  });

  it("ignores isNew", () => {
    expect(sameBug(leak, { ...leak, isNew: true })).toBe(true);
  });

  it("differs when any identity field differs", () => {
    expect(sameBug(leak, { ...leak, bugDescription: "leak in bar" })).toBe(false);
    expect(sameBug(leak, { ...leak, sourceFile: "/src/other.c" })).toBe(false);
  });

  it("treats an absent field as different from a present one", () => {
    const { bugCategory: _omit, ...noCategory } = leak;
    expect(sameBug(leak, noCategory)).toBe(false);
    expect(sameBug(noCategory, { ...noCategory, reportFileName: "report-ccc.html" })).toBe(true);
  });

  it("never matches a bug whose report could not be read", () => {
    const unreadable: BugRecord = { reportFileName: "report-ddd.html", readError: "EACCES: permission denied" };
    expect(sameBug(unreadable, { ...unreadable })).toBe(false);
    expect(sameBug(unreadable, { reportFileName: "report-ddd.html" })).toBe(false);
    expect(markNewBugs([unreadable], createBugSummary(1, [unreadable], 1000))[0]?.isNew).toBe(true);
  });
});

describe("markNewBugs", () => {
  const previous = createBugSummary(1, [leak], 1000);

  it("leaves isNew unset without a previous summary", () => {
    const out = markNewBugs([leak, deadStore], null);
    expect(out.map((b) => b.isNew)).toEqual([undefined, undefined]);
    expect(out.some((b) => "isNew" in b)).toBe(false);
  });

  it("marks a bug seen in the previous run as not new", () => {
    const out = markNewBugs([{ ...leak, reportFileName: "report-new-name.html" }], previous);
    expect(out[0]?.isNew).toBe(false);
  });

  it("marks a bug absent from the previous run as new", () => {
    const out = markNewBugs([{ ...leak, bugDescription: "leak in bar" }], previous);
    expect(out[0]?.isNew).toBe(true);
  });

  it("marks every bug new against an empty previous summary", () => {
    const out = markNewBugs([leak], createBugSummary(1, [], 1000));
    expect(out[0]?.isNew).toBe(true);
  });

  it("does not modify its input", () => {
    const input = [{ ...deadStore }];
    markNewBugs(input, previous);
    expect(input[0]).toEqual(deadStore);
  });

  it("accepts a custom equality", () => {
    const byType: BugEquality = (a, b) => a.bugType === b.bugType;
    const moved = { ...leak, sourceFile: "/src/moved.c" };
    expect(markNewBugs([moved], previous)[0]?.isNew).toBe(true);
    expect(markNewBugs([moved], previous, byType)[0]?.isNew).toBe(false);
    expect(summaryContains(previous, moved, byType)).toBe(true);
  });
});

describe("diffBugSets", () => {
  it("splits new and resolved bugs", () => {
    const previous = createBugSummary(4, [leak, deadStore], 1000);
    const fresh: BugRecord = { reportFileName: "report-ccc.html", bugType: "Null dereference", sourceFile: "/src/baz.c" };
    const diff = diffBugSets([{ ...leak, reportFileName: "report-ddd.html" }, fresh], previous);
    expect(diff.bugs.map((b) => b.isNew)).toEqual([false, true]);
    expect(diff.newBugs).toEqual([{ ...fresh, isNew: true }]);
    expect(diff.resolvedBugs).toEqual([deadStore]);
  });

  it("reports nothing resolved without history", () => {
    const diff = diffBugSets([leak], null);
    expect(diff.newBugs).toEqual([]);
    expect(diff.resolvedBugs).toEqual([]);
  });
});
