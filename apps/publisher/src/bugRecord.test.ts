// apps/publisher/src/bugRecord.test.ts
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import path from "node:path";
import os from "node:os";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { buildBugRecord, readBugRecord } from "./bugRecord";
import { memoryLog } from "./log";

function report(markers: Record<string, string>): string {
  const lines = Object.entries(markers).map(([k, v]) => `<!-- ${k} ${v} -->`);
  return ["<html><head>", ...lines, "</head><body>...</body></html>"].join("\n");
}

describe("buildBugRecord", () => {
  it("builds a record and shortens the source path", () => {
    const res = buildBugRecord({
      reportFileName: "report-1a2b3c.html",
      contents: report({ BUGTYPE: "leak", BUGDESC: "leak in foo", BUGFILE: "/ws/src/foo.c" }),
      workspaceRoot: "/ws",
    });
    expect(res.bug).toEqual({
      reportFileName: "report-1a2b3c.html",
      bugType: "leak",
      bugDescription: "leak in foo",
      sourceFile: "/src/foo.c",
    });
    expect("isNew" in res.bug).toBe(false);
    expect(res.missingMarkers).toEqual(["BUGCATEGORY"]);
    expect(res.bug.readError).toBeUndefined();
  });

  it("keeps the source path when it lies outside the workspace", () => {
    const res = buildBugRecord({
      reportFileName: "report-x.html",
      contents: report({ BUGFILE: "/opt/vendor/lib.c", BUGCATEGORY: "Logic error" }),
      workspaceRoot: "/ws",
    });
    expect(res.bug).toEqual({ reportFileName: "report-x.html", sourceFile: "/opt/vendor/lib.c", bugCategory: "Logic error" });
  });

  it("yields a name-only record when no markers are present", () => {
    const res = buildBugRecord({ reportFileName: "report-empty.html", contents: "<html></html>", workspaceRoot: "/ws" });
    expect(res.bug).toEqual({ reportFileName: "report-empty.html" });
    expect(res.missingMarkers).toEqual(["BUGTYPE", "BUGDESC", "BUGFILE", "BUGCATEGORY"]);
  });
});

describe("readBugRecord", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "bug-record-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a report from disk", async () => {
    const file = path.join(dir, "report-42.html");
    await writeFile(file, report({ BUGTYPE: "Dead assignment", BUGCATEGORY: "Dead store" }), "utf-8");
    const log = memoryLog();
    const res = await readBugRecord({ reportPath: file, workspaceRoot: dir, log });
    expect(res.bug).toEqual({ reportFileName: "report-42.html", bugType: "Dead assignment", bugCategory: "Dead store" });
    expect(log.lines).toEqual([]);
  });

  it("logs and returns a partial record when the file cannot be read", async () => {
    const file = path.join(dir, "report-gone.html");
    const log = memoryLog();
    const res = await readBugRecord({ reportPath: file, workspaceRoot: dir, log });
    expect(res.bug).toEqual({ reportFileName: "report-gone.html", readError: expect.stringContaining("ENOENT") });
    expect(res.missingMarkers).toEqual(["BUGTYPE", "BUGDESC", "BUGFILE", "BUGCATEGORY"]);
    expect(log.lines).toHaveLength(1);
    expect(log.lines[0]?.level).toBe("warn");
    expect(log.lines[0]?.message.startsWith(`Unable to read file or locate scan-build markers in content: ${file}`)).toBe(true);
  });
});
