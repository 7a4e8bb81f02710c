// apps/publisher/src/pathNormalizer.test.ts
import { describe, expect, it } from "vitest";
import { relativizeSourcePath } from "./pathNormalizer";

describe("relativizeSourcePath", () => {
  it("strips the workspace root", () => {
    expect(relativizeSourcePath("/ws/src/foo.c", "/ws")).toBe("/src/foo.c");
  });

  it("cuts at the last occurrence of the root", () => {
    expect(relativizeSourcePath("/ws/build/ws/src/a.c", "/ws")).toBe("/src/a.c");
  });

  it("keeps the remainder as-is when the root has a trailing slash", () => {
    expect(relativizeSourcePath("/ws/src/foo.c", "/ws/")).toBe("src/foo.c");
  });

  it("returns paths outside the workspace unchanged", () => {
    expect(relativizeSourcePath("/usr/include/stdio.h", "/ws")).toBe("/usr/include/stdio.h");
  });

  it("does not fold case", () => {
    expect(relativizeSourcePath("/WS/src/foo.c", "/ws")).toBe("/WS/src/foo.c");
  });

  it("returns the path unchanged for an empty root", () => {
    expect(relativizeSourcePath("/ws/src/foo.c", "")).toBe("/ws/src/foo.c");
  });
});
