// apps/publisher/src/markers.ts
//
// scan-build embeds the bug fields of each report as single-line HTML comments:
//   <!-- BUGTYPE Memory leak -->
// Only these four markers are recognised; the rest of the document is ignored.

import type { MarkerName } from "shared-types";

export type MarkerMatch = { found: true; value: string } | { found: false };

export const BUG_MARKERS: readonly MarkerName[] = ["BUGTYPE", "BUGDESC", "BUGFILE", "BUGCATEGORY"];

// No `s` flag: `.` stops at a newline, so a marker never spans lines.
const MARKER_PATTERNS: Readonly<Record<MarkerName, RegExp>> = {
  BUGTYPE: /<!--\sBUGTYPE\s(.*)\s-->/,
  BUGDESC: /<!--\sBUGDESC\s(.*)\s-->/,
  BUGFILE: /<!--\sBUGFILE\s(.*)\s-->/,
  BUGCATEGORY: /<!--\sBUGCATEGORY\s(.*)\s-->/,
};

/** First occurrence of `marker` in the document, trimmed. */
export function extractMarker(contents: string, marker: MarkerName): MarkerMatch {
  const m = MARKER_PATTERNS[marker].exec(contents);
  if (!m) return { found: false };
  return { found: true, value: (m[1] ?? "").trim() };
}

export function extractMarkers(contents: string): Record<MarkerName, MarkerMatch> {
  return {
    BUGTYPE: extractMarker(contents, "BUGTYPE"),
    BUGDESC: extractMarker(contents, "BUGDESC"),
    BUGFILE: extractMarker(contents, "BUGFILE"),
    BUGCATEGORY: extractMarker(contents, "BUGCATEGORY"),
  };
}
