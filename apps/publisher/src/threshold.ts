// apps/publisher/src/threshold.ts
import type { ThresholdVerdict } from "shared-types";

/** Exceeded only when enabled and strictly above the threshold. */
export function evaluateThreshold(params: { bugCount: number; enabled: boolean; threshold: number }): ThresholdVerdict {
  const { bugCount, enabled, threshold } = params;
  return { bugCount, threshold, enabled, exceeded: enabled && bugCount > threshold };
}
