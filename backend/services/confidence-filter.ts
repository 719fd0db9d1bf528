// backend/services/confidence-filter.ts
import type { RawDetection } from "./ocr-types";

/**
 * Join the text of every detection scoring strictly above `minConfidence`,
 * in the order the engine reported them. Returns "" when nothing passes;
 * whether that is fatal is the caller's decision.
 */
export function filterDetections(detections: readonly RawDetection[], minConfidence: number): string {
  if (!(minConfidence >= 0 && minConfidence <= 1)) {
    throw new RangeError(`minConfidence must be within [0, 1], got ${minConfidence}`);
  }

  const lines: string[] = [];
  for (const d of detections) {
    if (d.confidence > minConfidence) lines.push(d.text);
  }
  return lines.join("\n").trim();
}

export interface DetectionSummary {
  total: number;
  kept: number;
  dropped: number;
  meanConfidence: number | null;
}

export function summarizeDetections(detections: readonly RawDetection[], minConfidence: number): DetectionSummary {
  const kept = detections.filter((d) => d.confidence > minConfidence).length;
  const sum = detections.reduce((acc, d) => acc + d.confidence, 0);
  return {
    total: detections.length,
    kept,
    dropped: detections.length - kept,
    meanConfidence: detections.length ? Math.round((sum / detections.length) * 1000) / 1000 : null,
  };
}
