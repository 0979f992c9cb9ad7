// Keypoint Displacement - Threshold Segmenter
//
// Finds windows of delta rows over which the reference keypoint's cumulative
// displacement, on either axis, exceeds a threshold.

import { InvalidParameterError, InvalidTableError } from "./errors.js";
import type { SegmentRange, SegmentationPolicy } from "./types.js";

/** Windows span fewer than this many delta rows unless configured otherwise. */
export const DEFAULT_MAX_WINDOW_LENGTH = 30;

export interface ThresholdSegmenterOptions {
  maxWindowLength?: number;
  segmentationPolicy?: SegmentationPolicy;
}

export function assertValidThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0) {
    throw new InvalidParameterError(
      `Threshold must be a finite, non-negative number (got ${threshold})`,
    );
  }
}

export function assertValidWindowLength(maxWindowLength: number): void {
  if (!Number.isInteger(maxWindowLength) || maxWindowLength < 1) {
    throw new InvalidParameterError(
      `maxWindowLength must be a positive integer (got ${maxWindowLength})`,
    );
  }
}

// ─── Threshold Segmenter ────────────────────────────────────────────────────────

export class ThresholdSegmenter {
  private maxWindowLength: number;
  private policy: SegmentationPolicy;

  constructor(options: ThresholdSegmenterOptions = {}) {
    const maxWindowLength = options.maxWindowLength ?? DEFAULT_MAX_WINDOW_LENGTH;
    assertValidWindowLength(maxWindowLength);
    this.maxWindowLength = maxWindowLength;
    this.policy = options.segmentationPolicy ?? "every-window";
  }

  /**
   * Scan every start index i and every window length j in
   * [0, maxWindowLength); emit (i, i + j) when the sum of either reference
   * series over [i, i + j) exceeds `threshold`. Windows running past the end
   * of the series are not considered, so every `end` (and the "start-end"
   * label built from it) is clipped to the series length.
   *
   * Ordered by start, then by length. Under "every-window" a start index may
   * yield several ranges and ranges may overlap; under "first-window" only the
   * shortest qualifying window per start is kept.
   */
  findRanges(
    refX: ArrayLike<number>,
    refY: ArrayLike<number>,
    threshold: number,
  ): SegmentRange[] {
    if (refX.length !== refY.length) {
      throw new InvalidTableError(
        `Reference series lengths differ (${refX.length} vs ${refY.length})`,
      );
    }
    assertValidThreshold(threshold);

    const n = refX.length;
    const ranges: SegmentRange[] = [];

    for (let i = 0; i < n; i++) {
      // Running sums over [i, i + j), extended by one row per step of j.
      let sumX = 0;
      let sumY = 0;
      const longest = Math.min(this.maxWindowLength - 1, n - i);

      for (let j = 0; j <= longest; j++) {
        if (j > 0) {
          sumX += refX[i + j - 1];
          sumY += refY[i + j - 1];
        }
        if (sumX > threshold || sumY > threshold) {
          ranges.push({ start: i, end: i + j });
          if (this.policy === "first-window") break;
        }
      }
    }

    return ranges;
  }
}

export function findRanges(
  refX: ArrayLike<number>,
  refY: ArrayLike<number>,
  threshold: number,
  options?: ThresholdSegmenterOptions,
): SegmentRange[] {
  return new ThresholdSegmenter(options).findRanges(refX, refY, threshold);
}
