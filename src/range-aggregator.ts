// Keypoint Displacement - Range Aggregator
//
// Sums every channel's deltas over each segment range and labels the rows.

import { InvalidParameterError } from "./errors.js";
import type {
  AggregationPolicy,
  ChannelRow,
  DeltaTable,
  SegmentRange,
  SummaryRow,
  SummaryTable,
} from "./types.js";

export interface RangeAggregatorOptions {
  aggregationPolicy?: AggregationPolicy;
}

export interface AggregationResult {
  summary: SummaryTable;
  /** Rows replaced by a later range with the same start. */
  overwrittenRows: number;
}

/** `"<start>-<end>"` label of a range. */
export function formatRangeLabel(range: SegmentRange): string {
  return `${range.start}-${range.end}`;
}

/** Sum of `values` over [start, end). */
export function sumRange(values: ArrayLike<number>, start: number, end: number): number {
  let total = 0;
  for (let i = start; i < end; i++) {
    total += values[i];
  }
  return total;
}

// ─── Range Aggregator ───────────────────────────────────────────────────────────

export class RangeAggregator {
  private policy: AggregationPolicy;

  constructor(options: RangeAggregatorOptions = {}) {
    this.policy = options.aggregationPolicy ?? "last-wins";
  }

  /**
   * Build one summary row per range, in range order.
   *
   * Under "last-wins" rows are keyed by start index: a later range with an
   * already-seen start replaces that row's label and sums, and the row keeps
   * the position where its start index first appeared. Under "per-range"
   * every range gets its own row.
   */
  aggregate(deltas: DeltaTable, ranges: readonly SegmentRange[]): SummaryTable {
    return this.aggregateWithCounts(deltas, ranges).summary;
  }

  /** Same as aggregate(), also reporting how many rows were overwritten. */
  aggregateWithCounts(deltas: DeltaTable, ranges: readonly SegmentRange[]): AggregationResult {
    for (const range of ranges) {
      this.assertRangeInBounds(range, deltas.rowCount);
    }

    let overwrittenRows = 0;
    const rows: SummaryRow[] = [];
    const rowByStart = new Map<number, number>();

    for (const range of ranges) {
      const row: SummaryRow = {
        key: range.start,
        label: formatRangeLabel(range),
        sums: Float64Array.from(deltas.columns, (column) =>
          sumRange(column, range.start, range.end),
        ),
      };

      const existing = this.policy === "last-wins" ? rowByStart.get(range.start) : undefined;
      if (existing === undefined) {
        rowByStart.set(range.start, rows.length);
        rows.push(row);
      } else {
        rows[existing] = row;
        overwrittenRows++;
      }
    }

    return { summary: { channels: deltas.channels, rows }, overwrittenRows };
  }

  private assertRangeInBounds(range: SegmentRange, rowCount: number): void {
    const { start, end } = range;
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start < 0 ||
      end < start ||
      end > rowCount
    ) {
      throw new InvalidParameterError(
        `Range ${formatRangeLabel(range)} is outside the delta table (0-${rowCount})`,
      );
    }
  }
}

export function aggregateRanges(
  deltas: DeltaTable,
  ranges: readonly SegmentRange[],
  options?: RangeAggregatorOptions,
): SummaryTable {
  return new RangeAggregator(options).aggregate(deltas, ranges);
}

/** Array-of-structs view: `{ label, key, <channel>: sum, ... }` per row. */
export function summaryTableToRows(
  summary: SummaryTable,
): Array<{ label: string; key: number; sums: ChannelRow }> {
  return summary.rows.map((row) => {
    const sums: ChannelRow = {};
    summary.channels.forEach((name, k) => {
      sums[name] = row.sums[k];
    });
    return { label: row.label, key: row.key, sums };
  });
}
