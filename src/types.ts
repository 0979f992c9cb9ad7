// Keypoint Displacement - Shared TypeScript interfaces and types

// ─── Channels ───────────────────────────────────────────────────────────────────

/** A keypoint axis column, conventionally `KP_<index>_<axis>` (e.g. `KP_0_x`). */
export type ChannelName = string;

export type Axis = "x" | "y";

/** The x/y channel pair of one keypoint, x first. */
export type ChannelPair = readonly [ChannelName, ChannelName];

// ─── Tables ─────────────────────────────────────────────────────────────────────

/**
 * Column-major numeric table. `columns[k]` holds every row of `channels[k]`;
 * all columns have `rowCount` entries.
 */
export interface NumericTable {
  readonly channels: readonly ChannelName[];
  readonly channelIndex: ReadonlyMap<ChannelName, number>;
  readonly columns: readonly Float64Array[];
  readonly rowCount: number;
}

/**
 * Raw coordinates, one row per time step. Zero means "keypoint not detected
 * at this step", never a literal position.
 */
export type TrajectoryTable = NumericTable;

/**
 * Row `i` is the displacement between steps `i` and `i + 1`. A zero cell is
 * either "both endpoints undetected" or "entering an undetected run"; it is
 * not "no movement".
 */
export type DeltaTable = NumericTable;

/** Array-of-structs view of one table row. */
export type ChannelRow = Record<ChannelName, number>;

// ─── Delta Scan ─────────────────────────────────────────────────────────────────

/** Per-channel scan state while computing deltas. */
export interface GapState {
  lastKnownGoodIndex: number;
  zeroRunLength: number;
}

/** Recorded at each transition where detection resumes after a zero run. */
export interface BridgedGap {
  transitionIndex: number;
  zeroRunLength: number;
  /** True when the channel had no non-zero value before this transition. */
  noPriorDetection: boolean;
}

/** Bridged gaps per channel, aligned with the delta table's channel order. */
export interface GapDiagnostics {
  readonly channels: readonly ChannelName[];
  readonly gaps: readonly (readonly BridgedGap[])[];
}

export interface DeltaResult {
  deltas: DeltaTable;
  diagnostics: GapDiagnostics;
}

// ─── Segmentation & Aggregation ─────────────────────────────────────────────────

/** Contiguous block of delta rows, `end` exclusive. */
export interface SegmentRange {
  start: number;
  end: number;
}

export interface SummaryRow {
  /** Start index of the range that produced (or last overwrote) this row. */
  key: number;
  /** `"<start>-<end>"` */
  label: string;
  /** Summed deltas, aligned with `SummaryTable.channels`. */
  sums: Float64Array;
}

export interface SummaryTable {
  readonly channels: readonly ChannelName[];
  readonly rows: readonly SummaryRow[];
}

// ─── Policies ───────────────────────────────────────────────────────────────────

/**
 * How a channel whose first value is zero is bridged when detection first
 * resumes:
 *  - "first-step": subtract the value at step 0 (itself zero)
 *  - "zero": emit a zero delta
 *  - "strict": throw NoPriorDetectionError
 */
export type LeadingGapPolicy = "first-step" | "zero" | "strict";

/** Emit every qualifying window per start index, or only the shortest one. */
export type SegmentationPolicy = "every-window" | "first-window";

/** Key summary rows by start index (later ranges overwrite), or keep one row per range. */
export type AggregationPolicy = "last-wins" | "per-range";

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface TrajectoryConfig {
  /** Windows are shorter than this many delta rows. */
  maxWindowLength: number;
  /** Channels whose cumulative displacement drives segmentation. */
  referenceChannels: ChannelPair;
  leadingGapPolicy: LeadingGapPolicy;
  segmentationPolicy: SegmentationPolicy;
  aggregationPolicy: AggregationPolicy;
}

// ─── Pipeline Output ────────────────────────────────────────────────────────────

export interface PipelineResult {
  deltas: DeltaTable;
  diagnostics: GapDiagnostics;
  ranges: SegmentRange[];
  summary: SummaryTable;
}
