// Keypoint Displacement - Pipeline
//
// TrajectoryTable → DeltaComputer → DeltaTable → ThresholdSegmenter (reference
// pair only) → SegmentRange[] → RangeAggregator (all channels) → SummaryTable

import { resolveConfig } from "./config.js";
import { DeltaComputer } from "./delta-computer.js";
import { MissingChannelError, TrajectoryError } from "./errors.js";
import { defaultLogger, type PipelineLogger } from "./logger.js";
import { RangeAggregator } from "./range-aggregator.js";
import { ThresholdSegmenter } from "./threshold-segmenter.js";
import { findMissingChannels, getColumn } from "./trajectory-table.js";
import type {
  ChannelPair,
  DeltaResult,
  DeltaTable,
  PipelineResult,
  SegmentRange,
  SummaryTable,
  TrajectoryConfig,
  TrajectoryTable,
} from "./types.js";

export interface ThresholdSumsOptions {
  maxWindowLength?: number;
  segmentationPolicy?: TrajectoryConfig["segmentationPolicy"];
  aggregationPolicy?: TrajectoryConfig["aggregationPolicy"];
}

/** Reference columns of a delta table, or MissingChannelError naming every absent one. */
function referenceColumns(
  deltas: DeltaTable,
  referencePair: ChannelPair,
): [Float64Array, Float64Array] {
  const refX = getColumn(deltas, referencePair[0]);
  const refY = getColumn(deltas, referencePair[1]);
  if (refX === undefined || refY === undefined) {
    throw new MissingChannelError(findMissingChannels(deltas, referencePair));
  }
  return [refX, refY];
}

/**
 * Segment `deltas` by the reference pair's cumulative displacement and sum
 * every channel over each resulting range.
 *
 * @throws MissingChannelError if either reference channel is absent
 */
export function computeThresholdSums(
  deltas: DeltaTable,
  threshold: number,
  referencePair: ChannelPair = resolveConfig().referenceChannels,
  options: ThresholdSumsOptions = {},
): SummaryTable {
  const [refX, refY] = referenceColumns(deltas, referencePair);
  const ranges = new ThresholdSegmenter(options).findRanges(refX, refY, threshold);
  return new RangeAggregator(options).aggregate(deltas, ranges);
}

// ─── Pipeline ───────────────────────────────────────────────────────────────────

export interface DisplacementPipelineDeps {
  config?: Partial<TrajectoryConfig>;
  logger?: PipelineLogger;
}

export class DisplacementPipeline {
  readonly config: TrajectoryConfig;
  private logger: PipelineLogger;
  private deltaComputer: DeltaComputer;
  private segmenter: ThresholdSegmenter;
  private aggregator: RangeAggregator;

  constructor(deps: DisplacementPipelineDeps = {}) {
    this.config = resolveConfig(deps.config);
    this.logger = deps.logger ?? defaultLogger;
    this.deltaComputer = new DeltaComputer(this.config);
    this.segmenter = new ThresholdSegmenter(this.config);
    this.aggregator = new RangeAggregator(this.config);
  }

  /** Delta table plus bridged-gap diagnostics. */
  computeDeltas(table: TrajectoryTable): DeltaResult {
    const result = this.guard("delta computation", () => this.deltaComputer.compute(table));

    const { diagnostics } = result;
    let bridged = 0;
    diagnostics.gaps.forEach((gaps, k) => {
      bridged += gaps.length;
      const leading = gaps.filter((gap) => gap.noPriorDetection);
      for (const gap of leading) {
        this.logger.warn(
          `Channel ${diagnostics.channels[k]} resumed at transition ${gap.transitionIndex} ` +
            `with no prior detection (policy: ${this.config.leadingGapPolicy})`,
        );
      }
    });

    this.logger.info(
      `Computed ${result.deltas.rowCount} delta rows for ${table.channels.length} channels ` +
        `(${bridged} bridged gaps)`,
    );
    return result;
  }

  /** Ranges found on the configured reference pair. */
  findRanges(deltas: DeltaTable, threshold: number): SegmentRange[] {
    return this.guard("segmentation", () => {
      const [refX, refY] = referenceColumns(deltas, this.config.referenceChannels);
      return this.segmenter.findRanges(refX, refY, threshold);
    });
  }

  aggregate(deltas: DeltaTable, ranges: readonly SegmentRange[]): SummaryTable {
    const { summary, overwrittenRows } = this.guard("aggregation", () =>
      this.aggregator.aggregateWithCounts(deltas, ranges),
    );
    if (overwrittenRows > 0) {
      this.logger.warn(
        `${overwrittenRows} of ${ranges.length} ranges replaced an earlier row with the same start index`,
      );
    }
    this.logger.info(`Summarized ${ranges.length} ranges into ${summary.rows.length} rows`);
    return summary;
  }

  computeThresholdSums(deltas: DeltaTable, threshold: number): SummaryTable {
    const ranges = this.findRanges(deltas, threshold);
    this.logger.info(
      `Found ${ranges.length} ranges above threshold ${threshold} on ` +
        this.config.referenceChannels.join("/"),
    );
    return this.aggregate(deltas, ranges);
  }

  /** Full pass from raw coordinates to the summary table. */
  run(table: TrajectoryTable, threshold: number): PipelineResult {
    const { deltas, diagnostics } = this.computeDeltas(table);
    const ranges = this.findRanges(deltas, threshold);
    this.logger.info(`Found ${ranges.length} ranges above threshold ${threshold}`);
    const summary = this.aggregate(deltas, ranges);
    return { deltas, diagnostics, ranges, summary };
  }

  // ─── Internal ───────────────────────────────────────────────────────────────

  /** Log a failed stage with its error code, then rethrow unchanged. */
  private guard<T>(stage: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      const code = err instanceof TrajectoryError ? err.code : "UNEXPECTED";
      this.logger.error(`${stage} failed [${code}]: ${errorMessage}`);
      throw err;
    }
  }
}
