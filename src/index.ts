// Keypoint Displacement - Entry point
// Public API: delta computation, threshold segmentation and range summaries.

export const APP_NAME = "Keypoint Displacement";
export const APP_VERSION = "0.1.0";

export {
  DeltaComputer,
  computeDeltas,
  displacement,
  type DeltaComputerOptions,
} from "./delta-computer.js";
export {
  ThresholdSegmenter,
  findRanges,
  DEFAULT_MAX_WINDOW_LENGTH,
  type ThresholdSegmenterOptions,
} from "./threshold-segmenter.js";
export {
  RangeAggregator,
  aggregateRanges,
  formatRangeLabel,
  summaryTableToRows,
  type AggregationResult,
  type RangeAggregatorOptions,
} from "./range-aggregator.js";
export {
  DisplacementPipeline,
  computeThresholdSums,
  type DisplacementPipelineDeps,
  type ThresholdSumsOptions,
} from "./displacement-pipeline.js";
export {
  createTrajectoryTable,
  createDeltaTable,
  trajectoryTableFromRows,
  tableToRows,
  channelName,
  keypointChannelPair,
  parseChannelName,
  getColumn,
  type ColumnSource,
} from "./trajectory-table.js";
export {
  DEFAULT_TRAJECTORY_CONFIG,
  ENV_VARS,
  resolveConfig,
  loadConfigFromEnv,
  loadConfigFromFile,
} from "./config.js";
export { defaultLogger, silentLogger, type PipelineLogger } from "./logger.js";
export {
  TrajectoryError,
  EmptyInputError,
  MissingChannelError,
  NoPriorDetectionError,
  InvalidTableError,
  InvalidParameterError,
  InvalidConfigError,
  type TrajectoryErrorCode,
} from "./errors.js";
export type * from "./types.js";
