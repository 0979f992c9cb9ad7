// Keypoint Displacement - Configuration
//
// Defaults can be overridden in code (resolveConfig), from the process
// environment (loadConfigFromEnv), or from a .env-format file
// (loadConfigFromFile). The file loader never writes to process.env.

import { readFile } from "node:fs/promises";
import dotenv from "dotenv";
import { InvalidConfigError, InvalidParameterError } from "./errors.js";
import { assertValidWindowLength, DEFAULT_MAX_WINDOW_LENGTH } from "./threshold-segmenter.js";
import { keypointChannelPair } from "./trajectory-table.js";
import type {
  AggregationPolicy,
  LeadingGapPolicy,
  SegmentationPolicy,
  TrajectoryConfig,
} from "./types.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_TRAJECTORY_CONFIG: TrajectoryConfig = {
  maxWindowLength: DEFAULT_MAX_WINDOW_LENGTH,
  referenceChannels: keypointChannelPair(0),
  leadingGapPolicy: "first-step",
  segmentationPolicy: "every-window",
  aggregationPolicy: "last-wins",
};

export const ENV_VARS = {
  maxWindowLength: "TRAJECTORY_MAX_WINDOW_LENGTH",
  referenceKeypoint: "TRAJECTORY_REFERENCE_KEYPOINT",
  leadingGapPolicy: "TRAJECTORY_LEADING_GAP_POLICY",
  segmentationPolicy: "TRAJECTORY_SEGMENTATION_POLICY",
  aggregationPolicy: "TRAJECTORY_AGGREGATION_POLICY",
} as const;

const LEADING_GAP_POLICIES: Record<LeadingGapPolicy, true> = {
  "first-step": true,
  zero: true,
  strict: true,
};

const SEGMENTATION_POLICIES: Record<SegmentationPolicy, true> = {
  "every-window": true,
  "first-window": true,
};

const AGGREGATION_POLICIES: Record<AggregationPolicy, true> = {
  "last-wins": true,
  "per-range": true,
};

const isLeadingGapPolicy = (value: string): value is LeadingGapPolicy =>
  Object.hasOwn(LEADING_GAP_POLICIES, value);

const isSegmentationPolicy = (value: string): value is SegmentationPolicy =>
  Object.hasOwn(SEGMENTATION_POLICIES, value);

const isAggregationPolicy = (value: string): value is AggregationPolicy =>
  Object.hasOwn(AGGREGATION_POLICIES, value);

// ─── Resolution ─────────────────────────────────────────────────────────────────

/**
 * Merge overrides over the defaults and validate the result. A key present
 * with an `undefined` value keeps its default.
 */
export function resolveConfig(overrides: Partial<TrajectoryConfig> = {}): TrajectoryConfig {
  const defaults = DEFAULT_TRAJECTORY_CONFIG;
  const config: TrajectoryConfig = {
    maxWindowLength: overrides.maxWindowLength ?? defaults.maxWindowLength,
    referenceChannels: overrides.referenceChannels ?? defaults.referenceChannels,
    leadingGapPolicy: overrides.leadingGapPolicy ?? defaults.leadingGapPolicy,
    segmentationPolicy: overrides.segmentationPolicy ?? defaults.segmentationPolicy,
    aggregationPolicy: overrides.aggregationPolicy ?? defaults.aggregationPolicy,
  };

  assertValidWindowLength(config.maxWindowLength);
  const [refX, refY] = config.referenceChannels;
  if (refX === refY) {
    throw new InvalidParameterError(`Reference channels must differ (got ${refX} twice)`);
  }

  return config;
}

/**
 * Read overrides from environment variables. Unset or empty variables keep
 * their defaults.
 *
 * @throws InvalidConfigError when a set variable cannot be parsed
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): TrajectoryConfig {
  const overrides: Partial<TrajectoryConfig> = {};

  const windowLength = readVar(env, ENV_VARS.maxWindowLength);
  if (windowLength !== undefined) {
    overrides.maxWindowLength = parsePositiveInteger(ENV_VARS.maxWindowLength, windowLength);
  }

  const keypoint = readVar(env, ENV_VARS.referenceKeypoint);
  if (keypoint !== undefined) {
    const index = parseNonNegativeInteger(ENV_VARS.referenceKeypoint, keypoint);
    overrides.referenceChannels = keypointChannelPair(index);
  }

  const leadingGap = readVar(env, ENV_VARS.leadingGapPolicy);
  if (leadingGap !== undefined) {
    if (!isLeadingGapPolicy(leadingGap)) {
      throw invalidChoice(ENV_VARS.leadingGapPolicy, leadingGap, LEADING_GAP_POLICIES);
    }
    overrides.leadingGapPolicy = leadingGap;
  }

  const segmentation = readVar(env, ENV_VARS.segmentationPolicy);
  if (segmentation !== undefined) {
    if (!isSegmentationPolicy(segmentation)) {
      throw invalidChoice(ENV_VARS.segmentationPolicy, segmentation, SEGMENTATION_POLICIES);
    }
    overrides.segmentationPolicy = segmentation;
  }

  const aggregation = readVar(env, ENV_VARS.aggregationPolicy);
  if (aggregation !== undefined) {
    if (!isAggregationPolicy(aggregation)) {
      throw invalidChoice(ENV_VARS.aggregationPolicy, aggregation, AGGREGATION_POLICIES);
    }
    overrides.aggregationPolicy = aggregation;
  }

  return resolveConfig(overrides);
}

/** Parse a .env-format file and apply it like loadConfigFromEnv. */
export async function loadConfigFromFile(path: string): Promise<TrajectoryConfig> {
  const contents = await readFile(path);
  return loadConfigFromEnv(dotenv.parse(contents));
}

// ─── Internal helpers ───────────────────────────────────────────────────────────

function readVar(env: Record<string, string | undefined>, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parsePositiveInteger(name: string, raw: string): number {
  const value = parseNonNegativeInteger(name, raw);
  if (value === 0) {
    throw new InvalidConfigError(name, "must be at least 1");
  }
  return value;
}

function parseNonNegativeInteger(name: string, raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new InvalidConfigError(name, `expected a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function invalidChoice(name: string, raw: string, choices: Record<string, true>): InvalidConfigError {
  return new InvalidConfigError(
    name,
    `expected one of ${Object.keys(choices).join(", ")}, got "${raw}"`,
  );
}
