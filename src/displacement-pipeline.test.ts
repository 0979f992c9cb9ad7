// Unit tests for the displacement pipeline and computeThresholdSums

import { describe, it, expect, vi } from "vitest";
import { DisplacementPipeline, computeThresholdSums } from "./displacement-pipeline.js";
import { computeDeltas } from "./delta-computer.js";
import {
  EmptyInputError,
  MissingChannelError,
  NoPriorDetectionError,
} from "./errors.js";
import { silentLogger, type PipelineLogger } from "./logger.js";
import { createDeltaTable, createTrajectoryTable } from "./trajectory-table.js";
import type { SummaryTable } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

/**
 * KP_0_x deltas: [5, 0, 0, 0, 4]
 * KP_0_y deltas: [0, 0, 0, 0, 0]
 * KP_1_x deltas: [2, 0, 0, -1, 2]
 */
function makeTable() {
  return createTrajectoryTable({
    KP_0_x: [0, 5, 5, 0, 0, 9],
    KP_0_y: [1, 1, 1, 1, 1, 1],
    KP_1_x: [2, 4, 0, 0, 3, 5],
  });
}

function makeLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies PipelineLogger;
}

function plain(summary: SummaryTable) {
  return summary.rows.map((row) => ({ key: row.key, label: row.label, sums: Array.from(row.sums) }));
}

// ─── computeThresholdSums ───────────────────────────────────────────────────────

describe("computeThresholdSums", () => {
  it("summarizes the end-to-end scenario into a single last-wins row", () => {
    const deltas = computeDeltas(makeTable());
    const summary = computeThresholdSums(deltas, 4);

    expect(summary.channels).toEqual(["KP_0_x", "KP_0_y", "KP_1_x"]);
    expect(plain(summary)).toEqual([{ key: 0, label: "0-5", sums: [9, 0, 3] }]);
  });

  it("keeps every range under the per-range policy", () => {
    const deltas = computeDeltas(makeTable());
    const summary = computeThresholdSums(deltas, 4, ["KP_0_x", "KP_0_y"], {
      aggregationPolicy: "per-range",
    });
    expect(summary.rows.map((row) => row.label)).toEqual(["0-1", "0-2", "0-3", "0-4", "0-5"]);
    expect(Array.from(summary.rows[0].sums)).toEqual([5, 0, 2]);
  });

  it("segments on a caller-supplied reference pair", () => {
    const deltas = createDeltaTable({
      KP_0_x: [9, 9, 9],
      KP_0_y: [9, 9, 9],
      KP_1_x: [0, 0, 3],
      KP_1_y: [0, 0, 0],
    });
    const summary = computeThresholdSums(deltas, 2, ["KP_1_x", "KP_1_y"]);
    expect(plain(summary)).toEqual([
      { key: 0, label: "0-3", sums: [27, 27, 3, 0] },
      { key: 1, label: "1-3", sums: [18, 18, 3, 0] },
      { key: 2, label: "2-3", sums: [9, 9, 3, 0] },
    ]);
  });

  it("throws MissingChannelError naming the absent reference channel", () => {
    const deltas = createDeltaTable({ KP_0_x: [1, 2] });
    expect(() => computeThresholdSums(deltas, 1)).toThrow(MissingChannelError);
    try {
      computeThresholdSums(deltas, 1);
    } catch (err) {
      expect(err).toBeInstanceOf(MissingChannelError);
      if (err instanceof MissingChannelError) {
        expect(err.channels).toEqual(["KP_0_y"]);
        expect(err.message).toBe("Missing channel: KP_0_y");
      }
    }
  });

  it("lists both reference channels when neither is present", () => {
    const deltas = createDeltaTable({ KP_3_x: [1, 2] });
    expect(() => computeThresholdSums(deltas, 1)).toThrow("Missing channels: KP_0_x, KP_0_y");
  });
});

// ─── DisplacementPipeline ───────────────────────────────────────────────────────

describe("DisplacementPipeline", () => {
  it("runs the full pass from coordinates to summary", () => {
    const pipeline = new DisplacementPipeline({ logger: silentLogger });
    const result = pipeline.run(makeTable(), 4);

    expect(Array.from(result.deltas.columns[0])).toEqual([5, 0, 0, 0, 4]);
    expect(Array.from(result.deltas.columns[2])).toEqual([2, 0, 0, -1, 2]);
    expect(result.diagnostics.gaps[2]).toEqual([
      { transitionIndex: 3, zeroRunLength: 2, noPriorDetection: false },
    ]);
    expect(result.ranges).toEqual([
      { start: 0, end: 1 },
      { start: 0, end: 2 },
      { start: 0, end: 3 },
      { start: 0, end: 4 },
      { start: 0, end: 5 },
    ]);
    expect(plain(result.summary)).toEqual([{ key: 0, label: "0-5", sums: [9, 0, 3] }]);
  });

  it("applies configured policies", () => {
    const pipeline = new DisplacementPipeline({
      logger: silentLogger,
      config: { leadingGapPolicy: "zero", segmentationPolicy: "first-window" },
    });
    const result = pipeline.run(makeTable(), 3);

    // KP_0_x deltas become [0, 0, 0, 0, 4]; only windows reaching row 4 exceed 3.
    expect(result.ranges).toEqual([
      { start: 0, end: 5 },
      { start: 1, end: 5 },
      { start: 2, end: 5 },
      { start: 3, end: 5 },
      { start: 4, end: 5 },
    ]);
    expect(plain(result.summary).map((row) => row.label)).toEqual([
      "0-5",
      "1-5",
      "2-5",
      "3-5",
      "4-5",
    ]);
  });

  it("segments on the configured reference keypoint", () => {
    const pipeline = new DisplacementPipeline({
      logger: silentLogger,
      config: { referenceChannels: ["KP_1_x", "KP_0_y"] },
    });
    const deltas = computeDeltas(makeTable());
    const summary = pipeline.computeThresholdSums(deltas, 3);
    // KP_1_x deltas [2, 0, 0, -1, 2]: no window sums above 3
    expect(summary.rows).toEqual([]);
  });

  it("logs bridged gaps without prior detection as warnings", () => {
    const logger = makeLogger();
    new DisplacementPipeline({ logger }).computeDeltas(makeTable());

    expect(logger.warn).toHaveBeenCalledWith(
      "Channel KP_0_x resumed at transition 0 with no prior detection (policy: first-step)",
    );
    expect(logger.info).toHaveBeenCalledWith("Computed 5 delta rows for 3 channels (3 bridged gaps)");
  });

  it("warns when ranges overwrite earlier rows", () => {
    const logger = makeLogger();
    const pipeline = new DisplacementPipeline({ logger });
    pipeline.computeThresholdSums(computeDeltas(makeTable()), 4);

    expect(logger.warn).toHaveBeenCalledWith(
      "4 of 5 ranges replaced an earlier row with the same start index",
    );
    expect(logger.info).toHaveBeenCalledWith("Summarized 5 ranges into 1 rows");
  });

  it("logs and rethrows EmptyInputError", () => {
    const logger = makeLogger();
    const pipeline = new DisplacementPipeline({ logger });
    const empty = createTrajectoryTable({ KP_0_x: [], KP_0_y: [] });

    expect(() => pipeline.run(empty, 1)).toThrow(EmptyInputError);
    expect(logger.error).toHaveBeenCalledWith(
      "delta computation failed [EMPTY_INPUT]: The input trajectory table is empty.",
    );
  });

  it("logs and rethrows MissingChannelError before segmenting", () => {
    const logger = makeLogger();
    const pipeline = new DisplacementPipeline({ logger });
    const deltas = createDeltaTable({ KP_0_x: [1, 2] });

    expect(() => pipeline.computeThresholdSums(deltas, 1)).toThrow(MissingChannelError);
    expect(logger.error).toHaveBeenCalledWith(
      "segmentation failed [MISSING_CHANNEL]: Missing channel: KP_0_y",
    );
  });

  it("surfaces NoPriorDetectionError under the strict policy", () => {
    const pipeline = new DisplacementPipeline({
      logger: silentLogger,
      config: { leadingGapPolicy: "strict" },
    });
    expect(() => pipeline.run(makeTable(), 4)).toThrow(NoPriorDetectionError);
  });

  it("resolves configuration at construction", () => {
    const pipeline = new DisplacementPipeline({
      logger: silentLogger,
      config: { maxWindowLength: 5 },
    });
    expect(pipeline.config.maxWindowLength).toBe(5);
    expect(pipeline.config.referenceChannels).toEqual(["KP_0_x", "KP_0_y"]);
  });

  it("passes the configured window length and aggregation policy to its stages", () => {
    const logger = makeLogger();
    const pipeline = new DisplacementPipeline({
      logger,
      config: { maxWindowLength: 3, aggregationPolicy: "per-range" },
    });
    const { ranges, summary } = pipeline.run(makeTable(), 4);

    // Windows of at most two rows; only KP_0_x rows 0..1 exceed 4.
    expect(ranges).toEqual([
      { start: 0, end: 1 },
      { start: 0, end: 2 },
    ]);
    expect(plain(summary)).toEqual([
      { key: 0, label: "0-1", sums: [5, 0, 2] },
      { key: 0, label: "0-2", sums: [5, 0, 2] },
    ]);
    expect(logger.warn).not.toHaveBeenCalledWith(
      expect.stringContaining("replaced an earlier row"),
    );
  });

  it("falls back to defaults for config keys set to undefined", () => {
    const pipeline = new DisplacementPipeline({
      logger: silentLogger,
      config: { referenceChannels: undefined, maxWindowLength: undefined },
    });
    expect(pipeline.config.maxWindowLength).toBe(30);
    expect(plain(pipeline.run(makeTable(), 4).summary)).toEqual([
      { key: 0, label: "0-5", sums: [9, 0, 3] },
    ]);
  });
});
