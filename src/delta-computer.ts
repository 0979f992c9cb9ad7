// Keypoint Displacement - Delta Computer
//
// Per-step displacement for every channel, bridging runs of undetected (zero)
// values against the last real observation.

import { EmptyInputError, NoPriorDetectionError } from "./errors.js";
import { buildNumericTable } from "./trajectory-table.js";
import type {
  BridgedGap,
  ChannelName,
  DeltaResult,
  DeltaTable,
  GapState,
  LeadingGapPolicy,
  TrajectoryTable,
} from "./types.js";

export interface DeltaComputerOptions {
  leadingGapPolicy?: LeadingGapPolicy;
}

/** Raw displacement between two observed coordinates. */
export function displacement(from: number, to: number): number {
  return to - from;
}

// ─── Delta Computer ─────────────────────────────────────────────────────────────

export class DeltaComputer {
  private leadingGapPolicy: LeadingGapPolicy;

  constructor(options: DeltaComputerOptions = {}) {
    this.leadingGapPolicy = options.leadingGapPolicy ?? "first-step";
  }

  /**
   * Compute the delta table (one row fewer than `table`) and the bridged-gap
   * diagnostics.
   *
   * Per channel, for each transition i → i+1:
   *  - both detected: v[i+1] - v[i]
   *  - detection resumes: v[i+1] - v[lastKnownGoodIndex]
   *  - both undetected: 0, and the zero run grows
   *  - detection lost: 0, lastKnownGoodIndex = i, zero run starts at 1
   *
   * @throws EmptyInputError if the table has no rows
   * @throws NoPriorDetectionError under the "strict" leading-gap policy
   */
  compute(table: TrajectoryTable): DeltaResult {
    if (table.rowCount === 0) {
      throw new EmptyInputError();
    }

    const transitions = table.rowCount - 1;
    const states: GapState[] = table.channels.map(() => ({
      lastKnownGoodIndex: 0,
      zeroRunLength: 0,
    }));

    const columns: Float64Array[] = [];
    const gaps: BridgedGap[][] = [];

    for (let k = 0; k < table.channels.length; k++) {
      const out = new Float64Array(transitions);
      const bridged: BridgedGap[] = [];
      this.scanChannel(table.channels[k], table.columns[k], states[k], out, bridged);
      columns.push(out);
      gaps.push(bridged);
    }

    const deltas: DeltaTable = buildNumericTable(table.channels, columns, transitions);
    return {
      deltas,
      diagnostics: { channels: deltas.channels, gaps },
    };
  }

  // ─── Private Helpers ────────────────────────────────────────────────────────

  private scanChannel(
    channel: ChannelName,
    values: Float64Array,
    state: GapState,
    out: Float64Array,
    bridged: BridgedGap[],
  ): void {
    for (let i = 0; i < out.length; i++) {
      const current = values[i];
      const next = values[i + 1];

      if (current > 0 && next > 0) {
        out[i] = displacement(current, next);
      } else if (current === 0 && next > 0) {
        const noPriorDetection = values[state.lastKnownGoodIndex] === 0;
        out[i] = this.bridge(channel, values, state, i, noPriorDetection);
        bridged.push({
          transitionIndex: i,
          zeroRunLength: state.zeroRunLength,
          noPriorDetection,
        });
        state.zeroRunLength = 0;
      } else if (current === 0 && next === 0) {
        state.zeroRunLength++;
        out[i] = 0;
      } else {
        // current > 0, next === 0
        state.lastKnownGoodIndex = i;
        state.zeroRunLength = 1;
        out[i] = 0;
      }
    }
  }

  /**
   * Displacement from the last known good position to `values[i + 1]`.
   * The anchor can only be undetected when the channel started with zeros.
   */
  private bridge(
    channel: ChannelName,
    values: Float64Array,
    state: GapState,
    i: number,
    noPriorDetection: boolean,
  ): number {
    const anchor = values[state.lastKnownGoodIndex];
    if (noPriorDetection) {
      switch (this.leadingGapPolicy) {
        case "strict":
          throw new NoPriorDetectionError(channel, i);
        case "zero":
          return 0;
        case "first-step":
          break;
      }
    }
    return displacement(anchor, values[i + 1]);
  }
}

/** Convenience wrapper returning only the delta table. */
export function computeDeltas(
  table: TrajectoryTable,
  options?: DeltaComputerOptions,
): DeltaTable {
  return new DeltaComputer(options).compute(table).deltas;
}
