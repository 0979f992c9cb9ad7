// Keypoint Displacement - Column-major tables
//
// Tables are built once and never mutated afterwards. The channel-name →
// column-index map is computed at construction so lookups stay O(1).

import { InvalidTableError } from "./errors.js";
import type {
  Axis,
  ChannelName,
  ChannelPair,
  ChannelRow,
  DeltaTable,
  NumericTable,
  TrajectoryTable,
} from "./types.js";

export type ColumnSource =
  | Record<ChannelName, ArrayLike<number>>
  | Map<ChannelName, ArrayLike<number>>;

// ─── Channel Names ──────────────────────────────────────────────────────────────

const CHANNEL_NAME_PATTERN = /^KP_(\d+)_(x|y)$/;

export function channelName(keypoint: number, axis: Axis): ChannelName {
  return `KP_${keypoint}_${axis}`;
}

/** The `[x, y]` channel names of a keypoint. */
export function keypointChannelPair(keypoint: number): ChannelPair {
  return [channelName(keypoint, "x"), channelName(keypoint, "y")];
}

/**
 * Split a `KP_<index>_<axis>` channel name into its parts.
 * Returns null for names that do not follow that form.
 */
export function parseChannelName(
  name: ChannelName,
): { keypoint: number; axis: Axis } | null {
  const match = CHANNEL_NAME_PATTERN.exec(name);
  if (!match) return null;
  const axis: Axis = match[2] === "x" ? "x" : "y";
  return { keypoint: parseInt(match[1], 10), axis };
}

// ─── Construction ───────────────────────────────────────────────────────────────

/**
 * Assemble a table from already-validated columns. Columns are taken as-is;
 * callers hand over ownership.
 */
export function buildNumericTable(
  channels: readonly ChannelName[],
  columns: Float64Array[],
  rowCount: number,
): NumericTable {
  const channelIndex = new Map<ChannelName, number>();
  channels.forEach((name, k) => channelIndex.set(name, k));
  return {
    channels: Object.freeze([...channels]),
    channelIndex,
    columns: Object.freeze(columns),
    rowCount,
  };
}

function fromColumnSource(source: ColumnSource, allowNegative: boolean): NumericTable {
  const entries: Array<[ChannelName, ArrayLike<number>]> =
    source instanceof Map ? [...source.entries()] : Object.entries(source);

  if (entries.length === 0) {
    return buildNumericTable([], [], 0);
  }

  const rowCount = entries[0][1].length;
  const channels: ChannelName[] = [];
  const columns: Float64Array[] = [];

  for (const [name, values] of entries) {
    if (values.length !== rowCount) {
      throw new InvalidTableError(
        `Channel ${name} has ${values.length} rows, expected ${rowCount}`,
      );
    }
    const column = Float64Array.from(values);
    for (let i = 0; i < column.length; i++) {
      const v = column[i];
      if (!Number.isFinite(v)) {
        throw new InvalidTableError(`Channel ${name} has a non-finite value at row ${i}`);
      }
      if (!allowNegative && v < 0) {
        throw new InvalidTableError(
          `Channel ${name} has a negative coordinate at row ${i}; undetected keypoints must be 0`,
        );
      }
    }
    channels.push(name);
    columns.push(column);
  }

  return buildNumericTable(channels, columns, rowCount);
}

/**
 * Build a trajectory table from named coordinate columns.
 * Coordinates must be finite and non-negative; zero marks "not detected".
 */
export function createTrajectoryTable(source: ColumnSource): TrajectoryTable {
  return fromColumnSource(source, false);
}

/** Build a delta table from named columns. Negative values are allowed. */
export function createDeltaTable(source: ColumnSource): DeltaTable {
  return fromColumnSource(source, true);
}

/**
 * Build a trajectory table from one object per time step. Every row must
 * carry the same channel set. `channels` fixes the column order (and the
 * column set of an empty table); by default the first row's key order is used.
 */
export function trajectoryTableFromRows(
  rows: readonly ChannelRow[],
  channels?: readonly ChannelName[],
): TrajectoryTable {
  const order = channels ?? (rows.length > 0 ? Object.keys(rows[0]) : []);
  const expected = new Set(order);
  if (expected.size !== order.length) {
    throw new InvalidTableError("Duplicate channel names");
  }

  const columns = new Map<ChannelName, number[]>();
  for (const name of order) columns.set(name, new Array<number>(rows.length));

  rows.forEach((row, i) => {
    const keys = Object.keys(row);
    if (keys.length !== expected.size || keys.some((k) => !expected.has(k))) {
      throw new InvalidTableError(`Row ${i} does not have the channel set ${order.join(", ")}`);
    }
    for (const [name, column] of columns) {
      column[i] = row[name];
    }
  });

  return createTrajectoryTable(columns);
}

/** Array-of-structs view of a table, one object per row. */
export function tableToRows(table: NumericTable): ChannelRow[] {
  const rows: ChannelRow[] = [];
  for (let i = 0; i < table.rowCount; i++) {
    const row: ChannelRow = {};
    table.channels.forEach((name, k) => {
      row[name] = table.columns[k][i];
    });
    rows.push(row);
  }
  return rows;
}

// ─── Lookup ─────────────────────────────────────────────────────────────────────

/** Column for a channel, or undefined if the table has no such channel. */
export function getColumn(table: NumericTable, name: ChannelName): Float64Array | undefined {
  const k = table.channelIndex.get(name);
  return k === undefined ? undefined : table.columns[k];
}

/** Channels from `names` that the table does not have, in the given order. */
export function findMissingChannels(
  table: NumericTable,
  names: readonly ChannelName[],
): ChannelName[] {
  return names.filter((name) => !table.channelIndex.has(name));
}
