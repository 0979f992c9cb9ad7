// Keypoint Displacement - Error types
//
// Every failure is raised synchronously before any output table is built.

import type { ChannelName } from "./types.js";

export type TrajectoryErrorCode =
  | "EMPTY_INPUT"
  | "MISSING_CHANNEL"
  | "NO_PRIOR_DETECTION"
  | "INVALID_TABLE"
  | "INVALID_PARAMETER"
  | "INVALID_CONFIG";

export class TrajectoryError extends Error {
  readonly code: TrajectoryErrorCode;

  constructor(code: TrajectoryErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The trajectory table has no rows. */
export class EmptyInputError extends TrajectoryError {
  constructor(message: string = "The input trajectory table is empty.") {
    super("EMPTY_INPUT", message);
  }
}

/** One or more required channels are absent from a table. */
export class MissingChannelError extends TrajectoryError {
  readonly channels: readonly ChannelName[];

  constructor(channels: readonly ChannelName[]) {
    super(
      "MISSING_CHANNEL",
      `Missing channel${channels.length === 1 ? "" : "s"}: ${channels.join(", ")}`,
    );
    this.channels = [...channels];
  }
}

/**
 * Detection resumed on a channel that has never had a non-zero value, and the
 * leading-gap policy is "strict".
 */
export class NoPriorDetectionError extends TrajectoryError {
  readonly channel: ChannelName;
  readonly transitionIndex: number;

  constructor(channel: ChannelName, transitionIndex: number) {
    super(
      "NO_PRIOR_DETECTION",
      `Channel ${channel} has no detection before transition ${transitionIndex}`,
    );
    this.channel = channel;
    this.transitionIndex = transitionIndex;
  }
}

export class InvalidTableError extends TrajectoryError {
  constructor(message: string) {
    super("INVALID_TABLE", message);
  }
}

export class InvalidParameterError extends TrajectoryError {
  constructor(message: string) {
    super("INVALID_PARAMETER", message);
  }
}

export class InvalidConfigError extends TrajectoryError {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super("INVALID_CONFIG", `${variable}: ${message}`);
    this.variable = variable;
  }
}
