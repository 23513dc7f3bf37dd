import type {
  ChannelKey,
  RecordingDescriptor,
  StationLocation,
  TimeParameters,
} from "../types/run-control-types";
import { FormatError, MissingPrerequisiteError } from "./errors";
import type { LineRef } from "./fields";

/**
 * Global timing as it accumulates during one pass. DT, STATIM and RNDAY are
 * collected while awaiting DRAMP; DRAMP turns them into TimeParameters.
 */
export type TimeState =
  | {
      readonly phase: "awaiting-ramp";
      readonly timeStep?: number;
      readonly startTime?: number;
      readonly totalDays?: number;
    }
  | { readonly phase: "timed"; readonly time: TimeParameters };

export type TimeScalar = "timeStep" | "startTime" | "totalDays";

/** Mutable aggregate owned by a single scan or rewrite. */
export interface ScanState {
  time: TimeState;
  readonly nodeCount: number | undefined;
  readonly recording: Map<ChannelKey, RecordingDescriptor>;
  readonly stations: Map<ChannelKey, readonly StationLocation[]>;
}

export function createScanState(nodeCount?: number): ScanState {
  return {
    time: { phase: "awaiting-ramp" },
    nodeCount,
    recording: new Map(),
    stations: new Map(),
  };
}

/** Records DT, STATIM or RNDAY. Once DRAMP has been read the timing is fixed and later values are ignored. */
export function noteTimeScalar(state: ScanState, field: TimeScalar, value: number): void {
  const current = state.time;
  if (current.phase === "timed") return;
  state.time = {
    phase: "awaiting-ramp",
    timeStep: field === "timeStep" ? value : current.timeStep,
    startTime: field === "startTime" ? value : current.startTime,
    totalDays: field === "totalDays" ? value : current.totalDays,
  };
}

export function establishTime(state: ScanState, rampCoefficients: number[], ref?: LineRef): TimeParameters {
  if (state.time.phase === "timed") return state.time.time;
  const { timeStep, startTime, totalDays } = state.time;
  if (timeStep === undefined || startTime === undefined || totalDays === undefined) {
    const missing = [
      timeStep === undefined ? "DT" : null,
      startTime === undefined ? "STATIM" : null,
      totalDays === undefined ? "RNDAY" : null,
    ].filter((name): name is string => name !== null);
    throw new MissingPrerequisiteError(`DRAMP reached before ${missing.join(", ")}`);
  }
  if (timeStep === 0) throw new FormatError("DT must not be zero", ref?.lineNumber, ref?.line);
  const time: TimeParameters = Object.freeze({
    timeStep,
    startTime,
    totalDays,
    rampCoefficients: Object.freeze([...rampCoefficients]),
  });
  state.time = { phase: "timed", time };
  return time;
}

export function requireTime(state: ScanState, ref?: LineRef): TimeParameters {
  if (state.time.phase === "timed") return state.time.time;
  const where = ref ? ` (line ${ref.lineNumber})` : "";
  throw new MissingPrerequisiteError(`output block${where} appears before DRAMP; time parameters are not yet available`);
}
