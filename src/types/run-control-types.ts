/** Output channel identifier, named after the file the simulation writes (e.g. "fort61"). */
export type ChannelKey =
  | "fort61" | "fort62" | "fort63" | "fort64"
  | "fort71" | "fort72" | "fort73" | "fort74"
  | "tinun63" | "maxele63" | "maxvel63" | "nodeflag63" | "rising63" | "elemaxdry63";

/** Global simulation timing, fixed once the DRAMP line has been read. */
export interface TimeParameters {
  /** DT, in seconds. Never zero. */
  readonly timeStep: number;
  /** STATIM, in days. */
  readonly startTime: number;
  /** RNDAY, in days. */
  readonly totalDays: number;
  readonly rampCoefficients: readonly number[];
}

export interface StationLocation {
  readonly x: number;
  readonly y: number;
}

export interface RecordingDescriptor {
  /** Number of recorded points: explicit stations, or every mesh node. */
  readonly stationCount: number;
  readonly totalObservations: number;
  /** Values per point per observation (1 for scalars, 2 for vectors). */
  readonly columnCount: number;
}

export interface DocumentContext {
  readonly time: TimeParameters;
  readonly recording: ReadonlyMap<ChannelKey, RecordingDescriptor>;
  /** Paired channels (71/72, 73/74) reference the same array. */
  readonly stations: ReadonlyMap<ChannelKey, readonly StationLocation[]>;
  /** IHOT, or undefined when the document has no IHOT line. */
  readonly hotStartFlag: number | undefined;
  /** H0, or undefined when the document has no H0 line. */
  readonly minimumDepth: number | undefined;
  readonly nodeCount: number | undefined;
}

/**
 * Read-only view of the mesh, supplied by whatever loads the domain geometry.
 * x[i], y[i] are the coordinates of node i.
 */
export interface MeshDomain {
  readonly nodeCount: number;
  readonly x: ArrayLike<number>;
  readonly y: ArrayLike<number>;
}

export interface DomainExtent {
  readonly xMin: number;
  readonly xMax: number;
  readonly yMin: number;
  readonly yMax: number;
}

export type ShapeKind = "ellipse" | "circle";
