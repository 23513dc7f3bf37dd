import { HOURS_PER_DAY, MINUTES_PER_HOUR, SECONDS_PER_MINUTE } from "../constants";
import type {
  ChannelKey,
  RecordingDescriptor,
  StationLocation,
  TimeParameters,
} from "../types/run-control-types";
import { FormatError, MissingPrerequisiteError } from "./errors";
import { parseCoordinatePair, parseIntegerField, parseNumberList, type LineRef } from "./fields";
import type { RecordBlock } from "./keywords";
import { splitComment, type LineReader } from "./line-io";
import { lookupOutputType } from "./output-types";
import { requireTime, type ScanState } from "./scan-state";

/** The four values on an output block header: NOUTx, TOUTSx, TOUTFx, NSPOOLx. */
export interface RecordFields {
  outputFlag: number;
  /** Days. */
  startWindow: number;
  /** Days. */
  endWindow: number;
  /** Time steps between observations. */
  strideSteps: number;
}

/** The explicit station list of a block, as read from the document. */
export interface StationListing {
  readonly stations: readonly StationLocation[];
  /** Comment text of the station count line, kept for re-emitting the block. */
  readonly description: string;
  readonly terminator: string;
}

export interface DecodedRecord {
  readonly descriptor: RecordingDescriptor;
  /** Present for channels with an explicit station list. */
  readonly listing?: StationListing;
}

export function parseRecordFields(valueField: string, ref?: LineRef): RecordFields {
  const [outputFlag, startWindow, endWindow, strideSteps] = parseNumberList(valueField, "output block header", ref, 4);
  return { outputFlag, startWindow, endWindow, strideSteps };
}

/**
 * Number of observations the simulation will write for a block.
 *
 * The recording window is clipped to [STATIM, STATIM + RNDAY], converted to
 * seconds, divided by the time step and the stride, and truncated. A disabled
 * block (NOUT = 0) or a zero stride records nothing, as does an empty window.
 */
export function computeTotalObservations(fields: RecordFields, time: TimeParameters): number {
  if (fields.outputFlag === 0 || fields.strideSteps === 0) return 0;
  const start = Math.max(fields.startWindow, time.startTime);
  const end = Math.min(fields.endWindow, time.startTime + time.totalDays);
  // One factor at a time, left to right.
  const seconds = (end - start) * HOURS_PER_DAY * MINUTES_PER_HOUR * SECONDS_PER_MINUTE;
  const observations = Math.trunc(seconds / time.timeStep / fields.strideSteps);
  return Math.max(0, observations);
}

function nextLine(reader: LineReader, what: string): { line: string; ref: LineRef } {
  const line = reader.next();
  if (line === null) throw new FormatError(`document ends before ${what}`);
  return { line, ref: { lineNumber: reader.lineNumber, line } };
}

function readStationListing(reader: LineReader): StationListing {
  const count = nextLine(reader, "the station count");
  const { value, comment, terminator } = splitComment(count.line);
  const stationCount = parseIntegerField(value, "station count", count.ref);
  if (stationCount < 0) {
    throw new FormatError(`station count is negative: ${stationCount}`, count.ref.lineNumber, count.line);
  }

  const stations: StationLocation[] = [];
  for (let i = 0; i < stationCount; i++) {
    const station = nextLine(reader, `station ${i + 1} of ${stationCount}`);
    stations.push(Object.freeze(parseCoordinatePair(splitComment(station.line).value, station.ref)));
  }
  return { stations: Object.freeze(stations), description: comment, terminator };
}

function decodeBlock(
  reader: LineReader,
  key: ChannelKey,
  valueField: string,
  state: ScanState,
  ref?: LineRef,
): { stationCount: number; totalObservations: number; listing?: StationListing } {
  const time = requireTime(state, ref);
  const totalObservations = computeTotalObservations(parseRecordFields(valueField, ref), time);

  if (lookupOutputType(key).explicitStations) {
    const listing = readStationListing(reader);
    return { stationCount: listing.stations.length, totalObservations, listing };
  }
  if (state.nodeCount === undefined) {
    throw new MissingPrerequisiteError(`${key} records every mesh node but no node count was supplied`);
  }
  return { stationCount: state.nodeCount, totalObservations };
}

function descriptorFor(key: ChannelKey, stationCount: number, totalObservations: number): RecordingDescriptor {
  return Object.freeze({ stationCount, totalObservations, columnCount: lookupOutputType(key).columnCount });
}

/**
 * Decodes one output block whose header line has just been read, consuming
 * its station lines from `reader`, and stores the result under `key`.
 */
export function decodeRecord(
  reader: LineReader,
  key: ChannelKey,
  valueField: string,
  state: ScanState,
  ref?: LineRef,
): DecodedRecord {
  const { stationCount, totalObservations, listing } = decodeBlock(reader, key, valueField, state, ref);
  const descriptor = descriptorFor(key, stationCount, totalObservations);
  state.recording.set(key, descriptor);
  if (listing) state.stations.set(key, listing.stations);
  return { descriptor, listing };
}

/**
 * Decodes a block shared by two output files (71/72, 73/74). Both keys get the
 * same counts and the same station array; each keeps its own column count.
 * The returned descriptor is the primary one.
 */
export function decodePairedRecord(
  reader: LineReader,
  primary: ChannelKey,
  secondary: ChannelKey,
  valueField: string,
  state: ScanState,
  ref?: LineRef,
): DecodedRecord {
  const { stationCount, totalObservations, listing } = decodeBlock(reader, primary, valueField, state, ref);
  const descriptor = descriptorFor(primary, stationCount, totalObservations);
  state.recording.set(primary, descriptor);
  state.recording.set(secondary, descriptorFor(secondary, stationCount, totalObservations));
  if (listing) {
    state.stations.set(primary, listing.stations);
    state.stations.set(secondary, listing.stations);
  }
  return { descriptor, listing };
}

/** Decodes whichever kind of block a channel marker announced; ignored blocks decode to undefined. */
export function decodeMarkedRecord(
  reader: LineReader,
  block: RecordBlock,
  valueField: string,
  state: ScanState,
  ref?: LineRef,
): DecodedRecord | undefined {
  switch (block.kind) {
    case "single":
      return decodeRecord(reader, block.key, valueField, state, ref);
    case "paired":
      return decodePairedRecord(reader, block.primary, block.secondary, valueField, state, ref);
    case "ignored":
      return undefined;
  }
}
