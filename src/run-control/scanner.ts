import path from "path";
import { RUN_CONTROL_FILE } from "../constants";
import type { DocumentContext, MeshDomain } from "../types/run-control-types";
import { MissingPrerequisiteError } from "./errors";
import { parseFloatField, parseIntegerField, parseLeadingNumber, parseNumberList, type LineRef } from "./fields";
import { KEYWORDS, matchChannelMarker } from "./keywords";
import { LineReader, readDocument, splitComment } from "./line-io";
import { decodeMarkedRecord } from "./record-decoder";
import { createScanState, establishTime, noteTimeScalar } from "./scan-state";

export interface ScanOptions {
  /** Number of mesh nodes, recorded as the station count of whole-mesh channels. */
  nodeCount?: number;
  /** Alternative to `nodeCount` when the mesh is at hand. */
  mesh?: Pick<MeshDomain, "nodeCount">;
}

/**
 * Scans run-control text in one pass.
 *
 * Keyword lines are recognised by substring, first match wins, in the order
 * DT, IHOT, STATIM, RNDAY, DRAMP, H0, then the output block markers. Output
 * blocks depend on the time parameters, so they must come after DRAMP.
 */
export function scanDocument(text: string, options: ScanOptions = {}): DocumentContext {
  const reader = new LineReader(text);
  const state = createScanState(options.nodeCount ?? options.mesh?.nodeCount);
  let hotStartFlag: number | undefined;
  let minimumDepth: number | undefined;

  for (let line = reader.next(); line !== null; line = reader.next()) {
    const ref: LineRef = { lineNumber: reader.lineNumber, line };
    const { value } = splitComment(line);

    if (line.includes(KEYWORDS.timeStep)) {
      noteTimeScalar(state, "timeStep", parseFloatField(value, "DT", ref));
    } else if (line.includes(KEYWORDS.hotStart)) {
      hotStartFlag = parseIntegerField(value, "IHOT", ref);
    } else if (line.includes(KEYWORDS.startTime)) {
      noteTimeScalar(state, "startTime", parseFloatField(value, "STATIM", ref));
    } else if (line.includes(KEYWORDS.totalDays)) {
      noteTimeScalar(state, "totalDays", parseFloatField(value, "RNDAY", ref));
    } else if (line.includes(KEYWORDS.ramp)) {
      establishTime(state, parseNumberList(value, "DRAMP", ref), ref);
    } else if (line.includes(KEYWORDS.minimumDepth)) {
      const depth = parseLeadingNumber(value, "H0", ref);
      if (depth.skipped.length > 0) {
        // eslint-disable-next-line no-console
        console.warn(`line ${ref.lineNumber}: skipped non-numeric H0 tokens ${depth.skipped.join(" ")}`);
      }
      minimumDepth = depth.value;
    } else {
      const block = matchChannelMarker(line);
      if (block) decodeMarkedRecord(reader, block, value, state, ref);
    }
  }

  if (state.time.phase !== "timed") {
    throw new MissingPrerequisiteError("document has no DRAMP line; time parameters were never established");
  }
  return {
    time: state.time.time,
    recording: state.recording,
    stations: state.stations,
    hotStartFlag,
    minimumDepth,
    nodeCount: state.nodeCount,
  };
}

/** Reads and scans the run-control document (fort.15) in `dir`. */
export function scan(dir: string, options: ScanOptions = {}): DocumentContext {
  return scanDocument(readDocument(path.join(dir, RUN_CONTROL_FILE)), options);
}
