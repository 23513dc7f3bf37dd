import path from "path";
import { RNDAY_SCALE, RUN_CONTROL_FILE } from "../constants";
import { filterLocations, loadShape, type GeometryShape } from "../geometry/shapes";
import type { ChannelKey, ShapeKind } from "../types/run-control-types";
import { FormatError } from "./errors";
import {
  formatRndayLine,
  formatStationLine,
  formatValueLine,
  parseFloatField,
  parseNumberList,
  type LineRef,
} from "./fields";
import { KEYWORDS, hasStationList, matchChannelMarker, type RecordBlock } from "./keywords";
import { LineReader, readDocument, splitComment, withLineWriter } from "./line-io";
import { decodeMarkedRecord } from "./record-decoder";
import { createScanState, establishTime, noteTimeScalar, type ScanState } from "./scan-state";

export interface LineSink {
  write(text: string): void;
}

export interface StationTrim {
  /** Stations listed in the full-domain document. */
  readonly before: number;
  /** Stations written to the sub-domain document. */
  readonly after: number;
}

export interface RewriteSummary {
  /** Days written on the RNDAY line, or undefined when there was none. */
  readonly totalDays: number | undefined;
  /** Station counts per rewritten channel; paired channels appear under both keys. */
  readonly stations: ReadonlyMap<ChannelKey, StationTrim>;
}

/** Reads lines until one contains `token` and returns it; the lines before it are dropped. */
function skipUntil(reader: LineReader, token: string): string {
  for (let line = reader.next(); line !== null; line = reader.next()) {
    if (line.includes(token)) return line;
  }
  throw new FormatError(`document ends before a line containing ${token}`);
}

function blockKeys(block: RecordBlock): ChannelKey[] {
  switch (block.kind) {
    case "single":
      return [block.key];
    case "paired":
      return [block.primary, block.secondary];
    case "ignored":
      return [];
  }
}

class SubDomainRewriter {
  private readonly reader: LineReader;
  private readonly state: ScanState = createScanState();
  private readonly trims = new Map<ChannelKey, StationTrim>();
  private totalDays: number | undefined;

  constructor(
    text: string,
    private readonly shape: GeometryShape,
    private readonly sink: LineSink,
  ) {
    this.reader = new LineReader(text);
  }

  run(): RewriteSummary {
    const { reader, sink, state } = this;
    for (let line = reader.next(); line !== null; line = reader.next()) {
      const ref: LineRef = { lineNumber: reader.lineNumber, line };
      const { value, comment, terminator } = splitComment(line);

      if (line.includes(KEYWORDS.timeStep)) {
        sink.write(line);
        noteTimeScalar(state, "timeStep", parseFloatField(value, "DT", ref));
      } else if (line.includes(KEYWORDS.startTime)) {
        sink.write(line);
        noteTimeScalar(state, "startTime", parseFloatField(value, "STATIM", ref));
      } else if (line.includes(KEYWORDS.totalDays)) {
        const days = parseFloatField(value, "RNDAY", ref) * RNDAY_SCALE;
        this.totalDays = days;
        noteTimeScalar(state, "totalDays", days);
        sink.write(formatRndayLine(days, comment, terminator));
      } else if (line.includes(KEYWORDS.ramp)) {
        sink.write(line);
        establishTime(state, parseNumberList(value, "DRAMP", ref), ref);
      } else if (line.includes(KEYWORDS.forcingFrequencies)) {
        // The sub-domain has no open ocean boundary to force.
        sink.write(formatValueLine(0, comment, terminator));
        sink.write(skipUntil(reader, KEYWORDS.forcingEnd));
      } else if (line.includes(KEYWORDS.fluxFrequencies)) {
        // Flux forcing goes too, up to the elevation station block that follows it.
        const header = skipUntil(reader, KEYWORDS.elevationStations);
        sink.write(header);
        this.rewriteStations({ kind: "single", key: "fort61" }, header);
      } else {
        const block = matchChannelMarker(line);
        sink.write(line);
        if (block && hasStationList(block)) this.rewriteStations(block, line);
      }
    }
    return { totalDays: this.totalDays, stations: this.trims };
  }

  /** Decodes the station block after `header` and writes back only the stations inside the shape. */
  private rewriteStations(block: RecordBlock, header: string): void {
    const ref: LineRef = { lineNumber: this.reader.lineNumber, line: header };
    const listing = decodeMarkedRecord(this.reader, block, splitComment(header).value, this.state, ref)?.listing;
    if (!listing) return;

    const kept = filterLocations(this.shape, listing.stations);
    const eol = listing.terminator || "\n";
    this.sink.write(formatValueLine(kept.length, listing.description, eol));
    for (const station of kept) {
      this.sink.write(formatStationLine(station, eol));
    }
    for (const key of blockKeys(block)) {
      this.trims.set(key, { before: listing.stations.length, after: kept.length });
    }
  }
}

/**
 * Streams a sub-domain version of full-domain run-control text into `sink`.
 *
 * Lines are copied verbatim except: RNDAY is scaled by 0.995; NBFR becomes 0
 * and the forcing frequency lines up to ANGINN are dropped; an NFFR block is
 * dropped up to the NOUTE line; station lists of the 61, 62 and 71/72 blocks
 * keep only the stations inside `shape`.
 */
export function rewriteDocument(text: string, shape: GeometryShape, sink: LineSink): RewriteSummary {
  return new SubDomainRewriter(text, shape, sink).run();
}

/**
 * Writes `<subDir>/fort.15` from `<fullDir>/fort.15`, filtering stations by the
 * shape described in `subDir`. After an error the sub-domain document may be
 * partially written and should be discarded.
 */
export function rewriteForSubDomain(kind: ShapeKind, fullDir: string, subDir: string): RewriteSummary {
  const shape = loadShape(kind, subDir);
  const text = readDocument(path.join(fullDir, RUN_CONTROL_FILE));
  return withLineWriter(path.join(subDir, RUN_CONTROL_FILE), (writer) => rewriteDocument(text, shape, writer));
}
