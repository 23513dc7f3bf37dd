import path from "path";
import { RUN_CONTROL_FILE, TEMP_RUN_CONTROL_FILE } from "../constants";
import { formatHotStartCadenceLine, formatValueLine } from "./fields";
import { KEYWORDS } from "./keywords";
import { LineReader, readDocument, replaceAtomically, splitComment } from "./line-io";

function checkInteger(value: number, name: string): void {
  if (!Number.isInteger(value)) throw new RangeError(`${name} must be an integer, got ${value}`);
}

/**
 * Rewrites every line containing `keyword` through `rewrite`, copying all other
 * lines, via a temp file renamed over the document. Returns the number of
 * lines rewritten.
 */
function rewriteKeywordLine(
  dir: string,
  keyword: string,
  rewrite: (comment: string, terminator: string) => string,
): number {
  const file = path.join(dir, RUN_CONTROL_FILE);
  const reader = new LineReader(readDocument(file));
  return replaceAtomically(file, path.join(dir, TEMP_RUN_CONTROL_FILE), (writer) => {
    let rewritten = 0;
    for (let line = reader.next(); line !== null; line = reader.next()) {
      if (line.includes(keyword)) {
        const { comment, terminator } = splitComment(line);
        writer.write(rewrite(comment, terminator));
        rewritten++;
      } else {
        writer.write(line);
      }
    }
    return rewritten;
  });
}

/** Sets IHOT, the hot start parameter (0 = cold start, otherwise the unit to read hot start data from). */
export function setHotStartFlag(value: number, dir: string): number {
  checkInteger(value, "IHOT");
  return rewriteKeywordLine(dir, KEYWORDS.hotStart, (comment, terminator) =>
    formatValueLine(value, comment, terminator));
}

/**
 * Sets NHSTAR (which kind of hot start file to write) and NHSINC (every how
 * many time steps to write it).
 */
export function setHotStartOutputCadence(kind: number, interval: number, dir: string): number {
  checkInteger(kind, "NHSTAR");
  checkInteger(interval, "NHSINC");
  return rewriteKeywordLine(dir, KEYWORDS.hotStartCadence, (comment, terminator) =>
    formatHotStartCadenceLine(kind, interval, comment, terminator));
}
