import fs from "fs";
import { COMMENT_DELIMITER } from "../constants";
import { IoError } from "./errors";

/**
 * Documents are decoded as latin1 so that every byte maps to exactly one
 * character and copied lines are written back unchanged.
 */
const ENCODING: BufferEncoding = "latin1";

/** A line split at the first comment delimiter. */
export interface SplitLine {
  /** Text before the delimiter (the whole line when there is none). */
  value: string;
  /** Text after the delimiter, without the line terminator. */
  comment: string;
  /** "\n", "\r\n", or "" for a final line without a terminator. */
  terminator: string;
}

export function splitComment(line: string): SplitLine {
  const terminator = line.endsWith("\r\n") ? "\r\n" : line.endsWith("\n") ? "\n" : "";
  const body = line.slice(0, line.length - terminator.length);
  const at = body.indexOf(COMMENT_DELIMITER);
  if (at < 0) return { value: body, comment: "", terminator };
  return { value: body.slice(0, at), comment: body.slice(at + 1), terminator };
}

/** Splits text into lines, each keeping its own terminator. */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Forward-only cursor over the lines of a document. Lines are returned with
 * their terminators so they can be copied verbatim.
 */
export class LineReader {
  private readonly lines: string[];
  private position = 0;

  constructor(text: string) {
    this.lines = splitLines(text);
  }

  /** 1-based number of the line most recently returned by next(). */
  get lineNumber(): number {
    return this.position;
  }

  /** Returns the next line, or null at end of input. */
  next(): string | null {
    if (this.position >= this.lines.length) return null;
    return this.lines[this.position++];
  }
}

export function readDocument(path: string): string {
  try {
    return fs.readFileSync(path, ENCODING);
  } catch (err) {
    throw new IoError(path, err);
  }
}

/** Line sink over a file descriptor opened for writing. */
export class LineWriter {
  private fd: number | null;

  constructor(readonly path: string) {
    try {
      this.fd = fs.openSync(path, "w");
    } catch (err) {
      throw new IoError(path, err);
    }
  }

  write(text: string): void {
    if (this.fd === null) throw new IoError(this.path, new Error("writer is closed"));
    try {
      fs.writeSync(this.fd, text, null, ENCODING);
    } catch (err) {
      throw new IoError(this.path, err);
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      fs.closeSync(fd);
    } catch (err) {
      throw new IoError(this.path, err);
    }
  }
}

/** Opens `path` for writing, runs `fn`, and closes the file on every exit path. */
export function withLineWriter<T>(path: string, fn: (writer: LineWriter) => T): T {
  const writer = new LineWriter(path);
  let result: T;
  try {
    result = fn(writer);
  } catch (err) {
    try {
      writer.close();
    } catch {
      // the failure from fn is the one reported
    }
    throw err;
  }
  writer.close();
  return result;
}

/**
 * Writes `tempPath` through `fn`, then renames it over `targetPath`. If anything
 * fails the temp file is removed and the target is left as it was.
 */
export function replaceAtomically<T>(
  targetPath: string,
  tempPath: string,
  fn: (writer: LineWriter) => T,
): T {
  try {
    const result = withLineWriter(tempPath, fn);
    try {
      fs.renameSync(tempPath, targetPath);
    } catch (err) {
      throw new IoError(targetPath, err);
    }
    return result;
  } catch (err) {
    fs.rmSync(tempPath, { force: true });
    throw err;
  }
}
