export class RunControlError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A document or shape file could not be read, written or renamed. */
export class IoError extends RunControlError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`I/O failure on ${path}: ${reason}`, { cause });
    this.path = path;
  }
}

/** A value field is not parseable as the expected number, or has the wrong arity. */
export class FormatError extends RunControlError {
  readonly lineNumber: number | undefined;
  readonly line: string | undefined;

  constructor(message: string, lineNumber?: number, line?: string) {
    super(lineNumber === undefined ? message : `line ${lineNumber}: ${message}`);
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

/**
 * Something the scan needs has not been established yet: a record block before
 * DRAMP, DRAMP before DT/STATIM/RNDAY, or a node count nobody supplied.
 */
export class MissingPrerequisiteError extends RunControlError {}

export class GeometryFileError extends RunControlError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options);
    this.path = path;
  }
}
