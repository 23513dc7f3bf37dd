import {
  COMMENT_DELIMITER,
  HOT_START_KIND_WIDTH,
  RNDAY_DECIMALS,
  RNDAY_DELIMITER_WIDTH,
  RNDAY_FIELD_WIDTH,
  STATION_COORDINATE_PRECISION,
  VALUE_FIELD_WIDTH,
} from "../constants";
import type { StationLocation } from "../types/run-control-types";
import { FormatError } from "./errors";

/** Where a value field came from, for error messages. */
export interface LineRef {
  lineNumber: number;
  line: string;
}

const FLOAT_TOKEN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const INTEGER_TOKEN = /^[-+]?\d+$/;
const NUMBER_IN_TEXT = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/g;

export function isNumberToken(token: string): boolean {
  return FLOAT_TOKEN.test(token);
}

function fail(message: string, ref?: LineRef): never {
  throw new FormatError(message, ref?.lineNumber, ref?.line);
}

function tokens(value: string): string[] {
  const trimmed = value.trim();
  return trimmed === "" ? [] : trimmed.split(/\s+/);
}

// ── Parsing ──

export function parseFloatField(value: string, name: string, ref?: LineRef): number {
  const text = value.trim();
  if (!FLOAT_TOKEN.test(text)) fail(`${name} is not a number: "${text}"`, ref);
  return Number(text);
}

export function parseIntegerField(value: string, name: string, ref?: LineRef): number {
  const text = value.trim();
  if (!INTEGER_TOKEN.test(text)) fail(`${name} is not an integer: "${text}"`, ref);
  return Number(text);
}

/**
 * Whitespace-separated numbers. Every token must be numeric; `arity` pins the
 * count, otherwise at least one is required.
 */
export function parseNumberList(value: string, name: string, ref?: LineRef, arity?: number): number[] {
  const parts = tokens(value);
  if (parts.length === 0) fail(`${name} is empty`, ref);
  if (arity !== undefined && parts.length !== arity) {
    fail(`${name} needs ${arity} values, found ${parts.length}`, ref);
  }
  return parts.map((part) => {
    if (!FLOAT_TOKEN.test(part)) fail(`${name} contains a non-numeric value: "${part}"`, ref);
    return Number(part);
  });
}

/**
 * First numeric whitespace-separated token. Tokens that do not parse are
 * skipped and returned so the caller can report them.
 */
export function parseLeadingNumber(value: string, name: string, ref?: LineRef): { value: number; skipped: string[] } {
  const skipped: string[] = [];
  for (const part of tokens(value)) {
    if (FLOAT_TOKEN.test(part)) return { value: Number(part), skipped };
    skipped.push(part);
  }
  return fail(`${name} has no numeric value`, ref);
}

/** First and last numbers anywhere in the text; annotation between or after them is ignored. */
export function parseCoordinatePair(value: string, ref?: LineRef): StationLocation {
  const found = value.match(NUMBER_IN_TEXT) ?? [];
  if (found.length < 2) fail(`station line needs two coordinates, found ${found.length}`, ref);
  return { x: Number(found[0]), y: Number(found[found.length - 1]) };
}

// ── Formatting ──

/** Scientific notation with an upper-case, signed, at least two-digit exponent: 1.25000000E+02. */
export function formatScientific(value: number, precision = STATION_COORDINATE_PRECISION): string {
  if (!Number.isFinite(value)) throw new RangeError(`cannot format ${value} in scientific notation`);
  const [mantissa, exponent] = value.toExponential(precision).split("e");
  const sign = exponent.startsWith("-") ? "-" : "+";
  const negativeZero = Object.is(value, -0) ? "-" : "";
  return `${negativeZero}${mantissa}E${sign}${exponent.replace(/^[-+]/, "").padStart(2, "0")}`;
}

export function formatStationLine(location: StationLocation, terminator: string): string {
  return `${formatScientific(location.x)} ${formatScientific(location.y)}${terminator}`;
}

/** " <value, left-aligned in 35> !<comment>" */
export function formatValueLine(value: number | string, comment: string, terminator: string): string {
  return ` ${String(value).padEnd(VALUE_FIELD_WIDTH)} ${COMMENT_DELIMITER}${comment}${terminator}`;
}

export function formatRndayLine(days: number, comment: string, terminator: string): string {
  const value = days.toFixed(RNDAY_DECIMALS).padEnd(RNDAY_FIELD_WIDTH);
  return ` ${value} ${COMMENT_DELIMITER.padStart(RNDAY_DELIMITER_WIDTH)}${comment}${terminator}`;
}

export function formatHotStartCadenceLine(
  kind: number,
  interval: number,
  comment: string,
  terminator: string,
): string {
  const kindField = String(kind).padEnd(HOT_START_KIND_WIDTH);
  return ` ${kindField} ${String(interval).padEnd(VALUE_FIELD_WIDTH)} ${COMMENT_DELIMITER}${comment}${terminator}`;
}
