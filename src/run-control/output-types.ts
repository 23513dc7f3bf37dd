import type { ChannelKey } from "../types/run-control-types";

export interface OutputType {
  /** The block lists its stations; otherwise every mesh node is recorded. */
  readonly explicitStations: boolean;
  /** Values per point per observation. */
  readonly columnCount: number;
}

function outputType(explicitStations: boolean, columnCount: number): OutputType {
  return Object.freeze({ explicitStations, columnCount });
}

/**
 * Every output channel the simulation can record, keyed by the file it writes.
 *
 * 61/62: elevation and velocity at stations. 63/64: global elevation and velocity.
 * 71/72: pressure and wind at met stations. 73/74: global pressure and wind.
 * The remaining 63-series files are global maxima and flags, one value per node.
 */
export const OUTPUT_TYPES: Readonly<Record<ChannelKey, OutputType>> = Object.freeze({
  fort61: outputType(true, 1),
  fort62: outputType(true, 2),
  fort63: outputType(false, 1),
  fort64: outputType(false, 2),
  fort71: outputType(true, 1),
  fort72: outputType(true, 2),
  fort73: outputType(false, 1),
  fort74: outputType(false, 2),
  tinun63: outputType(false, 1),
  maxele63: outputType(false, 1),
  maxvel63: outputType(false, 1),
  nodeflag63: outputType(false, 1),
  rising63: outputType(false, 1),
  elemaxdry63: outputType(false, 1),
});

export function isChannelKey(key: string): key is ChannelKey {
  return Object.prototype.hasOwnProperty.call(OUTPUT_TYPES, key);
}

export function lookupOutputType(key: string): OutputType {
  if (!isChannelKey(key)) throw new RangeError(`Unknown output channel: ${key}`);
  return OUTPUT_TYPES[key];
}
