import type { ChannelKey } from "../types/run-control-types";
import { OUTPUT_TYPES } from "./output-types";

/**
 * Keyword tokens for the global parameter lines. Lines are recognised by plain
 * substring search over the whole line, comment included.
 */
export const KEYWORDS = {
  timeStep: "DT",
  hotStart: "IHOT",
  startTime: "STATIM",
  totalDays: "RNDAY",
  ramp: "DRAMP",
  minimumDepth: "H0",
  forcingFrequencies: "NBFR",
  forcingEnd: "ANGINN",
  fluxFrequencies: "NFFR",
  elevationStations: "NOUTE",
  hotStartCadence: "NHSTAR",
} as const;

export type RecordBlock =
  | { readonly kind: "single"; readonly key: ChannelKey }
  | { readonly kind: "paired"; readonly primary: ChannelKey; readonly secondary: ChannelKey }
  /** Recognised but not decoded (concentration output). */
  | { readonly kind: "ignored" };

export interface ChannelMarker {
  readonly pattern: RegExp;
  readonly block: RecordBlock;
}

/** Output block headers, tested in this order after the global keywords. */
export const CHANNEL_MARKERS: readonly ChannelMarker[] = [
  { pattern: /UNIT\s+61\b/, block: { kind: "single", key: "fort61" } },
  { pattern: /UNIT\s+62\b/, block: { kind: "single", key: "fort62" } },
  { pattern: /NOUTC/, block: { kind: "ignored" } },
  { pattern: /UNIT\s+71\/72\b/, block: { kind: "paired", primary: "fort71", secondary: "fort72" } },
  { pattern: /NOUTGE/, block: { kind: "single", key: "fort63" } },
  { pattern: /UNIT\s+64\b/, block: { kind: "single", key: "fort64" } },
  { pattern: /NOUTGC/, block: { kind: "ignored" } },
  { pattern: /UNIT\s+73\/74\b/, block: { kind: "paired", primary: "fort73", secondary: "fort74" } },
];

export function matchChannelMarker(line: string): RecordBlock | undefined {
  return CHANNEL_MARKERS.find((marker) => marker.pattern.test(line))?.block;
}

/** True when the block carries its own station list (and so is filtered on rewrite). */
export function hasStationList(block: RecordBlock): boolean {
  switch (block.kind) {
    case "single":
      return OUTPUT_TYPES[block.key].explicitStations;
    case "paired":
      return OUTPUT_TYPES[block.primary].explicitStations;
    case "ignored":
      return false;
  }
}
