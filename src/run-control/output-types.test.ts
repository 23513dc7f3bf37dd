import { OUTPUT_TYPES, isChannelKey, lookupOutputType } from "./output-types";
import { CHANNEL_MARKERS, hasStationList, matchChannelMarker } from "./keywords";

describe("OUTPUT_TYPES", () => {
  it("lists station channels with their column counts", () => {
    expect(OUTPUT_TYPES.fort61).toEqual({ explicitStations: true, columnCount: 1 });
    expect(OUTPUT_TYPES.fort62).toEqual({ explicitStations: true, columnCount: 2 });
    expect(OUTPUT_TYPES.fort71).toEqual({ explicitStations: true, columnCount: 1 });
    expect(OUTPUT_TYPES.fort72).toEqual({ explicitStations: true, columnCount: 2 });
  });

  it("records whole-mesh channels without station lists", () => {
    expect(OUTPUT_TYPES.fort63).toEqual({ explicitStations: false, columnCount: 1 });
    expect(OUTPUT_TYPES.fort64).toEqual({ explicitStations: false, columnCount: 2 });
    expect(OUTPUT_TYPES.fort74).toEqual({ explicitStations: false, columnCount: 2 });
    expect(OUTPUT_TYPES.maxele63).toEqual({ explicitStations: false, columnCount: 1 });
  });

  it("has 14 channels", () => {
    expect(Object.keys(OUTPUT_TYPES)).toHaveLength(14);
  });

  it("is immutable", () => {
    expect(Object.isFrozen(OUTPUT_TYPES)).toBe(true);
    expect(Object.isFrozen(OUTPUT_TYPES.fort61)).toBe(true);
  });

  it("guards and looks up channel keys", () => {
    expect(isChannelKey("fort62")).toBe(true);
    expect(isChannelKey("fort99")).toBe(false);
    expect(isChannelKey("toString")).toBe(false);
    expect(lookupOutputType("rising63").columnCount).toBe(1);
    expect(() => lookupOutputType("fort99")).toThrow(RangeError);
  });
});

describe("channel markers", () => {
  it("match UNIT markers with any spacing", () => {
    expect(matchChannelMarker("1 0 10 360 ! NOUTE ... (UNIT  61)\n")).toEqual({ kind: "single", key: "fort61" });
    expect(matchChannelMarker("1 0 10 360 ! NOUTV ... UNIT 62\n")).toEqual({ kind: "single", key: "fort62" });
  });

  it("match paired blocks", () => {
    expect(matchChannelMarker("! MET STATION OUTPUT (UNIT 71/72)")).toEqual({
      kind: "paired", primary: "fort71", secondary: "fort72",
    });
    expect(matchChannelMarker("! GLOBAL WIND OUTPUT (UNIT 73/74)")).toEqual({
      kind: "paired", primary: "fort73", secondary: "fort74",
    });
  });

  it("match the global elevation block by its NOUTGE name", () => {
    expect(matchChannelMarker("1 0 10 3600 ! NOUTGE,TOUTSGE,TOUTFGE,NSPOOLGE")).toEqual({ kind: "single", key: "fort63" });
  });

  it("recognise concentration blocks without decoding them", () => {
    expect(matchChannelMarker("! NOUTC,TOUTSC")).toEqual({ kind: "ignored" });
    expect(matchChannelMarker("! NOUTGC,TOUTSGC")).toEqual({ kind: "ignored" });
  });

  it("ignore other unit numbers", () => {
    expect(matchChannelMarker("100 ! NSCREEN - OUTPUT TO UNIT 6")).toBeUndefined();
    expect(matchChannelMarker("! UNIT 610")).toBeUndefined();
  });

  it("flag the blocks that carry station lists", () => {
    const withStations = CHANNEL_MARKERS.filter((marker) => hasStationList(marker.block));
    expect(withStations.map((marker) => marker.block)).toEqual([
      { kind: "single", key: "fort61" },
      { kind: "single", key: "fort62" },
      { kind: "paired", primary: "fort71", secondary: "fort72" },
    ]);
  });
});
