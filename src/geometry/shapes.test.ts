import fs from "fs";
import os from "os";
import path from "path";
import { Vector2 } from "three";
import { CIRCLE_SHAPE_FILE, ELLIPSE_SHAPE_FILE } from "../constants";
import { GeometryFileError } from "../run-control/errors";
import {
  contains,
  ellipseFromFoci,
  filterLocations,
  loadShape,
  shapeKindFromFlag,
  trimLocations,
  type GeometryShape,
} from "./shapes";

const circle = (radius: number): GeometryShape => ({ kind: "circle", center: new Vector2(0, 0), radius });

describe("contains", () => {
  describe("circle", () => {
    it("shrinks the radius by a twenty-fifth", () => {
      const shape = circle(25);
      expect(contains(shape, { x: 24, y: 0 })).toBe(true);
      expect(contains(shape, { x: 24.5, y: 0 })).toBe(false);
      expect(contains(shape, { x: 25, y: 0 })).toBe(false);
    });

    it("keeps an off-centre circle in world coordinates", () => {
      const shape: GeometryShape = { kind: "circle", center: new Vector2(100, -50), radius: 50 };
      expect(contains(shape, { x: 140, y: -50 })).toBe(true);
      expect(contains(shape, { x: 0, y: 0 })).toBe(false);
    });
  });

  describe("ellipse", () => {
    it("tests a horizontal ellipse against its semi-axes", () => {
      // semi-axes 5 along x and 3 across
      const shape = ellipseFromFoci(new Vector2(-4, 0), new Vector2(4, 0), 6);
      expect(contains(shape, { x: 0, y: 0 })).toBe(true);
      expect(contains(shape, { x: 4.9, y: 0 })).toBe(true);
      expect(contains(shape, { x: 0, y: 2.9 })).toBe(true);
      expect(contains(shape, { x: 5, y: 0 })).toBe(false);
      expect(contains(shape, { x: 0, y: 3 })).toBe(false);
    });

    it("rotates points into the focal frame", () => {
      // focal axis along (0.6, 0.8), centre (3, 4), semi-axes sqrt(29) and 2
      const shape = ellipseFromFoci(new Vector2(0, 0), new Vector2(6, 8), 4);
      expect(contains(shape, { x: 6, y: 8 })).toBe(true);
      expect(contains(shape, { x: 1.8, y: 4.9 })).toBe(true);
      expect(contains(shape, { x: 1, y: 5.5 })).toBe(false);
    });

    it("handles foci on a vertical line", () => {
      const shape = ellipseFromFoci(new Vector2(0, -4), new Vector2(0, 4), 6);
      expect(shape.kind === "ellipse" && shape.theta).toBe(Math.PI / 2);
      expect(contains(shape, { x: 0, y: 4.9 })).toBe(true);
      expect(contains(shape, { x: 4, y: 0 })).toBe(false);
    });

    it("degenerates to a circle when the foci coincide", () => {
      const shape = ellipseFromFoci(new Vector2(1, 1), new Vector2(1, 1), 4);
      expect(shape).toEqual({ kind: "ellipse", center: new Vector2(1, 1), theta: 0, xAxis: 2, yAxis: 2 });
      expect(contains(shape, { x: 2.9, y: 1 })).toBe(true);
      expect(contains(shape, { x: 3, y: 1 })).toBe(false);
    });
  });
});

describe("filterLocations", () => {
  it("keeps inside locations in their original order", () => {
    const stations = [
      { x: 20, y: 0 },
      { x: 1, y: 1 },
      { x: 0, y: -15 },
      { x: -2, y: 3 },
    ];
    expect(filterLocations(circle(10), stations)).toEqual([{ x: 1, y: 1 }, { x: -2, y: 3 }]);
  });

  it("returns an empty list for an empty input", () => {
    expect(filterLocations(circle(10), [])).toEqual([]);
  });
});

describe("shape files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "shape-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads a circle from its centre and radius", () => {
    fs.writeFileSync(path.join(dir, CIRCLE_SHAPE_FILE), "10.0 -5.0   centre\n2.5e1\n");
    expect(loadShape("circle", dir)).toEqual({ kind: "circle", center: new Vector2(10, -5), radius: 25 });
  });

  it("loads an ellipse from its foci and width", () => {
    fs.writeFileSync(path.join(dir, ELLIPSE_SHAPE_FILE), "-4 0\n4 0\n6\n");
    const shape = loadShape("ellipse", dir);
    expect(shape).toMatchObject({ kind: "ellipse", center: new Vector2(0, 0), xAxis: 5, yAxis: 3 });
    expect(shape.kind === "ellipse" && Math.abs(shape.theta)).toBe(0);
  });

  it("trims locations with the shape in a directory", () => {
    fs.writeFileSync(path.join(dir, CIRCLE_SHAPE_FILE), "0 0\n10\n");
    expect(trimLocations("circle", dir, [{ x: 1, y: 1 }, { x: 20, y: 0 }])).toEqual([{ x: 1, y: 1 }]);
  });

  it("reports a missing file", () => {
    expect(() => loadShape("ellipse", dir)).toThrow(GeometryFileError);
  });

  it("reports a short line", () => {
    fs.writeFileSync(path.join(dir, CIRCLE_SHAPE_FILE), "0.0\n25\n");
    expect(() => loadShape("circle", dir)).toThrow(
      `${path.join(dir, CIRCLE_SHAPE_FILE)}: line 1 needs 2 number(s), found 1`,
    );
  });

  it("reports a non-numeric value", () => {
    fs.writeFileSync(path.join(dir, CIRCLE_SHAPE_FILE), "0 0\nwide\n");
    expect(() => loadShape("circle", dir)).toThrow(GeometryFileError);
  });

  it("rejects a zero width", () => {
    fs.writeFileSync(path.join(dir, ELLIPSE_SHAPE_FILE), "0 0\n1 1\n0\n");
    expect(() => loadShape("ellipse", dir)).toThrow("width must be positive, got 0");
  });
});

describe("shapeKindFromFlag", () => {
  it("maps 0 to ellipse and 1 to circle", () => {
    expect(shapeKindFromFlag(0)).toBe("ellipse");
    expect(shapeKindFromFlag(1)).toBe("circle");
  });

  it("rejects other flags", () => {
    expect(() => shapeKindFromFlag(2)).toThrow(RangeError);
  });
});
