import fs from "fs";
import path from "path";
import { Vector2 } from "three";
import { CIRCLE_MARGIN_DIVISOR, CIRCLE_SHAPE_FILE, ELLIPSE_SHAPE_FILE } from "../constants";
import { GeometryFileError } from "../run-control/errors";
import { isNumberToken } from "../run-control/fields";
import type { ShapeKind, StationLocation } from "../types/run-control-types";

/**
 * Sub-domain boundary.
 *
 * An ellipse is stored in its local frame: `theta` is the angle of the focal
 * axis to the positive x-axis, `xAxis` the semi-axis along it, `yAxis` the one
 * across it.
 */
export type GeometryShape =
  | {
      readonly kind: "ellipse";
      readonly center: Vector2;
      readonly theta: number;
      readonly xAxis: number;
      readonly yAxis: number;
    }
  | { readonly kind: "circle"; readonly center: Vector2; readonly radius: number };

const ORIGIN = new Vector2(0, 0);

/** Maps the numeric shape flag used by run scripts: 0 = ellipse, 1 = circle. */
export function shapeKindFromFlag(flag: number): ShapeKind {
  if (flag === 0) return "ellipse";
  if (flag === 1) return "circle";
  throw new RangeError(`Unknown sub-domain shape flag: ${flag}`);
}

export function shapeFilePath(kind: ShapeKind, dir: string): string {
  return path.join(dir, kind === "ellipse" ? ELLIPSE_SHAPE_FILE : CIRCLE_SHAPE_FILE);
}

function readShapeLines(file: string): string[] {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (err) {
    throw new GeometryFileError(file, "cannot read shape description", { cause: err });
  }
  return text.split(/\r?\n/);
}

/** The first `count` numbers on line `index` (0-based); anything after them is ignored. */
function numbersOnLine(lines: string[], index: number, count: number, file: string): number[] {
  const parts = (lines[index] ?? "").trim().split(/\s+/).filter((part) => part !== "");
  if (parts.length < count) {
    throw new GeometryFileError(file, `line ${index + 1} needs ${count} number(s), found ${parts.length}`);
  }
  return parts.slice(0, count).map((part) => {
    if (!isNumberToken(part)) throw new GeometryFileError(file, `line ${index + 1}: "${part}" is not a number`);
    return Number(part);
  });
}

function positive(value: number, name: string, file: string): number {
  if (!(value > 0)) throw new GeometryFileError(file, `${name} must be positive, got ${value}`);
  return value;
}

/**
 * Ellipse from its two foci and its width (the minor axis length). Foci that
 * share an x-coordinate give a vertical focal axis; coincident foci give a
 * circle of diameter `width`.
 */
export function ellipseFromFoci(p1: Vector2, p2: Vector2, width: number): GeometryShape {
  const center = p1.clone().add(p2).multiplyScalar(0.5);
  const d = p1.distanceTo(p2);
  const dx = p1.x - p2.x;
  const dy = p1.y - p2.y;
  let theta: number;
  if (dx !== 0) {
    theta = Math.atan(dy / dx);
  } else {
    theta = dy === 0 ? 0 : Math.PI / 2;
  }
  const xAxis = Math.sqrt((0.5 * d) ** 2 + (0.5 * width) ** 2);
  return { kind: "ellipse", center, theta, xAxis, yAxis: width / 2 };
}

function loadEllipse(file: string): GeometryShape {
  const lines = readShapeLines(file);
  const [x1, y1] = numbersOnLine(lines, 0, 2, file);
  const [x2, y2] = numbersOnLine(lines, 1, 2, file);
  const [width] = numbersOnLine(lines, 2, 1, file);
  return ellipseFromFoci(new Vector2(x1, y1), new Vector2(x2, y2), positive(width, "width", file));
}

function loadCircle(file: string): GeometryShape {
  const lines = readShapeLines(file);
  const [cx, cy] = numbersOnLine(lines, 0, 2, file);
  const [radius] = numbersOnLine(lines, 1, 1, file);
  return { kind: "circle", center: new Vector2(cx, cy), radius: positive(radius, "radius", file) };
}

/** Reads shape.e14 or shape.c14 from a sub-domain directory. */
export function loadShape(kind: ShapeKind, dir: string): GeometryShape {
  const file = shapeFilePath(kind, dir);
  return kind === "ellipse" ? loadEllipse(file) : loadCircle(file);
}

/**
 * Circle: inside or on a circle shrunk by 4% of its radius.
 * Ellipse: strictly inside, after moving the point into the ellipse frame.
 */
export function contains(shape: GeometryShape, point: StationLocation): boolean {
  const p = new Vector2(point.x, point.y);
  switch (shape.kind) {
    case "circle": {
      const margin = shape.radius - shape.radius / CIRCLE_MARGIN_DIVISOR;
      return shape.center.distanceToSquared(p) <= margin ** 2;
    }
    case "ellipse": {
      const local = p.sub(shape.center).rotateAround(ORIGIN, -shape.theta);
      return local.x ** 2 / shape.xAxis ** 2 + local.y ** 2 / shape.yAxis ** 2 < 1;
    }
  }
}

/** Keeps the locations inside `shape`, in their original order. */
export function filterLocations<T extends StationLocation>(shape: GeometryShape, locations: readonly T[]): T[] {
  return locations.filter((location) => contains(shape, location));
}

export function trimLocations<T extends StationLocation>(kind: ShapeKind, dir: string, locations: readonly T[]): T[] {
  return filterLocations(loadShape(kind, dir), locations);
}
