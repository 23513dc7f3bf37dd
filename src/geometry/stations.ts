import type { DomainExtent, MeshDomain, StationLocation } from "../types/run-control-types";

/** Rows of [x, y]. */
export type CoordinateTable = Array<[number, number]>;

export function toLocations(table: ReadonlyArray<readonly [number, number]>): StationLocation[] {
  return table.map(([x, y]) => ({ x, y }));
}

export function toTable(locations: readonly StationLocation[]): CoordinateTable {
  return locations.map(({ x, y }): [number, number] => [x, y]);
}

/** Bounding box of the mesh nodes. */
export function extentOf(mesh: MeshDomain): DomainExtent {
  if (mesh.x.length === 0 || mesh.x.length !== mesh.y.length) {
    throw new RangeError(`mesh needs matching, non-empty coordinate arrays (x: ${mesh.x.length}, y: ${mesh.y.length})`);
  }
  let xMin = Infinity;
  let xMax = -Infinity;
  let yMin = Infinity;
  let yMax = -Infinity;
  for (let i = 0; i < mesh.x.length; i++) {
    xMin = Math.min(xMin, mesh.x[i]);
    xMax = Math.max(xMax, mesh.x[i]);
    yMin = Math.min(yMin, mesh.y[i]);
    yMax = Math.max(yMax, mesh.y[i]);
  }
  return { xMin, xMax, yMin, yMax };
}

/** n evenly spaced values from start to stop inclusive. A single value sits at start. */
function linspace(start: number, stop: number, n: number): number[] {
  if (n === 1) return [start];
  const step = (stop - start) / (n - 1);
  const values: number[] = [];
  for (let i = 0; i < n; i++) {
    values.push(i === n - 1 ? stop : start + i * step);
  }
  return values;
}

function checkCount(count: number, axis: string): void {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`station count along ${axis} must be a positive integer, got ${count}`);
  }
}

function isExtent(domain: DomainExtent | MeshDomain): domain is DomainExtent {
  return "xMin" in domain;
}

/**
 * Regular lattice of stations spanning the domain extent, `count` per axis
 * (or `[countX, countY]`). Points are ordered x-major: every y for the first
 * x, then every y for the next.
 */
export function generateGrid(
  domain: DomainExtent | MeshDomain,
  count: number | readonly [number, number],
): StationLocation[] {
  const extent = isExtent(domain) ? domain : extentOf(domain);
  const [countX, countY] = typeof count === "number" ? [count, count] : count;
  checkCount(countX, "x");
  checkCount(countY, "y");

  const xs = linspace(extent.xMin, extent.xMax, countX);
  const ys = linspace(extent.yMin, extent.yMax, countY);
  const stations: StationLocation[] = [];
  for (const x of xs) {
    for (const y of ys) {
      stations.push({ x, y });
    }
  }
  return stations;
}
