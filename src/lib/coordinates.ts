// src/lib/coordinates.ts
import { ConfigError } from "./errors";

export type PointSpec = { kind: "point"; lat: number; lon: number };

export type GridSpec = {
  kind: "grid";
  latMin: number;
  lonMin: number;
  latMax: number;
  lonMax: number;
  latStep: number;
  lonStep: number;
};

export type CoordinateSpec = PointSpec | GridSpec;

export const DECIMAL_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

type BBox = [number, number, number, number]; // [latMin, lonMin, latMax, lonMax]

/**
 * Fixed-point rendering with exactly `digits` decimals. Number#toFixed switches
 * to exponent notation from 1e21 upwards; such doubles are integral anyway.
 */
export function formatFixed(value: number, digits: number): string {
  if (!Number.isFinite(value) || Math.abs(value) < 1e21) return value.toFixed(digits);
  return `${BigInt(value).toString()}.${"0".repeat(digits)}`;
}

const f6 = (v: number) => formatFixed(v, 6);

export function pointSegment(lat: number, lon: number): string {
  return `${f6(lat)},${f6(lon)}`;
}

// lat_top,lon_left_lat_bottom,lon_right:step_lat,step_lon
export function gridSegment(g: Omit<GridSpec, "kind">): string {
  const latTop = Math.max(g.latMin, g.latMax);
  const latBottom = Math.min(g.latMin, g.latMax);
  const lonLeft = Math.min(g.lonMin, g.lonMax);
  const lonRight = Math.max(g.lonMin, g.lonMax);
  return `${f6(latTop)},${f6(lonLeft)}_${f6(latBottom)},${f6(lonRight)}:${f6(g.latStep)},${f6(g.lonStep)}`;
}

export function coordinateSegment(c: CoordinateSpec): string {
  switch (c.kind) {
    case "point":
      return pointSegment(c.lat, c.lon);
    case "grid":
      return gridSegment(c);
  }
}

function parseNumbers(raw: string, expected: number, what: string): number[] {
  const parts = raw.split(",");
  if (parts.length !== expected) {
    throw new ConfigError(
      `Invalid --bbox or --grid-steps: ${what} needs ${expected} comma-separated values, got ${parts.length}`
    );
  }
  return parts.map((p) => {
    const n = DECIMAL_RE.test(p.trim()) ? Number(p) : NaN;
    if (!Number.isFinite(n)) {
      throw new ConfigError(`Invalid --bbox or --grid-steps: could not convert '${p}' to a number`);
    }
    return n;
  });
}

export function parseBbox(raw: string): BBox {
  const [latMin, lonMin, latMax, lonMax] = parseNumbers(raw, 4, "bbox");
  return [latMin, lonMin, latMax, lonMax];
}

export function parseGridSteps(raw: string): [number, number] {
  const [dlat, dlon] = parseNumbers(raw, 2, "grid steps");
  if (dlat <= 0 || dlon <= 0) {
    throw new ConfigError(`Invalid --bbox or --grid-steps: grid steps must be positive, got ${raw}`);
  }
  return [dlat, dlon];
}

export function gridFromStrings(bbox: string, steps: string): GridSpec {
  const [latMin, lonMin, latMax, lonMax] = parseBbox(bbox);
  const [latStep, lonStep] = parseGridSteps(steps);
  return { kind: "grid", latMin, lonMin, latMax, lonMax, latStep, lonStep };
}
