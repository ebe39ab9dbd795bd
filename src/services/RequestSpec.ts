// src/services/RequestSpec.ts
import type { CliOptions } from "../cli";
import { CoordinateSpec, coordinateSegment, gridFromStrings } from "../lib/coordinates";
import { log } from "../lib/logger";
import { TimeSpec, explicitTimeSpec, generateTimeSpec } from "../lib/timeSpec";
import { OutputFormat, buildUrl } from "../lib/urls";

export type RequestSpec = {
  baseUrl: string;
  time: TimeSpec;
  coordinates: CoordinateSpec;
  parameters: string;   // opaque, passed through to the API
  format: OutputFormat;
};

export type QueryOptions = Pick<
  CliOptions,
  "lat" | "lon" | "bbox" | "gridSteps" | "parameters" | "hours" | "start" | "end" | "interval" | "format" | "baseUrl"
>;

export function makeRequestSpec(o: QueryOptions, now: Date = new Date()): RequestSpec {
  let time: TimeSpec;
  if (o.start && o.end) {
    time = explicitTimeSpec(o.start, o.end, o.interval);
  } else {
    if (o.start || o.end) log.warn("--start and --end must be given together; using --hours from now");
    time = generateTimeSpec(o.hours, o.interval, now);
  }

  let coordinates: CoordinateSpec;
  if (o.bbox && o.gridSteps) {
    coordinates = gridFromStrings(o.bbox, o.gridSteps);
  } else {
    if (o.bbox || o.gridSteps) log.warn("--bbox and --grid-steps must be given together; using point mode");
    coordinates = { kind: "point", lat: o.lat, lon: o.lon };
  }

  return { baseUrl: o.baseUrl, time, coordinates, parameters: o.parameters, format: o.format };
}

export function requestUrl(spec: RequestSpec): string {
  return buildUrl(spec.baseUrl, spec.time, spec.parameters, coordinateSegment(spec.coordinates), spec.format);
}
