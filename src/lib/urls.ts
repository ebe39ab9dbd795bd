// src/lib/urls.ts
import { TimeSpec, timeSegment } from "./timeSpec";

export type OutputFormat = "json" | "csv" | "netcdf";

export function buildUrl(
  baseUrl: string,
  time: TimeSpec,
  parameters: string,
  coordinateSegment: string,
  format: OutputFormat
): string {
  const base = baseUrl.replace(/\/+$/, "");
  return `${base}/${timeSegment(time)}/${parameters}/${coordinateSegment}/${format}`;
}
