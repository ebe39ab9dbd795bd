// src/services/Summarizer.ts
// Digest of a Meteomatics JSON response:
// { status, version, dateGenerated, data: [{ parameter, coordinates: [{ lat, lon, dates: [{ date, value }] }] }] }
// The payload is untrusted, every field is narrowed before use and gaps become sentinels.
import { formatFixed } from "../lib/coordinates";

const NONE = "<none>";
const NA = "<na>";
const NO_SAMPLES = "<no samples>";
const UNKNOWN_PARAMETER = "<unknown>";
const MAX_SAMPLES = 3;

export const NO_DATA_LINE = "No 'data' array found in response.";

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function field(obj: unknown, key: string): unknown {
  return isObject(obj) ? obj[key] : undefined;
}

function asArray(v: unknown): unknown[] {
  return Array.isArray(v) ? v : [];
}

/** Value as received: strings untouched, other JSON values in JSON form. */
export function formatRaw(v: unknown): string {
  if (v === undefined) return NONE;
  if (typeof v === "string") return v;
  return JSON.stringify(v);
}

export function summarizeParameter(entry: unknown): string {
  const name = field(entry, "parameter");
  const parameterName = name === undefined || name === null ? UNKNOWN_PARAMETER : formatRaw(name);

  const coordinates = asArray(field(entry, "coordinates"));
  if (coordinates.length === 0) {
    return `Parameter ${parameterName}: no coordinates returned`;
  }

  const coord = coordinates[0];
  const dates = asArray(field(coord, "dates"));
  const timestamps = dates.map((d) => formatRaw(field(d, "date")));

  // non-numeric values still count and still show up in samples
  const values: number[] = [];
  for (const d of dates) {
    const value = field(d, "value");
    if (typeof value === "number" && Number.isFinite(value)) values.push(value);
  }

  const count = dates.length;
  const tsFirst = count > 0 ? timestamps[0] : NONE;
  const tsLast = count > 0 ? timestamps[count - 1] : NONE;
  const vMin = values.length > 0 ? formatFixed(values.reduce((a, b) => Math.min(a, b)), 3) : NA;
  const vMax = values.length > 0 ? formatFixed(values.reduce((a, b) => Math.max(a, b)), 3) : NA;
  const sample =
    count > 0
      ? dates
          .slice(0, MAX_SAMPLES)
          .map((d, i) => `${timestamps[i]}=${formatRaw(field(d, "value"))}`)
          .join(", ")
      : NO_SAMPLES;

  return [
    `Parameter: ${parameterName}`,
    `Lat/Lon: ${formatRaw(field(coord, "lat"))},${formatRaw(field(coord, "lon"))}`,
    `Count: ${count}`,
    `Range: ${tsFirst} → ${tsLast}`,
    `Min/Max: ${vMin}/${vMax}`,
    `Samples: ${sample}`,
  ].join(" | ");
}

export function summarizeResponse(payload: unknown): string {
  const lines: string[] = [
    `Status: ${formatRaw(field(payload, "status"))} | API version: ${formatRaw(
      field(payload, "version")
    )} | Generated: ${formatRaw(field(payload, "dateGenerated"))}`,
  ];

  const data = field(payload, "data");
  if (!Array.isArray(data) || data.length === 0) {
    lines.push(NO_DATA_LINE);
    return lines.join("\n");
  }

  for (const entry of data) lines.push(summarizeParameter(entry));
  return lines.join("\n");
}
