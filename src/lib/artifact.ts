// src/lib/artifact.ts
import fs from "node:fs/promises";
import path from "node:path";
import { PayloadError, errorMessage } from "./errors";
import { OutputFormat } from "./urls";

const DEFAULT_DIR = "data";

const EXTENSIONS: Record<OutputFormat, string> = {
  json: "json",
  csv: "csv",
  netcdf: "nc",
};

export function defaultOutputPath(format: OutputFormat, label: string, dir: string = DEFAULT_DIR): string {
  return path.join(dir, `meteomatics_${label}.${EXTENSIONS[format]}`);
}

export function parseJsonBody(body: Buffer): unknown {
  try {
    return JSON.parse(body.toString("utf8"));
  } catch (e) {
    throw new PayloadError(`Response is not valid JSON: ${errorMessage(e)}`);
  }
}

async function ensureParent(file: string): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
}

export async function saveJson(payload: unknown, file: string): Promise<void> {
  await ensureParent(file);
  await fs.writeFile(file, JSON.stringify(payload, null, 2), { encoding: "utf8" });
}

/** csv is re-encoded as UTF-8 text, binary formats are written byte for byte. */
export async function saveRaw(body: Buffer, format: OutputFormat, file: string): Promise<void> {
  await ensureParent(file);
  if (format === "netcdf") {
    await fs.writeFile(file, body);
  } else {
    await fs.writeFile(file, body.toString("utf8"), { encoding: "utf8" });
  }
}
