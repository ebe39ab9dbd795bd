// src/cli.ts
import { parseArgs } from "node:util";
import z from "zod";
import { DECIMAL_RE } from "./lib/coordinates";
import { ConfigError, errorMessage } from "./lib/errors";

export const DEFAULT_PARAMETERS = "t_2m:C,precip_1h:mm,wind_speed_10m:ms";
export const DEFAULT_LATITUDE = 52.520551;   // Berlin
export const DEFAULT_LONGITUDE = 13.461804;
export const DEFAULT_INTERVAL = "PT1H";
export const DEFAULT_HOURS = 24;
export const DEFAULT_BASE_URL = "https://api.meteomatics.com";

export const USAGE = `Usage: wxquery [options]

Fetch weather data from the Meteomatics API, save the raw response and print a summary.

  --lat <deg>            latitude, point mode (default ${DEFAULT_LATITUDE})
  --lon <deg>            longitude, point mode (default ${DEFAULT_LONGITUDE})
  --bbox <box>           grid bounding box lat_min,lon_min,lat_max,lon_max
  --grid-steps <steps>   grid step dlat,dlon (e.g. 0.05,0.05)
  --parameters <list>    comma-separated parameters (default ${DEFAULT_PARAMETERS})
  --hours <n>            hours ahead of now (UTC), ignored with --start/--end (default ${DEFAULT_HOURS})
  --start <time>         start time, e.g. 2025-10-01T00:00:00Z
  --end <time>           end time, e.g. 2025-10-02T00:00:00Z
  --interval <duration>  ISO-8601 step (default ${DEFAULT_INTERVAL})
  --format <fmt>         json | csv | netcdf (default json)
  --base-url <url>       API base URL (default ${DEFAULT_BASE_URL})
  --username <name>      API username (overrides METEOMATICS_USERNAME)
  --password <secret>    API password (overrides METEOMATICS_PASSWORD)
  --out <path>           where to save the raw response (default data/meteomatics_<timestamp>.<ext>)
  --help                 show this help

Values starting with '-' must be attached: --lat=-23.55, --bbox=-24,-47,-23,-46
`;

// Number("") is 0 and Number("0x1A") is 26, so the text is checked before conversion
const decimalFlag = z.string().trim().regex(DECIMAL_RE, "Expected a decimal number").transform(Number);
const integerFlag = z.string().trim().regex(/^[+-]?\d+$/, "Expected an integer").transform(Number);

const optionsSchema = z.object({
  lat: decimalFlag.pipe(z.number().finite()).optional().transform((v) => v ?? DEFAULT_LATITUDE),
  lon: decimalFlag.pipe(z.number().finite()).optional().transform((v) => v ?? DEFAULT_LONGITUDE),
  bbox: z.string().optional(),
  gridSteps: z.string().optional(),
  parameters: z.string().default(DEFAULT_PARAMETERS),
  hours: integerFlag.pipe(z.number().int().nonnegative()).optional().transform((v) => v ?? DEFAULT_HOURS),
  start: z.string().optional(),
  end: z.string().optional(),
  interval: z.string().default(DEFAULT_INTERVAL),
  format: z.enum(["json", "csv", "netcdf"]).default("json"),
  baseUrl: z.string().default(DEFAULT_BASE_URL),
  username: z.string().optional(),
  password: z.string().optional(),
  out: z.string().optional(),
  help: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof optionsSchema>;

const flagName = (key: string) => `--${key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`;

const FLAGS = {
  lat: { type: "string" },
  lon: { type: "string" },
  bbox: { type: "string" },
  "grid-steps": { type: "string" },
  parameters: { type: "string" },
  hours: { type: "string" },
  start: { type: "string" },
  end: { type: "string" },
  interval: { type: "string" },
  format: { type: "string" },
  "base-url": { type: "string" },
  username: { type: "string" },
  password: { type: "string" },
  out: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: FLAGS, strict: true, allowPositionals: false }).values;
  } catch (e) {
    throw new ConfigError(errorMessage(e));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);

  const q = optionsSchema.safeParse({
    lat: values.lat,
    lon: values.lon,
    bbox: values.bbox,
    gridSteps: values["grid-steps"],
    parameters: values.parameters,
    hours: values.hours,
    start: values.start,
    end: values.end,
    interval: values.interval,
    format: values.format,
    baseUrl: values["base-url"],
    username: values.username,
    password: values.password,
    out: values.out,
    help: values.help,
  });
  if (!q.success) {
    const detail = q.error.issues.map((i) => `${flagName(i.path.join("."))}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid arguments: ${detail}`);
  }
  return q.data;
}
