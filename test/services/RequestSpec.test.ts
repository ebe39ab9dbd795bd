jest.mock("pino", () => ({
  __esModule: true,
  default: jest.fn(() => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  })),
}));

import { parseCliArgs } from "../../src/cli";
import { ConfigError } from "../../src/lib/errors";
import { log } from "../../src/lib/logger";
import { makeRequestSpec, requestUrl } from "../../src/services/RequestSpec";

const mockWarn = log.warn as unknown as jest.Mock;
const now = new Date("2025-10-01T13:47:12Z");

describe("makeRequestSpec", () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it("should build the default point query", () => {
    const spec = makeRequestSpec(parseCliArgs([]), now);
    expect(spec.coordinates).toEqual({ kind: "point", lat: 52.520551, lon: 13.461804 });
    expect(requestUrl(spec)).toBe(
      "https://api.meteomatics.com/2025-10-01T13:00:00Z--2025-10-02T13:00:00Z:PT1H/t_2m:C,precip_1h:mm,wind_speed_10m:ms/52.520551,13.461804/json"
    );
  });

  it("should use explicit start and end verbatim", () => {
    const opts = parseCliArgs(["--start", "2025-10-01T00:00:00Z", "--end", "2025-10-02T00:00:00Z", "--interval", "PT3H"]);
    expect(makeRequestSpec(opts, now).time).toEqual({
      start: "2025-10-01T00:00:00Z",
      end: "2025-10-02T00:00:00Z",
      interval: "PT3H",
    });
    expect(mockWarn).not.toHaveBeenCalled();
  });

  it("should ignore a lone --start", () => {
    const opts = parseCliArgs(["--start", "2025-10-01T00:00:00Z", "--hours", "1"]);
    expect(makeRequestSpec(opts, now).time.start).toBe("2025-10-01T13:00:00Z");
    expect(mockWarn).toHaveBeenCalledTimes(1);
  });

  it("should build a grid query", () => {
    const opts = parseCliArgs([
      "--bbox=-23,-47,-24,-46",
      "--grid-steps", "0.05,0.05",
      "--parameters", "t_2m:C",
      "--format", "csv",
      "--start", "2025-10-01T00:00:00Z",
      "--end", "2025-10-02T00:00:00Z",
    ]);
    expect(requestUrl(makeRequestSpec(opts, now))).toBe(
      "https://api.meteomatics.com/2025-10-01T00:00:00Z--2025-10-02T00:00:00Z:PT1H/t_2m:C/-23.000000,-47.000000_-24.000000,-46.000000:0.050000,0.050000/csv"
    );
  });

  it("should fall back to point mode when only the bbox is given", () => {
    const opts = parseCliArgs(["--bbox=-24,-47,-23,-46", "--lat", "1", "--lon", "2"]);
    expect(makeRequestSpec(opts, now).coordinates).toEqual({ kind: "point", lat: 1, lon: 2 });
    expect(mockWarn).toHaveBeenCalledTimes(1);
  });

  it("should fail on a malformed bbox", () => {
    const opts = parseCliArgs(["--bbox=-24,-47,-23", "--grid-steps", "0.05,0.05"]);
    expect(() => makeRequestSpec(opts, now)).toThrow(ConfigError);
  });
});
