jest.mock("pino", () => ({
  __esModule: true,
  default: jest.fn(() => ({
    level: "info",
    info: jest.fn(),
  })),
}));

import pino from "pino";
import { ConfigError } from "../../src/lib/errors";
import { applyLogLevel, isLogLevel, log } from "../../src/lib/logger";

const mockPino = pino as unknown as jest.Mock;

describe("logger", () => {
  it("should write to stderr", () => {
    expect(mockPino).toHaveBeenCalledWith(expect.objectContaining({ level: expect.any(String) }), process.stderr);
  });

  it("should recognise pino levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("loud")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it("should apply a valid level", () => {
    applyLogLevel("warn");
    expect(log.level).toBe("warn");
  });

  it("should leave the level alone when unset", () => {
    applyLogLevel("error");
    applyLogLevel(undefined);
    applyLogLevel("");
    expect(log.level).toBe("error");
  });

  it("should reject unknown levels", () => {
    expect(() => applyLogLevel("loud")).toThrow(ConfigError);
    expect(() => applyLogLevel("loud")).toThrow(
      "Invalid LOG_LEVEL 'loud': expected one of fatal, error, warn, info, debug, trace, silent"
    );
  });
});
