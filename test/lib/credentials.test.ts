import { getCredentials } from "../../src/lib/credentials";
import { ConfigError } from "../../src/lib/errors";

describe("getCredentials", () => {
  const env = { METEOMATICS_USERNAME: "env-user", METEOMATICS_PASSWORD: "env-secret" };

  it("should prefer explicit arguments", () => {
    expect(getCredentials("test-user", "test-secret", env)).toEqual({ username: "test-user", password: "test-secret" });
  });

  it("should fall back to the environment", () => {
    expect(getCredentials(undefined, undefined, env)).toEqual({ username: "env-user", password: "env-secret" });
  });

  it("should mix explicit and environment values", () => {
    expect(getCredentials("test-user", undefined, env)).toEqual({ username: "test-user", password: "env-secret" });
  });

  it("should fail when either value is missing", () => {
    expect(() => getCredentials(undefined, undefined, {})).toThrow(ConfigError);
    expect(() => getCredentials("test-user", undefined, {})).toThrow(
      "Missing credentials. Set METEOMATICS_USERNAME and METEOMATICS_PASSWORD environment variables or pass --username/--password."
    );
  });
});
