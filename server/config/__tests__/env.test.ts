import { describe, it, expect } from "vitest";
import { parseEnv } from "../env";
import { ConfigError } from "../../utils/errors";

describe("parseEnv", () => {
  it("should fall back to defaults", () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: "development",
      HOST: "127.0.0.1",
      PORT: 5000,
      STATIC_ROOT: "public",
    });
  });

  it("should coerce the port and keep explicit values", () => {
    const env = parseEnv({
      NODE_ENV: "production",
      HOST: "0.0.0.0",
      PORT: "8080",
      STATIC_ROOT: "/srv/www",
      LOG_LEVEL: "warn",
    });

    expect(env).toEqual({
      NODE_ENV: "production",
      HOST: "0.0.0.0",
      PORT: 8080,
      STATIC_ROOT: "/srv/www",
      LOG_LEVEL: "warn",
    });
  });

  it("should reject a port that is not a number", () => {
    expect(() => parseEnv({ PORT: "abc" })).toThrow(ConfigError);
    expect(() => parseEnv({ PORT: "abc" })).toThrow(/PORT:/);
  });

  it("should reject a port out of range", () => {
    expect(() => parseEnv({ PORT: "70000" })).toThrow(/PORT:/);
  });

  it("should reject an empty root directory", () => {
    expect(() => parseEnv({ STATIC_ROOT: "" })).toThrow(
      "Invalid environment variables (STATIC_ROOT: STATIC_ROOT must name a directory)"
    );
  });

  it("should reject an unknown log level", () => {
    expect(() => parseEnv({ LOG_LEVEL: "verbose" })).toThrow(/LOG_LEVEL:/);
  });
});
