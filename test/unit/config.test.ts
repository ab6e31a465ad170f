import { describe, it, expect } from "vitest";

import { parseArgs } from "../../src/config.js";

describe("parseArgs", () => {
  it("falls back to defaults", () => {
    expect(parseArgs([])).toEqual({ cacheTtlSeconds: 300, defaultLimit: 1000, maxLimit: 10000 });
  });

  it("reads every flag", () => {
    expect(parseArgs(["--cache-ttl", "60", "--default-limit", "50", "--max-limit", "500"])).toEqual({
      cacheTtlSeconds: 60,
      defaultLimit: 50,
      maxLimit: 500,
    });
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseArgs(["--verbose"])).toThrowError("Unknown option: --verbose");
    expect(() => parseArgs(["--cache-ttl"])).toThrowError("Missing value for --cache-ttl");
  });

  it("rejects values that are not positive integers", () => {
    expect(() => parseArgs(["--cache-ttl", "abc"])).toThrowError(/^Invalid options: --cache-ttl: /);
    expect(() => parseArgs(["--max-limit", "0"])).toThrowError(/^Invalid options: --max-limit: /);
  });

  it("rejects a default limit above the max", () => {
    expect(() => parseArgs(["--default-limit", "20", "--max-limit", "10"])).toThrowError(
      "Invalid options: --default-limit cannot exceed --max-limit",
    );
  });
});
