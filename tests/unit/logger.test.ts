import { describe, it, expect } from "vitest";

import { resolveLogLevel } from "../../src/logger.js";

describe("logger", () => {
  describe("resolveLogLevel", () => {
    it("should accept pino levels and silent", () => {
      expect(resolveLogLevel("debug")).toBe("debug");
      expect(resolveLogLevel("silent")).toBe("silent");
    });

    it("should normalise case and whitespace", () => {
      expect(resolveLogLevel(" WARN ")).toBe("warn");
    });

    it("should fall back to info for unknown or missing levels", () => {
      expect(resolveLogLevel("verbose")).toBe("info");
      expect(resolveLogLevel("")).toBe("info");
      expect(resolveLogLevel(undefined)).toBe("info");
    });
  });
});
