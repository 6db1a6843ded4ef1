import { describe, expect, it } from "vitest";
import { createLogger, silentLogger } from "../../src/logging/logger.js";

describe("logger", () => {
  it("uses the requested level and name", () => {
    const logger = createLogger({ level: "warn", name: "geocheck-test" });
    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  it("stays silent for library callers", () => {
    expect(silentLogger().level).toBe("silent");
  });
});
