/**
 * Unit tests for config loading.
 */

import { loadConfig } from "../../../src/config";

describe("loadConfig", () => {
  it("returns defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      flavor: "generic",
      pretty: false,
      performChecks: true,
      log: { level: "info" },
    });
  });

  it("reads flavor, output and log settings", () => {
    const config = loadConfig({
      SSML_FLAVOR: " azure ",
      SSML_PRETTY: "1",
      SSML_PERFORM_CHECKS: "false",
      LOG_LEVEL: "debug",
    });
    expect(config).toEqual({ flavor: "azure", pretty: true, performChecks: false, log: { level: "debug" } });
  });

  it("rejects an unknown flavor", () => {
    expect(() => loadConfig({ SSML_FLAVOR: "polly" })).toThrow("Unknown SSML_FLAVOR: polly");
  });

  it("rejects unreadable flags", () => {
    expect(() => loadConfig({ SSML_PRETTY: "yes" })).toThrow('Invalid SSML_PRETTY: expected true, false, 1 or 0, got "yes"');
  });

  it("falls back to info for an unknown log level", () => {
    expect(loadConfig({ LOG_LEVEL: "verbose" }).log.level).toBe("info");
  });
});
