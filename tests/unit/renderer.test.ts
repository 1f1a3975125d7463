/**
 * Unit tests for the renderer.
 */

import pino from "pino";
import type { SsmlConfig } from "../../src/config";
import { breaks, paragraph, speak, type ElementNodeOf } from "../../src/elements";
import { createRenderer } from "../../src/renderer";

function capture(): { log: pino.Logger; events: unknown[] } {
  const events: unknown[] = [];
  const stream = {
    write(line: string) {
      const record: unknown = JSON.parse(line);
      if (typeof record !== "object" || record === null) return;
      if ("event" in record) events.push(record.event);
      else if ("msg" in record) events.push(record.msg);
    },
  };
  return { log: pino({ level: "debug" }, stream), events };
}

function config(overrides: Partial<SsmlConfig> = {}): SsmlConfig {
  return { flavor: "amazon-polly", pretty: false, performChecks: true, log: { level: "debug" }, ...overrides };
}

describe("createRenderer", () => {
  it("renders for the configured flavor and logs the render", () => {
    const { log, events } = capture();
    const renderer = createRenderer(config(), log);
    expect(renderer.flavor).toBe("amazon-polly");
    expect(renderer.render(speak("en-US", ["Hello, world!"]))).toEqual({
      ok: true,
      output: '<speak xml:lang="en-US">Hello, world! </speak>',
    });
    expect(events).toEqual(["SSML_RENDERED"]);
  });

  it("applies pretty output from config", () => {
    const { log } = capture();
    const renderer = createRenderer(config({ pretty: true }), log);
    expect(renderer.render(speak("en-US", ["Hi", breaks()]))).toEqual({
      ok: true,
      output: '<speak xml:lang="en-US">\n\tHi\n\t<break />\n</speak>',
    });
  });

  it("logs validation failures and returns them", () => {
    const { log, events } = capture();
    const renderer = createRenderer(config({ flavor: "azure" }), log);
    const result = renderer.render(speak(null, ["Hi"]));
    expect(result.ok).toBe(false);
    expect(events).toEqual(["SSML_VALIDATION_FAILED"]);
  });

  it("skips validation when checks are off", () => {
    const { log, events } = capture();
    const renderer = createRenderer(config({ flavor: "azure", performChecks: false }), log);
    expect(renderer.render(speak(null)).ok).toBe(true);
    expect(events).toEqual(["SSML_RENDERED"]);
  });

  it("logs a malformed tree rendered unchecked as an error", () => {
    const { log, events } = capture();
    const renderer = createRenderer(config({ performChecks: false }), log);
    const broken: ElementNodeOf<"break"> = { kind: "break", attrs: {}, children: [paragraph(["x"])] };
    const result = renderer.render(speak("en-US", [broken]));
    expect(result.ok).toBe(false);
    expect(events).toEqual(["Error"]);
  });

  it("validates with logging", () => {
    const { log, events } = capture();
    const renderer = createRenderer(config(), log);
    const result = renderer.validate(speak("en-US", ["Hi", breaks("1s")]));
    expect(result.ok).toBe(true);
    expect(events).toEqual(["SSML_VALIDATED"]);
  });
});
