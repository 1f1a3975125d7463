/**
 * Unit tests for capability rule constructors.
 */

import {
  clamp,
  describeBound,
  numberRule,
  oneOf,
  pitchRule,
  rateRule,
  schemeRule,
  timeRule,
  volumeRule,
  within,
} from "../../../src/flavors/rules";
import { audioSource } from "../../../src/values/audio";
import { millis, decibels, percent, semitones } from "../../../src/values/quantity";
import { rateFactor } from "../../../src/values/prosody";

describe("describeBound", () => {
  it("describes open and closed ranges", () => {
    expect(describeBound(clamp(0, 20000), "ms")).toBe("0 to 20000 ms");
    expect(describeBound(clamp(-Infinity, 6), "dB")).toBe("at most 6 dB");
    expect(describeBound(clamp(0, Infinity))).toBe("at least 0");
    expect(describeBound(clamp(-Infinity, Infinity))).toBe("any number");
  });
});

describe("timeRule", () => {
  it("clamps under a clamp bound", () => {
    expect(timeRule(clamp(0, 20000)).normalize(millis(25000))).toEqual({ ok: true, value: millis(20000) });
  });

  it("fails under a reject bound", () => {
    expect(timeRule(within(0, 10000)).normalize(millis(12000))).toEqual({ ok: false, domain: "0 to 10000 ms" });
  });

  it("returns in-range values unchanged", () => {
    const time = millis(500);
    const result = timeRule(clamp(0, 20000)).normalize(time);
    expect(result.ok && result.value).toBe(time);
  });
});

describe("oneOf", () => {
  const rule = oneOf(["a", "b"], "a");

  it("lists the accepted values", () => {
    expect(rule.domain).toBe("one of a, b");
    expect(rule.normalize("b")).toEqual({ ok: true, value: "b" });
  });

  it("marks the default as omittable", () => {
    expect(rule.omit?.("a")).toBe(true);
    expect(rule.omit?.("b")).toBe(false);
  });
});

describe("prosody rules", () => {
  it("restricts pitch units", () => {
    const rule = pitchRule({ "%": clamp(-Infinity, Infinity) });
    expect(rule.domain).toBe("a keyword or % offset (any number)");
    expect(rule.normalize(percent(20))).toEqual({ ok: true, value: percent(20) });
    expect(rule.normalize(semitones(2))).toEqual({ ok: false, domain: rule.domain });
    expect(rule.normalize("high")).toEqual({ ok: true, value: "high" });
  });

  it("clamps volume and refuses other units", () => {
    const rule = volumeRule({ dB: clamp(-Infinity, 6) });
    expect(rule.domain).toBe("a keyword or dB offset (at most 6)");
    expect(rule.normalize(decibels(10))).toEqual({ ok: true, value: decibels(6) });
    expect(rule.normalize(percent(10)).ok).toBe(false);
  });

  it("bounds rate multipliers and describes them as percentages", () => {
    const rule = rateRule(clamp(0.5, 2));
    expect(rule.domain).toBe("a keyword or a rate of 50 to 200 %");
    expect(rule.normalize(rateFactor(3))).toEqual({ ok: true, value: rateFactor(2) });
    expect(rule.normalize("fast")).toEqual({ ok: true, value: "fast" });
  });

  it("normalization is idempotent", () => {
    const rule = rateRule(clamp(0.5, 2));
    const once = rule.normalize(rateFactor(0.1));
    if (!once.ok) throw new Error("expected a clamped value");
    expect(rule.normalize(once.value)).toEqual(once);
  });
});

describe("numberRule", () => {
  it("omits the neutral value", () => {
    const rule = numberRule(clamp(0.01, 2), "", 1);
    expect(rule.omit?.(1)).toBe(true);
    expect(rule.normalize(0)).toEqual({ ok: true, value: 0.01 });
  });
});

describe("schemeRule", () => {
  const rule = schemeRule(["https"]);

  it("accepts listed schemes only", () => {
    expect(rule.domain).toBe("an absolute https URI");
    expect(rule.normalize(audioSource("https://example.com/a.mp3")).ok).toBe(true);
    expect(rule.normalize(audioSource("http://example.com/a.mp3")).ok).toBe(false);
  });

  it("refuses relative references", () => {
    expect(rule.normalize(audioSource("a.mp3")).ok).toBe(false);
  });
});
