/**
 * Unit tests for language tags, audio sources and voice descriptors.
 */

import { ValueError } from "../../../src/errors";
import { audioSource } from "../../../src/values/audio";
import { languageTag, primaryLanguage } from "../../../src/values/language";
import { voiceAge, voiceLanguages, voiceName, voiceNames } from "../../../src/values/voice";

describe("languageTag", () => {
  it("trims and keeps the tag", () => {
    expect(languageTag(" en-US ")).toEqual({ tag: "en-US" });
  });

  it("rejects free text", () => {
    expect(() => languageTag("english US")).toThrow(ValueError);
  });

  it("gives the primary subtag", () => {
    expect(primaryLanguage(languageTag("zh-Hant-TW"))).toBe("zh");
  });
});

describe("audioSource", () => {
  it("records a lower-cased scheme for absolute URIs", () => {
    expect(audioSource("https://example.com/a.mp3")).toEqual({ href: "https://example.com/a.mp3", scheme: "https" });
    expect(audioSource("HTTPS://example.com/a.mp3").scheme).toBe("https");
  });

  it("keeps relative references without a scheme", () => {
    expect(audioSource("beep.ogg")).toEqual({ href: "beep.ogg" });
  });

  it("rejects whitespace", () => {
    expect(() => audioSource("a b.mp3")).toThrow(ValueError);
    expect(() => audioSource("  ")).toThrow(ValueError);
  });
});

describe("voice descriptors", () => {
  it("validates names", () => {
    expect(voiceName(" en-US-JennyNeural ")).toBe("en-US-JennyNeural");
    expect(() => voiceName("en-US JennyNeural")).toThrow(ValueError);
    expect(voiceNames(["a", "b"])).toEqual(["a", "b"]);
    expect(() => voiceNames([])).toThrow(ValueError);
  });

  it("normalizes languages to a list", () => {
    expect(voiceLanguages("en-US")).toEqual([{ tag: "en-US" }]);
    expect(voiceLanguages(["en-US", languageTag("fr")])).toEqual([{ tag: "en-US" }, { tag: "fr" }]);
  });

  it("requires a non-negative integer age", () => {
    expect(voiceAge(30)).toBe(30);
    expect(() => voiceAge(3.5)).toThrow(ValueError);
    expect(() => voiceAge(-1)).toThrow(ValueError);
  });
});
