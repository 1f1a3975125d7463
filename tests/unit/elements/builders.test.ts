/**
 * Unit tests for element builders.
 */

import {
  audio,
  breaks,
  emphasis,
  expressAs,
  lang,
  mark,
  meta,
  phoneme,
  prosody,
  sayAs,
  speak,
  sub,
  text,
  voice,
  withMarks,
} from "../../../src/elements";
import { ValueError } from "../../../src/errors";

describe("speak", () => {
  it("parses the language and wraps string children as text", () => {
    expect(speak("en-US", ["Hi"])).toEqual({
      kind: "speak",
      attrs: { lang: { tag: "en-US" } },
      children: [{ kind: "text", text: "Hi" }],
    });
  });

  it("allows an empty document without a language", () => {
    expect(speak(null)).toEqual({ kind: "speak", attrs: {}, children: [] });
  });

  it("adds start and end marks", () => {
    const doc = withMarks(speak("en-US"), { start: "begin", end: "finish" });
    expect(doc.attrs).toEqual({ lang: { tag: "en-US" }, startMark: "begin", endMark: "finish" });
  });
});

describe("breaks", () => {
  it("takes a strength or a duration", () => {
    expect(breaks().attrs).toEqual({});
    expect(breaks("strong").attrs).toEqual({ strength: "strong" });
    expect(breaks("750ms").attrs).toEqual({ time: { unit: "ms", value: 750 } });
    expect(breaks(500).attrs).toEqual({ time: { unit: "ms", value: 500 } });
  });

  it("rejects malformed durations", () => {
    expect(() => breaks("5m")).toThrow(ValueError);
  });
});

describe("prosody", () => {
  it("parses each control", () => {
    const node = prosody({ pitch: "+2st", rate: 1.2, volume: "-6dB" }, ["x"]);
    expect(node.attrs).toEqual({
      pitch: { unit: "st", value: 2 },
      rate: { unit: "factor", value: 1.2 },
      volume: { unit: "dB", value: -6 },
    });
  });

  it("accepts contour points as objects or tuples", () => {
    const node = prosody({ contour: [{ position: 0.25, pitch: "high" }, [0.75, "-10%"]] }, []);
    expect(node.attrs.contour).toEqual([
      { position: 0.25, pitch: "high" },
      { position: 0.75, pitch: { unit: "%", value: -10 } },
    ]);
  });
});

describe("text-content elements", () => {
  it("say-as keeps its content as a single text child", () => {
    const node = sayAs("characters", "SSML", { format: "upper" });
    expect(node.attrs).toEqual({ interpretAs: "characters", format: "upper" });
    expect(node.children).toEqual([text("SSML")]);
  });

  it("rejects empty required values", () => {
    expect(() => sayAs(" ", "x")).toThrow(ValueError);
    expect(() => sub("", "W3C")).toThrow(ValueError);
    expect(() => phoneme("", "tomato")).toThrow(ValueError);
    expect(() => mark("")).toThrow(ValueError);
  });

  it("phoneme carries its alphabet", () => {
    expect(phoneme("təˈmeɪtoʊ", "tomato", "ipa").attrs).toEqual({ alphabet: "ipa", ph: "təˈmeɪtoʊ" });
  });
});

describe("voice", () => {
  it("takes a bare string as the voice name", () => {
    expect(voice("en-US-JennyNeural", ["Hi"]).attrs).toEqual({ name: ["en-US-JennyNeural"] });
  });

  it("normalizes the descriptor", () => {
    const node = voice({ gender: "female", name: ["a", "b"], language: "en-GB" }, []);
    expect(node.attrs).toEqual({ gender: "female", name: ["a", "b"], language: [{ tag: "en-GB" }] });
  });
});

describe("other builders", () => {
  it("audio parses its timing options", () => {
    const node = audio("https://example.com/a.mp3", { clipBegin: "1s", soundLevel: "-6dB", speed: 1.5, desc: "Chime" });
    expect(node.attrs).toEqual({
      src: { href: "https://example.com/a.mp3", scheme: "https" },
      clipBegin: { unit: "ms", value: 1000 },
      soundLevel: { unit: "dB", value: -6 },
      speed: 1.5,
      desc: "Chime",
    });
  });

  it("audio rejects numbers that cannot be written", () => {
    expect(() => audio("a.mp3", { speed: Number.NaN })).toThrow(ValueError);
    expect(() => audio("a.mp3", { repeatCount: 1e21 })).toThrow(ValueError);
  });

  it("lang and emphasis keep their options", () => {
    expect(lang("fr-FR", ["Bonjour"], { onLangFailure: "ignoretext" }).attrs).toEqual({
      lang: { tag: "fr-FR" },
      onLangFailure: "ignoretext",
    });
    expect(emphasis(undefined, ["x"]).attrs).toEqual({});
  });

  it("express-as keeps the style degree as given", () => {
    expect(expressAs("cheerful", [], { styleDegree: 3 }).attrs).toEqual({ style: "cheerful", styleDegree: 3 });
  });

  it("meta copies its flavor list", () => {
    const flavors: ("azure" | "google")[] = ["azure"];
    const node = meta("<x/>", flavors);
    flavors.push("google");
    expect(node).toEqual({ kind: "meta", raw: "<x/>", flavors: ["azure"] });
  });
});
