/**
 * Element constructors. Each accepts only the attributes meaningful to its element
 * and parses literal inputs ("750ms", "+2st", "en-US") into value types.
 *
 * ```ts
 * const doc = speak("en-US", [
 *   "Hello,",
 *   emphasis("strong", ["world"]),
 *   breaks("500ms"),
 * ]);
 * ```
 */

import { ValueError } from "../errors";
import type { Flavor } from "../flavors/types";
import { toAudioSource, type AudioSource } from "../values/audio";
import { isWritable } from "../values/format";
import {
  BREAK_STRENGTHS,
  isOneOf,
  type BreakStrength,
  type EmphasisLevel,
  type LangFailure,
  type PhoneticAlphabet,
  type VisemeType,
} from "../values/keywords";
import { toLanguageTag, type LanguageTag } from "../values/language";
import {
  contour as toContour,
  toPitch,
  toRate,
  toVolume,
  type ContourPoint,
  type ProsodyPitch,
  type ProsodyRate,
  type ProsodyVolume,
} from "../values/prosody";
import { toDecibels, toTime, type DecibelsInput, type TimeInput } from "../values/quantity";
import { voiceAge, voiceLanguages, voiceName, voiceNames, type VoiceConfig } from "../values/voice";
import { adoptChildren } from "./tree";
import type {
  ElementAttributes,
  ElementNodeOf,
  MetaNode,
  NodeInput,
  SpeakDocument,
  TextNode,
  ChildElementKind,
} from "./types";

function element<K extends ChildElementKind>(
  kind: K,
  attrs: ElementAttributes[K],
  children: Iterable<NodeInput> = []
): ElementNodeOf<K> {
  return { kind, attrs, children: adoptChildren(kind, children) };
}

function nonEmpty(value: string, what: string): string {
  if (value.trim().length === 0) throw new ValueError(value, what);
  return value;
}

function finiteNumber(value: number, what: string): number {
  if (!isWritable(value)) throw new ValueError(String(value), what);
  return value;
}

export function text(value: string): TextNode {
  return { kind: "text", text: value };
}

/**
 * Raw markup, written without escaping. Restrict it to the flavors that understand
 * it; validation for any other flavor fails.
 */
export function meta(raw: string, flavors?: readonly Flavor[]): MetaNode {
  return flavors === undefined ? { kind: "meta", raw } : { kind: "meta", raw, flavors: [...flavors] };
}

/**
 * Create a document. `lang` is the language of the spoken text (e.g. "en-US");
 * Azure requires it.
 */
export function speak(lang: LanguageTag | string | null | undefined, children: Iterable<NodeInput> = []): SpeakDocument {
  return {
    kind: "speak",
    attrs: lang == null ? {} : { lang: toLanguageTag(lang) },
    children: adoptChildren("speak", children),
  };
}

/** Start and end marks on the root (`startmark` / `endmark`). */
export function withMarks(doc: SpeakDocument, marks: { start?: string; end?: string }): SpeakDocument {
  const attrs = { ...doc.attrs };
  if (marks.start !== undefined) attrs.startMark = nonEmpty(marks.start, "a non-empty mark name");
  if (marks.end !== undefined) attrs.endMark = nonEmpty(marks.end, "a non-empty mark name");
  doc.attrs = attrs;
  return doc;
}

/** A pause, either by strength keyword ("strong") or by duration ("750ms", 750). */
export function breaks(value?: BreakStrength | TimeInput): ElementNodeOf<"break"> {
  if (value === undefined) return element("break", {});
  if (typeof value === "string" && isOneOf(BREAK_STRENGTHS, value)) {
    return element("break", { strength: value });
  }
  return element("break", { time: toTime(value) });
}

export function emphasis(level: EmphasisLevel | undefined, children: Iterable<NodeInput>): ElementNodeOf<"emphasis"> {
  return element("emphasis", level === undefined ? {} : { level }, children);
}

export interface ProsodyControl {
  pitch?: ProsodyPitch | string;
  /** Points as { position, pitch } or [position, pitch]; positions are fractions 0..1. */
  contour?: Iterable<ContourPoint | ContourTuple>;
  range?: ProsodyPitch | string;
  /** Numbers are multipliers (1.2 = 120%). */
  rate?: ProsodyRate | string | number;
  duration?: TimeInput;
  volume?: ProsodyVolume | string;
}

type ContourTuple = readonly [number, ProsodyPitch | string];

function toContourPoints(input: Iterable<ContourPoint | ContourTuple>): readonly ContourPoint[] {
  return toContour(Array.from(input, (p): ContourTuple => ("position" in p ? [p.position, p.pitch] : p)));
}

export function prosody(control: ProsodyControl, children: Iterable<NodeInput>): ElementNodeOf<"prosody"> {
  return element(
    "prosody",
    {
      pitch: control.pitch === undefined ? undefined : toPitch(control.pitch),
      contour: control.contour === undefined ? undefined : toContourPoints(control.contour),
      range: control.range === undefined ? undefined : toPitch(control.range),
      rate: control.rate === undefined ? undefined : toRate(control.rate),
      duration: control.duration === undefined ? undefined : toTime(control.duration),
      volume: control.volume === undefined ? undefined : toVolume(control.volume),
    },
    children
  );
}

/** Interpretation hint for `content`, e.g. sayAs("characters", "SSML"). */
export function sayAs(
  interpretAs: string,
  content: string,
  options: { format?: string; detail?: string } = {}
): ElementNodeOf<"say-as"> {
  return element(
    "say-as",
    { interpretAs: nonEmpty(interpretAs, "a non-empty interpret-as value"), format: options.format, detail: options.detail },
    [content]
  );
}

export interface AudioOptions {
  clipBegin?: TimeInput;
  clipEnd?: TimeInput;
  /** Play count; must not be negative. */
  repeatCount?: number;
  repeatDur?: TimeInput;
  /** -6dB is roughly half volume, +6dB roughly double. */
  soundLevel?: DecibelsInput;
  /** 1 is normal speed. */
  speed?: number;
  desc?: string;
}

/**
 * Insert a recorded clip. `alternate` is spoken when the clip cannot be played.
 */
export function audio(
  src: AudioSource | string,
  options: AudioOptions = {},
  alternate: Iterable<NodeInput> = []
): ElementNodeOf<"audio"> {
  return element(
    "audio",
    {
      src: toAudioSource(src),
      clipBegin: options.clipBegin === undefined ? undefined : toTime(options.clipBegin),
      clipEnd: options.clipEnd === undefined ? undefined : toTime(options.clipEnd),
      repeatCount: options.repeatCount === undefined ? undefined : finiteNumber(options.repeatCount, "a finite repeat count"),
      repeatDur: options.repeatDur === undefined ? undefined : toTime(options.repeatDur),
      soundLevel: options.soundLevel === undefined ? undefined : toDecibels(options.soundLevel),
      speed: options.speed === undefined ? undefined : finiteNumber(options.speed, "a finite speed multiplier"),
      desc: options.desc,
    },
    alternate
  );
}

/** Switch voice for a section. A bare string is taken as the voice name. */
export function voice(config: VoiceConfig | string, children: Iterable<NodeInput>): ElementNodeOf<"voice"> {
  if (typeof config === "string") {
    return element("voice", { name: [voiceName(config)] }, children);
  }
  return element(
    "voice",
    {
      gender: config.gender,
      age: config.age === undefined ? undefined : voiceAge(config.age),
      name: config.name === undefined ? undefined : voiceNames(config.name),
      variant: config.variant,
      language: config.language === undefined ? undefined : voiceLanguages(config.language),
      effect: config.effect,
    },
    children
  );
}

export function paragraph(children: Iterable<NodeInput>): ElementNodeOf<"p"> {
  return element("p", {}, children);
}

export function sentence(children: Iterable<NodeInput>): ElementNodeOf<"s"> {
  return element("s", {}, children);
}

/** Named position reported back by the engine while speaking. */
export function mark(name: string): ElementNodeOf<"mark"> {
  return element("mark", { name: nonEmpty(name, "a non-empty mark name") });
}

export function lang(
  tag: LanguageTag | string,
  children: Iterable<NodeInput>,
  options: { onLangFailure?: LangFailure } = {}
): ElementNodeOf<"lang"> {
  return element("lang", { lang: toLanguageTag(tag), onLangFailure: options.onLangFailure }, children);
}

/** Speak `alias` in place of `content`. */
export function sub(alias: string, content: string): ElementNodeOf<"sub"> {
  return element("sub", { alias: nonEmpty(alias, "a non-empty alias") }, [content]);
}

export function phoneme(ph: string, content: string, alphabet?: PhoneticAlphabet): ElementNodeOf<"phoneme"> {
  return element("phoneme", { alphabet, ph: nonEmpty(ph, "a non-empty pronunciation") }, [content]);
}

/**
 * Azure speaking style (`mstts:express-as`), e.g. expressAs("cheerful", ["Good morning!"], { styleDegree: 0.5 }).
 */
export function expressAs(
  style: string,
  children: Iterable<NodeInput>,
  options: { styleDegree?: number; role?: string } = {}
): ElementNodeOf<"express-as"> {
  return element(
    "express-as",
    {
      style: nonEmpty(style, "a non-empty style name"),
      styleDegree:
        options.styleDegree === undefined ? undefined : finiteNumber(options.styleDegree, "a finite style degree"),
      role: options.role,
    },
    children
  );
}

/** Azure viseme output request (`mstts:viseme`); place it first inside a voice. */
export function viseme(type: VisemeType): ElementNodeOf<"viseme"> {
  return element("viseme", { type });
}
