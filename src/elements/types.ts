/**
 * SSML node model.
 * Each element kind carries its own typed attribute record, so an attribute that is
 * meaningless for an element cannot be expressed at all.
 */

import type { Flavor } from "../flavors/types";
import type { AudioSource } from "../values/audio";
import type {
  BreakStrength,
  EmphasisLevel,
  LangFailure,
  PhoneticAlphabet,
  VisemeType,
  VoiceEffect,
  VoiceGender,
} from "../values/keywords";
import type { LanguageTag } from "../values/language";
import type { ProsodyContour, ProsodyPitch, ProsodyRate, ProsodyVolume } from "../values/prosody";
import type { Decibels, TimeDesignation } from "../values/quantity";
import type { VoiceName } from "../values/voice";

export interface SpeakAttributes {
  lang?: LanguageTag;
  startMark?: string;
  endMark?: string;
}

export interface BreakAttributes {
  strength?: BreakStrength;
  time?: TimeDesignation;
}

export interface EmphasisAttributes {
  level?: EmphasisLevel;
}

export interface ProsodyAttributes {
  pitch?: ProsodyPitch;
  contour?: ProsodyContour;
  range?: ProsodyPitch;
  rate?: ProsodyRate;
  duration?: TimeDesignation;
  volume?: ProsodyVolume;
}

export interface SayAsAttributes {
  interpretAs?: string;
  format?: string;
  detail?: string;
}

export interface AudioAttributes {
  src?: AudioSource;
  clipBegin?: TimeDesignation;
  clipEnd?: TimeDesignation;
  /** Times to play the clip; fractions play part of it. */
  repeatCount?: number;
  repeatDur?: TimeDesignation;
  soundLevel?: Decibels;
  /** Playback speed multiplier, 1 is normal speed. */
  speed?: number;
  /** Accessible description, rendered as a nested <desc>. */
  desc?: string;
}

export interface VoiceAttributes {
  gender?: VoiceGender;
  age?: number;
  name?: readonly VoiceName[];
  variant?: string;
  language?: readonly LanguageTag[];
  effect?: VoiceEffect;
}

export type ParagraphAttributes = Record<never, never>;
export type SentenceAttributes = Record<never, never>;

export interface MarkAttributes {
  name?: string;
}

export interface LangAttributes {
  lang?: LanguageTag;
  onLangFailure?: LangFailure;
}

export interface SubAttributes {
  alias?: string;
}

export interface PhonemeAttributes {
  alphabet?: PhoneticAlphabet;
  ph?: string;
}

export interface ExpressAsAttributes {
  style?: string;
  /** Style intensity, 1 is the voice's predefined intensity. */
  styleDegree?: number;
  role?: string;
}

export interface VisemeAttributes {
  type?: VisemeType;
}

/**
 * Attribute record per element kind. Every attribute is optional in the type; the
 * builders require the ones every flavor needs, the flavor tables add the rest.
 */
export interface ElementAttributes {
  speak: SpeakAttributes;
  break: BreakAttributes;
  emphasis: EmphasisAttributes;
  prosody: ProsodyAttributes;
  "say-as": SayAsAttributes;
  audio: AudioAttributes;
  voice: VoiceAttributes;
  p: ParagraphAttributes;
  s: SentenceAttributes;
  mark: MarkAttributes;
  lang: LangAttributes;
  sub: SubAttributes;
  phoneme: PhonemeAttributes;
  "express-as": ExpressAsAttributes;
  viseme: VisemeAttributes;
}

export type ElementKind = keyof ElementAttributes;
export type AttributeName<K extends ElementKind> = keyof ElementAttributes[K] & string;
export type AttributeValue<K extends ElementKind, A extends AttributeName<K>> = NonNullable<ElementAttributes[K][A]>;

export interface ElementNodeOf<K extends ElementKind> {
  readonly kind: K;
  attrs: ElementAttributes[K];
  /** Replaced only through `append`, which runs the structural checks. */
  readonly children: readonly SsmlNode[];
}

export interface TextNode {
  readonly kind: "text";
  text: string;
}

/**
 * Raw markup written verbatim. `flavors`, when set, lists the only flavors the
 * markup may be rendered for.
 */
export interface MetaNode {
  readonly kind: "meta";
  raw: string;
  flavors?: readonly Flavor[];
}

export type ChildElementKind = Exclude<ElementKind, "speak">;

export type ElementNode = { [K in ChildElementKind]: ElementNodeOf<K> }[ChildElementKind];

export type SsmlNode = TextNode | MetaNode | ElementNode;

/** The root `speak` container. */
export type SpeakDocument = ElementNodeOf<"speak">;

export type NodeKind = SsmlNode["kind"] | "speak";
export type ParentKind = ElementKind;
export type ParentNode = SpeakDocument | ElementNode;

/** Child indices from the root; the root itself is the empty path. */
export type NodePath = readonly number[];

/**
 * Tag-less container for composing fragments. Placing it under a parent splices its
 * children into that parent; it never appears in a built tree.
 */
export interface GroupNode {
  readonly kind: "group";
  readonly children: readonly SsmlNode[];
}

export type NodeInput = SsmlNode | GroupNode | string;
