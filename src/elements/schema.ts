/**
 * Flavor-independent element schema: canonical tag, content model, canonical
 * attribute order and how each attribute value is written as text.
 * Flavor tables may rename tags and attributes; they never change the content model.
 */

import type { AttributeName, AttributeValue, ElementKind, NodeKind } from "./types";
import { formatNumber, formatPercent } from "../values/format";
import { formatContour, formatPitch, formatRate, formatVolume } from "../values/prosody";
import { formatDecibels, formatTime } from "../values/quantity";

/** empty: no children; text: text nodes only; mixed: text and elements. */
export type ContentModel = "empty" | "text" | "mixed";

export interface AttributeSchema<V> {
  xmlName: string;
  format(value: V): string;
  /** Rendered as a child element with this tag instead of an attribute. */
  asChild?: string;
}

export type AttributeSchemas<K extends ElementKind> = {
  [A in AttributeName<K>]: AttributeSchema<AttributeValue<K, A>>;
};

export interface ElementSchema<K extends ElementKind> {
  tag: string;
  content: ContentModel;
  /** Child kinds refused even though the content model is mixed. */
  forbiddenChildren?: readonly NodeKind[];
  attributes: AttributeSchemas<K>;
  /** Canonical attribute order for rendering and validation. */
  order: readonly AttributeName<K>[];
  /** Attributes every flavor requires. */
  required?: readonly AttributeName<K>[];
}

const str = (value: string): string => value;
const list = (values: readonly string[]): string => values.join(" ");

export const ELEMENT_SCHEMAS: { readonly [K in ElementKind]: ElementSchema<K> } = {
  speak: {
    tag: "speak",
    content: "mixed",
    attributes: {
      lang: { xmlName: "xml:lang", format: (v) => v.tag },
      startMark: { xmlName: "startmark", format: str },
      endMark: { xmlName: "endmark", format: str },
    },
    order: ["lang", "startMark", "endMark"],
  },
  break: {
    tag: "break",
    content: "empty",
    attributes: {
      strength: { xmlName: "strength", format: str },
      time: { xmlName: "time", format: formatTime },
    },
    order: ["strength", "time"],
  },
  emphasis: {
    tag: "emphasis",
    content: "mixed",
    attributes: {
      level: { xmlName: "level", format: str },
    },
    order: ["level"],
  },
  prosody: {
    tag: "prosody",
    content: "mixed",
    attributes: {
      pitch: { xmlName: "pitch", format: formatPitch },
      contour: { xmlName: "contour", format: formatContour },
      range: { xmlName: "range", format: formatPitch },
      rate: { xmlName: "rate", format: formatRate },
      duration: { xmlName: "duration", format: formatTime },
      volume: { xmlName: "volume", format: formatVolume },
    },
    order: ["pitch", "contour", "range", "rate", "duration", "volume"],
  },
  "say-as": {
    tag: "say-as",
    content: "text",
    attributes: {
      interpretAs: { xmlName: "interpret-as", format: str },
      format: { xmlName: "format", format: str },
      detail: { xmlName: "detail", format: str },
    },
    order: ["interpretAs", "format", "detail"],
    required: ["interpretAs"],
  },
  audio: {
    tag: "audio",
    content: "mixed",
    attributes: {
      src: { xmlName: "src", format: (v) => v.href },
      clipBegin: { xmlName: "clipBegin", format: formatTime },
      clipEnd: { xmlName: "clipEnd", format: formatTime },
      repeatCount: { xmlName: "repeatCount", format: formatNumber },
      repeatDur: { xmlName: "repeatDur", format: formatTime },
      soundLevel: { xmlName: "soundLevel", format: formatDecibels },
      speed: { xmlName: "speed", format: formatPercent },
      desc: { xmlName: "desc", format: str, asChild: "desc" },
    },
    order: ["src", "clipBegin", "clipEnd", "repeatCount", "repeatDur", "soundLevel", "speed", "desc"],
    required: ["src"],
  },
  voice: {
    tag: "voice",
    content: "mixed",
    attributes: {
      gender: { xmlName: "gender", format: str },
      age: { xmlName: "age", format: formatNumber },
      name: { xmlName: "name", format: list },
      variant: { xmlName: "variant", format: str },
      language: { xmlName: "language", format: (v) => list(v.map((l) => l.tag)) },
      effect: { xmlName: "effect", format: str },
    },
    order: ["gender", "age", "name", "variant", "language", "effect"],
  },
  p: {
    tag: "p",
    content: "mixed",
    forbiddenChildren: ["p"],
    attributes: {},
    order: [],
  },
  s: {
    tag: "s",
    content: "mixed",
    forbiddenChildren: ["p", "s"],
    attributes: {},
    order: [],
  },
  mark: {
    tag: "mark",
    content: "empty",
    attributes: {
      name: { xmlName: "name", format: str },
    },
    order: ["name"],
    required: ["name"],
  },
  lang: {
    tag: "lang",
    content: "mixed",
    attributes: {
      lang: { xmlName: "xml:lang", format: (v) => v.tag },
      onLangFailure: { xmlName: "onlangfailure", format: str },
    },
    order: ["lang", "onLangFailure"],
    required: ["lang"],
  },
  sub: {
    tag: "sub",
    content: "text",
    attributes: {
      alias: { xmlName: "alias", format: str },
    },
    order: ["alias"],
    required: ["alias"],
  },
  phoneme: {
    tag: "phoneme",
    content: "text",
    attributes: {
      alphabet: { xmlName: "alphabet", format: str },
      ph: { xmlName: "ph", format: str },
    },
    order: ["alphabet", "ph"],
    required: ["ph"],
  },
  "express-as": {
    tag: "mstts:express-as",
    content: "mixed",
    attributes: {
      style: { xmlName: "style", format: str },
      styleDegree: { xmlName: "styledegree", format: formatNumber },
      role: { xmlName: "role", format: str },
    },
    order: ["style", "styleDegree", "role"],
    required: ["style"],
  },
  viseme: {
    tag: "mstts:viseme",
    content: "empty",
    attributes: {
      type: { xmlName: "type", format: str },
    },
    order: ["type"],
    required: ["type"],
  },
};

export function elementSchema<K extends ElementKind>(kind: K): ElementSchema<K> {
  return ELEMENT_SCHEMAS[kind];
}
