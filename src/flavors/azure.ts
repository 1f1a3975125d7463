/**
 * Azure AI Speech flavor.
 * Adds the mstts namespace (express-as, viseme, voice effects), spells marks as
 * `<bookmark mark="...">` and requires a document language and a voice name.
 */

import { BREAK_STRENGTHS, EMPHASIS_LEVELS, VISEME_TYPES, VOICE_EFFECTS } from "../values/keywords";
import { SYNTHESIS_NAMESPACE } from "./generic";
import { accept, clamp, contourRule, numberRule, oneOf, pitchRule, rateRule, timeRule, unsupported, volumeRule } from "./rules";
import type { FlavorProfile } from "./types";

export const MSTTS_NAMESPACE = "http://www.w3.org/2001/mstts";

const AZURE_INTERPRET_AS = [
  "address",
  "cardinal",
  "characters",
  "currency",
  "date",
  "digits",
  "duration",
  "fraction",
  "name",
  "number",
  "ordinal",
  "spell-out",
  "telephone",
  "time",
];

const anyNumber = clamp(-Infinity, Infinity);
const pitchUnits = { st: anyNumber, Hz: anyNumber, "%": anyNumber };

export const azure: FlavorProfile = {
  flavor: "azure",
  label: "Azure AI Speech",
  root: {
    leading: [
      { name: "version", value: "1.0" },
      { name: "xmlns", value: SYNTHESIS_NAMESPACE },
    ],
    trailing: [{ name: "xmlns:mstts", value: MSTTS_NAMESPACE }],
  },
  elements: {
    speak: {
      attributes: { lang: accept(), startMark: unsupported, endMark: unsupported },
      required: ["lang"],
    },
    break: {
      attributes: { strength: oneOf(BREAK_STRENGTHS), time: timeRule(clamp(0, 20000)) },
    },
    emphasis: {
      attributes: { level: oneOf(EMPHASIS_LEVELS) },
    },
    prosody: {
      attributes: {
        pitch: pitchRule(pitchUnits),
        contour: contourRule(pitchUnits),
        range: unsupported,
        rate: rateRule(clamp(0.5, 2)),
        duration: unsupported,
        volume: volumeRule({ "%": clamp(-100, 100) }),
      },
    },
    "say-as": {
      attributes: { interpretAs: oneOf(AZURE_INTERPRET_AS), format: accept(), detail: accept() },
    },
    audio: {
      attributes: {
        src: accept(),
        clipBegin: unsupported,
        clipEnd: unsupported,
        repeatCount: unsupported,
        repeatDur: unsupported,
        soundLevel: unsupported,
        speed: unsupported,
        desc: unsupported,
      },
    },
    voice: {
      attributes: {
        gender: unsupported,
        age: unsupported,
        name: accept(),
        variant: unsupported,
        language: unsupported,
        effect: oneOf(VOICE_EFFECTS),
      },
      required: ["name"],
      parents: { only: ["speak"] },
    },
    p: { attributes: {} },
    s: { attributes: {} },
    mark: {
      attributes: { name: accept() },
      tag: "bookmark",
      attributeNames: { name: "mark" },
    },
    lang: {
      attributes: { lang: accept(), onLangFailure: unsupported },
    },
    sub: {
      attributes: { alias: accept() },
    },
    phoneme: {
      attributes: { alphabet: oneOf(["ipa", "sapi", "ups", "x-sampa"]), ph: accept() },
    },
    "express-as": {
      attributes: { style: accept(), styleDegree: numberRule(clamp(0.01, 2), "", 1), role: accept() },
      parents: { only: ["voice"] },
    },
    viseme: {
      attributes: { type: oneOf(VISEME_TYPES) },
      parents: { only: ["voice"] },
    },
  },
};
