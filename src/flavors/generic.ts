/**
 * Generic flavor: W3C SSML 1.1 with no service-specific limits.
 * Every standard element and attribute passes through unchanged; the Azure
 * extensions are refused.
 */

import { BREAK_STRENGTHS, EMPHASIS_LEVELS, LANG_FAILURES, PHONETIC_ALPHABETS, VOICE_GENDERS } from "../values/keywords";
import { accept, oneOf, unsupported } from "./rules";
import type { FlavorProfile } from "./types";

export const SYNTHESIS_NAMESPACE = "http://www.w3.org/2001/10/synthesis";

export const generic: FlavorProfile = {
  flavor: "generic",
  label: "W3C SSML 1.1",
  root: {
    leading: [
      { name: "version", value: "1.0" },
      { name: "xmlns", value: SYNTHESIS_NAMESPACE },
    ],
    trailing: [],
  },
  elements: {
    speak: {
      attributes: { lang: accept(), startMark: accept(), endMark: accept() },
    },
    break: {
      attributes: { strength: oneOf(BREAK_STRENGTHS), time: accept() },
    },
    emphasis: {
      attributes: { level: oneOf(EMPHASIS_LEVELS) },
    },
    prosody: {
      attributes: {
        pitch: accept(),
        contour: accept(),
        range: accept(),
        rate: accept(),
        duration: accept(),
        volume: accept(),
      },
    },
    "say-as": {
      attributes: { interpretAs: accept(), format: accept(), detail: accept() },
    },
    audio: {
      attributes: {
        src: accept(),
        clipBegin: accept(),
        clipEnd: accept(),
        repeatCount: accept(),
        repeatDur: accept(),
        soundLevel: accept(),
        speed: accept(),
        desc: accept(),
      },
    },
    voice: {
      attributes: {
        gender: oneOf(VOICE_GENDERS),
        age: accept(),
        name: accept(),
        variant: accept(),
        language: accept(),
        // mstts extension
        effect: unsupported,
      },
    },
    p: { attributes: {} },
    s: { attributes: {} },
    mark: {
      attributes: { name: accept() },
    },
    lang: {
      attributes: { lang: accept(), onLangFailure: oneOf(LANG_FAILURES) },
    },
    sub: {
      attributes: { alias: accept() },
    },
    phoneme: {
      attributes: { alphabet: oneOf(PHONETIC_ALPHABETS), ph: accept() },
    },
  },
};
