/**
 * Amazon Polly flavor (standard voices).
 * No voice element; audio clips must be served over https.
 */

import { BREAK_STRENGTHS } from "../values/keywords";
import {
  accept,
  clamp,
  oneOf,
  pitchRule,
  rateRule,
  schemeRule,
  timeRule,
  unsupported,
  volumeRule,
} from "./rules";
import type { FlavorProfile } from "./types";

const POLLY_INTERPRET_AS = [
  "address",
  "cardinal",
  "characters",
  "date",
  "digits",
  "expletive",
  "fraction",
  "number",
  "ordinal",
  "spell-out",
  "telephone",
  "time",
  "unit",
];

export const amazonPolly: FlavorProfile = {
  flavor: "amazon-polly",
  label: "Amazon Polly",
  root: { leading: [], trailing: [] },
  elements: {
    speak: {
      attributes: { lang: accept(), startMark: unsupported, endMark: unsupported },
    },
    break: {
      attributes: { strength: oneOf(BREAK_STRENGTHS), time: timeRule(clamp(0, 10000)) },
    },
    emphasis: {
      attributes: { level: oneOf(["reduced", "moderate", "strong"], "moderate") },
    },
    prosody: {
      attributes: {
        pitch: pitchRule({ "%": clamp(-Infinity, Infinity) }),
        contour: unsupported,
        range: unsupported,
        rate: rateRule(clamp(0.2, 2)),
        duration: unsupported,
        volume: volumeRule({ dB: clamp(-Infinity, 6) }),
      },
    },
    "say-as": {
      attributes: { interpretAs: oneOf(POLLY_INTERPRET_AS), format: accept(), detail: unsupported },
    },
    audio: {
      attributes: {
        src: schemeRule(["https"]),
        clipBegin: unsupported,
        clipEnd: unsupported,
        repeatCount: unsupported,
        repeatDur: unsupported,
        soundLevel: unsupported,
        speed: unsupported,
        desc: unsupported,
      },
    },
    p: { attributes: {} },
    s: { attributes: {} },
    mark: {
      attributes: { name: accept() },
    },
    lang: {
      attributes: { lang: accept(), onLangFailure: unsupported },
    },
    sub: {
      attributes: { alias: accept() },
    },
    phoneme: {
      attributes: { alphabet: oneOf(["ipa", "x-sampa"]), ph: accept() },
    },
  },
};
