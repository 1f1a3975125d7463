/**
 * Google Cloud Text-to-Speech flavor.
 * Volume is given in decibels only; rate and break time outside the service's range are rejected.
 */

import { BREAK_STRENGTHS, EMPHASIS_LEVELS, VOICE_GENDERS } from "../values/keywords";
import {
  accept,
  clamp,
  decibelsRule,
  numberRule,
  oneOf,
  pitchRule,
  rateRule,
  timeRule,
  unsupported,
  volumeRule,
  within,
} from "./rules";
import type { FlavorProfile } from "./types";

const GOOGLE_INTERPRET_AS = [
  "bleep",
  "cardinal",
  "characters",
  "currency",
  "date",
  "expletive",
  "fraction",
  "ordinal",
  "spell-out",
  "telephone",
  "time",
  "unit",
  "verbatim",
];

const anyNumber = clamp(-Infinity, Infinity);
const nonNegative = clamp(0, Infinity);

export const google: FlavorProfile = {
  flavor: "google",
  label: "Google Cloud Text-to-Speech",
  root: { leading: [], trailing: [] },
  elements: {
    speak: {
      attributes: { lang: accept(), startMark: unsupported, endMark: unsupported },
    },
    break: {
      attributes: { strength: oneOf(BREAK_STRENGTHS), time: timeRule(within(0, 10000)) },
    },
    emphasis: {
      attributes: { level: oneOf(EMPHASIS_LEVELS, "moderate") },
    },
    prosody: {
      attributes: {
        pitch: pitchRule({ st: anyNumber, Hz: anyNumber, "%": anyNumber }),
        contour: unsupported,
        range: unsupported,
        rate: rateRule(within(0.25, 4)),
        duration: unsupported,
        volume: volumeRule({ dB: anyNumber }),
      },
    },
    "say-as": {
      attributes: { interpretAs: oneOf(GOOGLE_INTERPRET_AS), format: accept(), detail: accept() },
    },
    audio: {
      attributes: {
        src: accept(),
        clipBegin: timeRule(nonNegative),
        clipEnd: timeRule(nonNegative),
        repeatCount: numberRule(nonNegative),
        repeatDur: timeRule(nonNegative),
        soundLevel: decibelsRule(clamp(-40, 40)),
        speed: numberRule(clamp(0.5, 2)),
        desc: accept(),
      },
    },
    voice: {
      attributes: {
        gender: oneOf(VOICE_GENDERS),
        age: unsupported,
        name: accept(),
        variant: accept(),
        language: accept(),
        effect: unsupported,
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
