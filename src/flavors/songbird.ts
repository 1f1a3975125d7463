/**
 * pyke Songbird flavor: a small subset for local synthesis.
 */

import { BREAK_STRENGTHS } from "../values/keywords";
import { accept, clamp, oneOf, pitchRule, rateRule, timeRule, unsupported, volumeRule } from "./rules";
import type { FlavorProfile } from "./types";

const anyNumber = clamp(-Infinity, Infinity);

export const songbird: FlavorProfile = {
  flavor: "songbird",
  label: "pyke Songbird",
  root: { leading: [], trailing: [] },
  elements: {
    speak: {
      attributes: { lang: accept(), startMark: unsupported, endMark: unsupported },
    },
    break: {
      attributes: { strength: oneOf(BREAK_STRENGTHS), time: timeRule(clamp(0, Infinity)) },
    },
    prosody: {
      attributes: {
        pitch: pitchRule({ st: anyNumber, Hz: anyNumber, "%": anyNumber }),
        contour: unsupported,
        range: unsupported,
        rate: rateRule(clamp(0, Infinity)),
        duration: unsupported,
        volume: volumeRule({ dB: anyNumber, "%": anyNumber }),
      },
    },
    voice: {
      attributes: {
        gender: unsupported,
        age: unsupported,
        name: accept(),
        variant: unsupported,
        language: unsupported,
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
