/**
 * Voice selection descriptors for the `voice` element.
 */

import { ValueError } from "../errors";
import { isWritable } from "./format";
import { toLanguageTag, type LanguageTag } from "./language";
import type { VoiceEffect, VoiceGender } from "./keywords";

/** A voice name as the target service spells it, e.g. "en-US-JennyNeural". */
export type VoiceName = string;

export interface VoiceConfig {
  gender?: VoiceGender;
  age?: number;
  name?: VoiceName | readonly VoiceName[];
  variant?: string;
  language?: LanguageTag | string | readonly (LanguageTag | string)[];
  /** Azure only. */
  effect?: VoiceEffect;
}

export function voiceName(input: string): VoiceName {
  const name = input.trim();
  if (name.length === 0 || /\s/.test(name)) throw new ValueError(input, "a voice name without whitespace");
  return name;
}

export function voiceNames(input: VoiceName | readonly VoiceName[]): readonly VoiceName[] {
  const list = typeof input === "string" ? [input] : input;
  if (list.length === 0) throw new ValueError("", "at least one voice name");
  return list.map(voiceName);
}

export function voiceLanguages(
  input: LanguageTag | string | readonly (LanguageTag | string)[]
): readonly LanguageTag[] {
  if (typeof input === "string" || "tag" in input) return [toLanguageTag(input)];
  return input.map((entry) => toLanguageTag(entry));
}

export function voiceAge(input: number): number {
  if (!Number.isInteger(input) || input < 0 || !isWritable(input)) throw new ValueError(String(input), "a non-negative integer age");
  return input;
}
