/**
 * Closed keyword domains used by element attributes.
 */

export const BREAK_STRENGTHS = ["none", "x-weak", "weak", "medium", "strong", "x-strong"] as const;
export type BreakStrength = (typeof BREAK_STRENGTHS)[number];

export const EMPHASIS_LEVELS = ["reduced", "none", "moderate", "strong"] as const;
export type EmphasisLevel = (typeof EMPHASIS_LEVELS)[number];

export const VOICE_GENDERS = ["neutral", "female", "male"] as const;
export type VoiceGender = (typeof VOICE_GENDERS)[number];

/** Azure playback optimizations: eq_car for in-car speakers, eq_telecomhp8k for 8 kHz telephony. */
export const VOICE_EFFECTS = ["eq_car", "eq_telecomhp8k"] as const;
export type VoiceEffect = (typeof VOICE_EFFECTS)[number];

export const LANG_FAILURES = ["changevoice", "ignoretext", "ignorelang", "processorchoice"] as const;
export type LangFailure = (typeof LANG_FAILURES)[number];

export const PHONETIC_ALPHABETS = ["ipa", "x-sampa", "sapi", "ups", "x-amazon-pinyin", "japanese-yomigana"] as const;
export type PhoneticAlphabet = (typeof PHONETIC_ALPHABETS)[number];

/** Azure viseme output: viseme ids or blend shapes. */
export const VISEME_TYPES = ["redlips_front", "FacialExpression"] as const;
export type VisemeType = (typeof VISEME_TYPES)[number];

export function isOneOf<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((entry) => entry === value);
}
