import { ValueError } from "../errors";

/** A BCP-47 style language tag such as "en-US" or "zh-Hant-TW". */
export interface LanguageTag {
  readonly tag: string;
}

const LANGUAGE_TAG = /^[A-Za-z]{2,3}(?:-[A-Za-z0-9]{1,8})*$/;

export function languageTag(input: string): LanguageTag {
  const tag = input.trim();
  if (!LANGUAGE_TAG.test(tag)) throw new ValueError(input, "a language tag such as en-US");
  return { tag };
}

export function toLanguageTag(input: LanguageTag | string): LanguageTag {
  return typeof input === "string" ? languageTag(input) : input;
}

/** Primary language subtag, lower-cased: "en" for "en-US". */
export function primaryLanguage(lang: LanguageTag): string {
  return lang.tag.split("-")[0].toLowerCase();
}
