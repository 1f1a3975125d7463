import { ValueError } from "../errors";

/** Reference to an audio clip. Relative references ("beep.ogg") are allowed. */
export interface AudioSource {
  readonly href: string;
  /** Lower-cased URI scheme, when the reference is absolute. */
  readonly scheme?: string;
}

const SCHEME = /^([A-Za-z][A-Za-z0-9+.-]*):/;

export function audioSource(input: string): AudioSource {
  const href = input.trim();
  if (href.length === 0 || /\s/.test(href)) throw new ValueError(input, "a URI without whitespace");
  const match = SCHEME.exec(href);
  return match ? { href, scheme: match[1].toLowerCase() } : { href };
}

export function toAudioSource(input: AudioSource | string): AudioSource {
  return typeof input === "string" ? audioSource(input) : input;
}
