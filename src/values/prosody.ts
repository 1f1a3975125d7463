/**
 * Prosody descriptors: pitch, rate, volume and pitch contours.
 * Each accepts either a keyword or a typed quantity.
 */

import { ValueError } from "../errors";
import { formatNumber, formatPercent, isWritable } from "./format";
import {
  formatDecibels,
  formatRelative,
  parseRelative,
  type Decibels,
  type Hertz,
  type Percent,
  type Semitones,
} from "./quantity";

export const PITCH_KEYWORDS = ["x-low", "low", "medium", "high", "x-high", "default"] as const;
export const RATE_KEYWORDS = ["x-slow", "slow", "medium", "fast", "x-fast", "default"] as const;
export const VOLUME_KEYWORDS = ["silent", "x-soft", "soft", "medium", "loud", "x-loud", "default"] as const;

export type PitchKeyword = (typeof PITCH_KEYWORDS)[number];
export type RateKeyword = (typeof RATE_KEYWORDS)[number];
export type VolumeKeyword = (typeof VOLUME_KEYWORDS)[number];

/** Speaking-rate multiplier; 1 is the voice's normal rate. Rendered as a percentage. */
export interface RateFactor {
  readonly unit: "factor";
  readonly value: number;
}

export type ProsodyPitch = PitchKeyword | Semitones | Hertz | Percent;
export type ProsodyRate = RateKeyword | RateFactor;
export type ProsodyVolume = VolumeKeyword | Decibels | Percent;

/** One point of a pitch contour; `position` is a fraction (0..1) of the element's duration. */
export interface ContourPoint {
  readonly position: number;
  readonly pitch: ProsodyPitch;
}

export type ProsodyContour = readonly ContourPoint[];

function includes<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((entry) => entry === value);
}

export function isPitchKeyword(value: string): value is PitchKeyword {
  return includes(PITCH_KEYWORDS, value);
}

export function isRateKeyword(value: string): value is RateKeyword {
  return includes(RATE_KEYWORDS, value);
}

export function isVolumeKeyword(value: string): value is VolumeKeyword {
  return includes(VOLUME_KEYWORDS, value);
}

export function rateFactor(value: number): RateFactor {
  if (!isWritable(value) || value < 0) throw new ValueError(String(value), "a non-negative finite rate multiplier");
  return { unit: "factor", value };
}

/** "high", "+2st", "-20Hz", "+10%". */
export function parsePitch(input: string): ProsodyPitch {
  const trimmed = input.trim();
  if (isPitchKeyword(trimmed)) return trimmed;
  const relative = parseRelative(trimmed);
  if (relative && relative.unit !== "dB") return relative;
  throw new ValueError(input, "a pitch keyword or an offset in st, Hz or %");
}

/** "slow", "120%" (taken as a multiplier of 1.2). */
export function parseRate(input: string): ProsodyRate {
  const trimmed = input.trim();
  if (isRateKeyword(trimmed)) return trimmed;
  const match = /^(\d+(?:\.\d*)?|\.\d+)%$/.exec(trimmed);
  if (match) return rateFactor(Number(match[1]) / 100);
  throw new ValueError(input, "a rate keyword or a non-negative percentage");
}

/** "loud", "-6dB", "+10%". */
export function parseVolume(input: string): ProsodyVolume {
  const trimmed = input.trim();
  if (isVolumeKeyword(trimmed)) return trimmed;
  const relative = parseRelative(trimmed);
  if (relative && (relative.unit === "dB" || relative.unit === "%")) return relative;
  throw new ValueError(input, "a volume keyword or an offset in dB or %");
}

export function toPitch(input: ProsodyPitch | string): ProsodyPitch {
  return typeof input === "string" ? parsePitch(input) : input;
}

/** Numbers are multipliers. */
export function toRate(input: ProsodyRate | string | number): ProsodyRate {
  if (typeof input === "number") return rateFactor(input);
  return typeof input === "string" ? parseRate(input) : input;
}

export function toVolume(input: ProsodyVolume | string): ProsodyVolume {
  return typeof input === "string" ? parseVolume(input) : input;
}

export function contour(points: Iterable<readonly [number, ProsodyPitch | string]>): ProsodyContour {
  return Array.from(points, ([position, pitch]) => {
    if (!Number.isFinite(position) || position < 0 || position > 1) {
      throw new ValueError(String(position), "a contour position between 0 and 1");
    }
    return { position, pitch: toPitch(pitch) };
  });
}

export function formatPitch(pitch: ProsodyPitch): string {
  return typeof pitch === "string" ? pitch : formatRelative(pitch);
}

export function formatRate(rate: ProsodyRate): string {
  return typeof rate === "string" ? rate : formatPercent(rate.value);
}

export function formatVolume(volume: ProsodyVolume): string {
  if (typeof volume === "string") return volume;
  return volume.unit === "dB" ? formatDecibels(volume) : formatRelative(volume);
}

/** "(0%,+20Hz) (50%,-2st)". */
export function formatContour(points: ProsodyContour): string {
  return points.map((p) => `(${formatNumber(p.position * 100)}%,${formatPitch(p.pitch)})`).join(" ");
}
