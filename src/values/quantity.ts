/**
 * Numeric attribute values with a unit: durations, decibels, semitones, hertz and
 * relative percentages. Parsed from SSML literals such as "750ms", "-6dB" or "+2st".
 */

import { ValueError } from "../errors";
import { formatNumber, formatSigned, isWritable } from "./format";

/** Non-negative offset of time, always held in milliseconds. */
export interface TimeDesignation {
  readonly unit: "ms";
  readonly value: number;
}

/** Signed amplitude offset. */
export interface Decibels {
  readonly unit: "dB";
  readonly value: number;
}

export interface Semitones {
  readonly unit: "st";
  readonly value: number;
}

/** Relative frequency change. */
export interface Hertz {
  readonly unit: "Hz";
  readonly value: number;
}

/** Relative change in percent (+10 means ten percent more). */
export interface Percent {
  readonly unit: "%";
  readonly value: number;
}

export type TimeInput = TimeDesignation | string | number;
export type DecibelsInput = Decibels | string | number;

const QUANTITY = /^([+-]?(?:\d+(?:\.\d*)?|\.\d+))(ms|s|dB|st|Hz|%)$/;

interface RawQuantity {
  value: number;
  unit: string;
}

function parseQuantity(input: string): RawQuantity | undefined {
  const match = QUANTITY.exec(input.trim());
  if (!match) return undefined;
  return { value: Number(match[1]), unit: match[2] };
}

/** Finite, below 1e15 in magnitude and not a nonzero value smaller than 0.001. */
function finite(value: number, input: string, expected: string): number {
  if (!isWritable(value)) throw new ValueError(input, expected);
  return value;
}

export function millis(value: number): TimeDesignation {
  finite(value, String(value), "a finite number of milliseconds");
  if (value < 0) throw new ValueError(String(value), "a non-negative duration");
  return { unit: "ms", value };
}

export function seconds(value: number): TimeDesignation {
  finite(value, String(value), "a finite number of seconds");
  return millis(value * 1000);
}

/**
 * Parse a duration in seconds or milliseconds.
 * Accepts "15s", "750ms", "+0.75s"; rejects "-5s", "5 s", "15sec", "5m".
 */
export function parseTime(input: string): TimeDesignation {
  const q = parseQuantity(input);
  if (!q || (q.unit !== "ms" && q.unit !== "s")) {
    throw new ValueError(input, "a duration in s or ms");
  }
  if (q.value < 0 || input.trim().startsWith("-")) {
    throw new ValueError(input, "a non-negative duration");
  }
  return millis(q.unit === "s" ? q.value * 1000 : q.value);
}

/** Numbers are taken as milliseconds. */
export function toTime(input: TimeInput): TimeDesignation {
  if (typeof input === "number") return millis(input);
  if (typeof input === "string") return parseTime(input);
  return input;
}

export function formatTime(time: TimeDesignation): string {
  return `${formatNumber(time.value)}ms`;
}

export function decibels(value: number): Decibels {
  return { unit: "dB", value: finite(value, String(value), "a finite decibel offset") };
}

/** Parse "+6dB", "-.6dB" or "2dB". The unit is case sensitive. */
export function parseDecibels(input: string): Decibels {
  const q = parseQuantity(input);
  if (!q || q.unit !== "dB") throw new ValueError(input, "a decibel offset such as -6dB");
  return decibels(q.value);
}

export function toDecibels(input: DecibelsInput): Decibels {
  if (typeof input === "number") return decibels(input);
  if (typeof input === "string") return parseDecibels(input);
  return input;
}

export function semitones(value: number): Semitones {
  return { unit: "st", value: finite(value, String(value), "a finite semitone offset") };
}

export function hertz(value: number): Hertz {
  return { unit: "Hz", value: finite(value, String(value), "a finite frequency offset") };
}

export function percent(value: number): Percent {
  return { unit: "%", value: finite(value, String(value), "a finite percentage") };
}

/** Parse a signed relative value in st, Hz, dB or %; used by prosody parsing. */
export function parseRelative(input: string): Semitones | Hertz | Decibels | Percent | undefined {
  const q = parseQuantity(input);
  if (!q) return undefined;
  switch (q.unit) {
    case "st":
      return semitones(q.value);
    case "Hz":
      return hertz(q.value);
    case "dB":
      return decibels(q.value);
    case "%":
      return percent(q.value);
    default:
      return undefined;
  }
}

export function formatDecibels(value: Decibels): string {
  return `${formatSigned(value.value)}dB`;
}

export function formatRelative(value: Semitones | Hertz | Decibels | Percent): string {
  return `${formatSigned(value.value)}${value.unit}`;
}
