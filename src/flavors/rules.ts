/**
 * Rule constructors for capability tables.
 *
 * Numeric domains declare a policy: "clamp" pulls an out-of-range value to the nearest
 * bound, "reject" fails validation with AttributeOutOfRange.
 */

import type { AudioSource } from "../values/audio";
import type { ContourPoint, ProsodyContour, ProsodyPitch, ProsodyRate, ProsodyVolume } from "../values/prosody";
import type { Decibels, TimeDesignation } from "../values/quantity";
import { formatNumber } from "../values/format";
import type { Normalized, SupportedRule, UnsupportedRule } from "./types";

export const unsupported: UnsupportedRule = { support: "unsupported" };

export interface Bound {
  policy: "clamp" | "reject";
  min: number;
  max: number;
}

export function clamp(min: number, max: number): Bound {
  return { policy: "clamp", min, max };
}

export function within(min: number, max: number): Bound {
  return { policy: "reject", min, max };
}

export function describeBound(bound: Bound, unit = ""): string {
  const suffix = unit ? ` ${unit}` : "";
  if (bound.min === -Infinity && bound.max === Infinity) return `any number${suffix ? ` of${suffix}` : ""}`;
  if (bound.max === Infinity) return `at least ${formatNumber(bound.min)}${suffix}`;
  if (bound.min === -Infinity) return `at most ${formatNumber(bound.max)}${suffix}`;
  return `${formatNumber(bound.min)} to ${formatNumber(bound.max)}${suffix}`;
}

/** The bounded value, or undefined when a reject bound is violated. */
export function applyBound(value: number, bound: Bound): number | undefined {
  if (value >= bound.min && value <= bound.max) return value;
  if (bound.policy === "reject") return undefined;
  return Math.min(bound.max, Math.max(bound.min, value));
}

const ok = <V>(value: V): Normalized<V> => ({ ok: true, value });

export function rule<V>(
  domain: string,
  normalize: (value: V) => Normalized<V>,
  omit?: (value: V) => boolean
): SupportedRule<V> {
  return omit ? { support: "supported", domain, normalize, omit } : { support: "supported", domain, normalize };
}

/** Supported with no further checks. */
export function accept<V>(domain = "any value", omit?: (value: V) => boolean): SupportedRule<V> {
  return rule<V>(domain, ok, omit);
}

export function oneOf<V extends string>(values: readonly V[], omitWhen?: V): SupportedRule<V> {
  const domain = `one of ${values.join(", ")}`;
  return rule<V>(
    domain,
    (value) => (values.includes(value) ? ok(value) : { ok: false, domain }),
    omitWhen === undefined ? undefined : (value) => value === omitWhen
  );
}

export function numberRule(bound: Bound, unit = "", omitWhen?: number): SupportedRule<number> {
  const domain = describeBound(bound, unit);
  return rule<number>(
    domain,
    (value) => {
      const bounded = applyBound(value, bound);
      return bounded === undefined ? { ok: false, domain } : ok(bounded);
    },
    omitWhen === undefined ? undefined : (value) => value === omitWhen
  );
}

export function timeRule(bound: Bound): SupportedRule<TimeDesignation> {
  const domain = describeBound(bound, "ms");
  return rule<TimeDesignation>(domain, (time) => {
    const bounded = applyBound(time.value, bound);
    if (bounded === undefined) return { ok: false, domain };
    const next: TimeDesignation = bounded === time.value ? time : { unit: "ms", value: bounded };
    return ok(next);
  });
}

export function decibelsRule(bound: Bound): SupportedRule<Decibels> {
  const domain = describeBound(bound, "dB");
  return rule<Decibels>(domain, (db) => {
    const bounded = applyBound(db.value, bound);
    if (bounded === undefined) return { ok: false, domain };
    const next: Decibels = bounded === db.value ? db : { unit: "dB", value: bounded };
    return ok(next);
  });
}

type PitchUnit = "st" | "Hz" | "%";
type VolumeUnit = "dB" | "%";

function describeUnits(keywords: boolean, units: Partial<Record<string, Bound>>): string {
  const parts = keywords ? ["a keyword"] : [];
  for (const [unit, bound] of Object.entries(units)) {
    if (bound) parts.push(`${unit} offset (${describeBound(bound)})`);
  }
  return parts.join(" or ");
}

/** Bound a unit-tagged quantity; `undefined` when its unit is not accepted or a reject bound fails. */
function boundQuantity<Q extends { readonly unit: U; readonly value: number }, U extends string>(
  quantity: Q,
  units: Partial<Record<U, Bound>>
): Q | undefined {
  const bound = units[quantity.unit];
  if (!bound) return undefined;
  const bounded = applyBound(quantity.value, bound);
  if (bounded === undefined) return undefined;
  return bounded === quantity.value ? quantity : { ...quantity, value: bounded };
}

export function pitchRule(units: Partial<Record<PitchUnit, Bound>>, keywords = true): SupportedRule<ProsodyPitch> {
  const domain = describeUnits(keywords, units);
  return rule<ProsodyPitch>(domain, (pitch) => {
    if (typeof pitch === "string") return keywords ? ok(pitch) : { ok: false, domain };
    const bounded = boundQuantity(pitch, units);
    return bounded === undefined ? { ok: false, domain } : ok(bounded);
  });
}

export function contourRule(units: Partial<Record<PitchUnit, Bound>>): SupportedRule<ProsodyContour> {
  const pitch = pitchRule(units);
  const domain = `points whose pitch is ${pitch.domain}`;
  return rule<ProsodyContour>(domain, (points) => {
    const out: ContourPoint[] = [];
    for (const point of points) {
      const normalized = pitch.normalize(point.pitch);
      if (!normalized.ok) return { ok: false, domain };
      out.push(normalized.value === point.pitch ? point : { position: point.position, pitch: normalized.value });
    }
    return ok(out);
  });
}

export function volumeRule(units: Partial<Record<VolumeUnit, Bound>>): SupportedRule<ProsodyVolume> {
  const domain = describeUnits(true, units);
  return rule<ProsodyVolume>(domain, (volume) => {
    if (typeof volume === "string") return ok(volume);
    const bounded = boundQuantity(volume, units);
    return bounded === undefined ? { ok: false, domain } : ok(bounded);
  });
}

/** Rate multipliers; the bound is expressed as a multiplier (0.5 = 50%). */
export function rateRule(bound: Bound): SupportedRule<ProsodyRate> {
  const domain = `a keyword or a rate of ${describeBound({ ...bound, min: bound.min * 100, max: bound.max * 100 }, "%")}`;
  return rule<ProsodyRate>(domain, (rate) => {
    if (typeof rate === "string") return ok(rate);
    const bounded = applyBound(rate.value, bound);
    if (bounded === undefined) return { ok: false, domain };
    const next: ProsodyRate = bounded === rate.value ? rate : { unit: "factor", value: bounded };
    return ok(next);
  });
}

/** Audio sources restricted to a set of URI schemes; relative references are refused. */
export function schemeRule(schemes: readonly string[]): SupportedRule<AudioSource> {
  const domain = `an absolute ${schemes.join(" or ")} URI`;
  return rule<AudioSource>(domain, (src) =>
    src.scheme !== undefined && schemes.includes(src.scheme) ? ok(src) : { ok: false, domain }
  );
}
