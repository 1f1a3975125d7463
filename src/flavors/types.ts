/**
 * Capability table types. A flavor is a target speech service's SSML dialect; its
 * table says which elements and attributes it accepts, how values are normalized,
 * and how tags are spelled on the wire.
 */

import type { AttributeName, AttributeValue, ElementKind, ParentKind } from "../elements/types";

export const FLAVORS = ["generic", "azure", "google", "amazon-polly", "songbird"] as const;

/**
 * - generic: plain W3C SSML 1.1, no service-specific range checks
 * - azure: Microsoft Azure AI Speech (adds the mstts namespace)
 * - google: Google Cloud Text-to-Speech
 * - amazon-polly: Amazon Polly, standard voices
 * - songbird: pyke Songbird
 */
export type Flavor = (typeof FLAVORS)[number];

export function isFlavor(value: string): value is Flavor {
  return FLAVORS.some((flavor) => flavor === value);
}

export type Normalized<V> = { ok: true; value: V } | { ok: false; domain: string };

export interface UnsupportedRule {
  readonly support: "unsupported";
}

export interface SupportedRule<V> {
  readonly support: "supported";
  /** Human-readable accepted domain, quoted in AttributeOutOfRange errors. */
  readonly domain: string;
  /** Clamp, coerce or reject. Must be idempotent. */
  normalize(value: V): Normalized<V>;
  /** When true for a normalized value, rendering may leave the attribute out. */
  omit?(value: V): boolean;
}

export type Rule<V> = UnsupportedRule | SupportedRule<V>;

export type AttributeRules<K extends ElementKind> = {
  readonly [A in AttributeName<K>]: Rule<AttributeValue<K, A>>;
};

/** Parent restriction narrower than the universal structural rule. */
export interface ParentRule {
  /** Only these parents are accepted. */
  only?: readonly ParentKind[];
  /** These parents are refused. */
  except?: readonly ParentKind[];
}

export interface ElementSupport<K extends ElementKind> {
  attributes: AttributeRules<K>;
  /** Attributes this flavor requires to be present. */
  required?: readonly AttributeName<K>[];
  parents?: ParentRule;
  /** Wire tag, when it differs from the canonical one. */
  tag?: string;
  /** Wire attribute names, when they differ from the canonical ones. */
  attributeNames?: { readonly [A in AttributeName<K>]?: string };
}

/** Absent entries are elements the flavor does not support. */
export type ElementTable = { readonly [K in ElementKind]?: ElementSupport<K> };

export interface XmlAttribute {
  readonly name: string;
  readonly value: string;
}

export interface FlavorProfile {
  readonly flavor: Flavor;
  readonly label: string;
  readonly elements: ElementTable;
  /** Root attributes written before and after the document's own `speak` attributes. */
  readonly root: {
    readonly leading: readonly XmlAttribute[];
    readonly trailing: readonly XmlAttribute[];
  };
}
