/**
 * Flavor registry: capability lookups per target service.
 */

import type { AttributeName, AttributeValue, ElementKind, ParentKind } from "../elements/types";
import { amazonPolly } from "./amazon-polly";
import { azure } from "./azure";
import { generic } from "./generic";
import { google } from "./google-cloud";
import { unsupported } from "./rules";
import { songbird } from "./songbird";
import type { ElementSupport, Flavor, FlavorProfile, ParentRule, Rule } from "./types";

export * from "./types";
export * from "./rules";
export { SYNTHESIS_NAMESPACE } from "./generic";
export { MSTTS_NAMESPACE } from "./azure";

const PROFILES: Readonly<Record<Flavor, FlavorProfile>> = Object.freeze({
  generic: Object.freeze(generic),
  azure: Object.freeze(azure),
  google: Object.freeze(google),
  "amazon-polly": Object.freeze(amazonPolly),
  songbird: Object.freeze(songbird),
});

export function flavorProfile(flavor: Flavor): FlavorProfile {
  return PROFILES[flavor];
}

/** The flavor's support entry for an element kind; undefined when the element is unsupported. */
export function elementSupport<K extends ElementKind>(flavor: Flavor, kind: K): ElementSupport<K> | undefined {
  return PROFILES[flavor].elements[kind];
}

export function capability<K extends ElementKind, A extends AttributeName<K>>(
  flavor: Flavor,
  kind: K,
  attribute: A
): Rule<AttributeValue<K, A>> {
  const support = elementSupport(flavor, kind);
  return support === undefined ? unsupported : support.attributes[attribute];
}

function parentAccepted(rule: ParentRule | undefined, parent: ParentKind | undefined): boolean {
  if (rule === undefined || parent === undefined) return true;
  if (rule.only !== undefined && !rule.only.includes(parent)) return false;
  return rule.except === undefined || !rule.except.includes(parent);
}

/**
 * Whether `kind` may appear under `parent` for this flavor. Pass no parent for the root.
 * Structural rules shared by every flavor are checked when the tree is built, not here.
 */
export function elementAllowed(flavor: Flavor, kind: ElementKind, parent?: ParentKind): boolean {
  const support = elementSupport(flavor, kind);
  return support !== undefined && parentAccepted(support.parents, parent);
}
