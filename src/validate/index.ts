/**
 * Flavor validation.
 *
 * Walks the document depth-first in document order and stops at the first failure.
 * On success it returns a new tree whose attribute values are normalized for the
 * flavor (clamped into range, coerced to a spelling the service accepts); the input
 * tree is left untouched. Validating a validated tree again gives the same tree.
 * Structural faults in a tree assembled around the builders (a child its parent can
 * never hold, a shared or cyclic node) come back as InvalidStructureError.
 */

import {
  AttributeOutOfRangeError,
  InvalidStructureError,
  MissingAttributeError,
  UnsupportedAttributeError,
  UnsupportedElementError,
  type ValidationError,
} from "../errors";
import { elementSchema } from "../elements/schema";
import { adoptChildren, shapeProblem } from "../elements/tree";
import type { ElementKind, ElementNodeOf, NodePath, ParentKind, SpeakDocument, SsmlNode } from "../elements/types";
import { elementAllowed, elementSupport } from "../flavors";
import type { Flavor } from "../flavors/types";

/** A document that passed validation for `flavor`, with normalized attribute values. */
export interface ValidatedDocument {
  readonly kind: "validated";
  readonly flavor: Flavor;
  readonly document: SpeakDocument;
}

export type ValidationResult = { ok: true; validated: ValidatedDocument } | { ok: false; error: ValidationError };

export function isValidatedDocument(value: unknown): value is ValidatedDocument {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "validated";
}

/**
 * Check the element itself and normalize its attributes into `node.attrs`.
 * `node` must be a fresh copy owned by the validator.
 */
function checkElement<K extends ElementKind>(
  node: ElementNodeOf<K>,
  flavor: Flavor,
  parent: ParentKind | undefined,
  path: NodePath
): ValidationError | undefined {
  const support = elementSupport(flavor, node.kind);
  if (support === undefined || !elementAllowed(flavor, node.kind, parent)) {
    return new UnsupportedElementError(flavor, node.kind, parent, path);
  }

  const schema = elementSchema(node.kind);
  for (const name of [...(schema.required ?? []), ...(support.required ?? [])]) {
    if (node.attrs[name] == null) {
      return new MissingAttributeError(flavor, node.kind, schema.attributes[name].xmlName, path);
    }
  }

  const attrs = { ...node.attrs };
  for (const name of schema.order) {
    const value = node.attrs[name];
    if (value == null) continue;
    const attribute = schema.attributes[name];
    const rule = support.attributes[name];
    if (rule.support === "unsupported") {
      return new UnsupportedAttributeError(flavor, node.kind, attribute.xmlName, path);
    }
    const normalized = rule.normalize(value);
    if (!normalized.ok) {
      return new AttributeOutOfRangeError(
        flavor,
        node.kind,
        attribute.xmlName,
        attribute.format(value),
        normalized.domain,
        path
      );
    }
    attrs[name] = normalized.value;
  }
  node.attrs = attrs;
  return undefined;
}

type Checked<N> = { ok: true; node: N } | { ok: false; error: ValidationError };

/** Nodes already reached in this pass; a node met twice is shared or part of a cycle. */
type Seen = Set<SsmlNode>;

function checkChildren(
  children: readonly SsmlNode[],
  flavor: Flavor,
  parent: ParentKind,
  path: NodePath,
  seen: Seen
): Checked<SsmlNode[]> {
  const out: SsmlNode[] = [];
  for (const [index, child] of children.entries()) {
    const childPath = [...path, index];
    const problem = seen.has(child) ? "node is reachable more than once" : shapeProblem(parent, child);
    if (problem !== undefined) {
      return { ok: false, error: new InvalidStructureError(flavor, child.kind, parent, problem, childPath) };
    }
    seen.add(child);
    const checked = checkNode(child, flavor, parent, childPath, seen);
    if (!checked.ok) return checked;
    out.push(checked.node);
  }
  return { ok: true, node: adoptChildren(parent, out) };
}

function checkNode(node: SsmlNode, flavor: Flavor, parent: ParentKind, path: NodePath, seen: Seen): Checked<SsmlNode> {
  if (node.kind === "text") {
    return { ok: true, node: { kind: "text", text: node.text } };
  }
  if (node.kind === "meta") {
    if (node.flavors !== undefined && !node.flavors.includes(flavor)) {
      return { ok: false, error: new UnsupportedElementError(flavor, "meta", parent, path) };
    }
    return { ok: true, node: { ...node } };
  }

  const copy = { ...node };
  const error = checkElement(copy, flavor, parent, path);
  if (error) return { ok: false, error };
  const children = checkChildren(node.children, flavor, node.kind, path, seen);
  if (!children.ok) return children;
  return { ok: true, node: { ...copy, children: children.node } };
}

/**
 * Validate `document` against `flavor`.
 *
 * @returns the normalized copy, or the first error in document order
 */
export function validate(document: SpeakDocument, flavor: Flavor): ValidationResult {
  const root: SpeakDocument = { ...document };
  const error = checkElement(root, flavor, undefined, []);
  if (error) return { ok: false, error };
  const children = checkChildren(document.children, flavor, "speak", [], new Set());
  if (!children.ok) return children;
  return { ok: true, validated: { kind: "validated", flavor, document: { ...root, children: children.node } } };
}
