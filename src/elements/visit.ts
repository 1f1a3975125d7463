/**
 * Depth-first, document-order traversal.
 */

import type { ElementNodeOf, ElementKind, NodePath, ParentNode, SpeakDocument, SsmlNode } from "./types";

export interface VisitContext {
  path: NodePath;
  parent: ParentNode;
}

/** Return false to skip the node's children. */
export type Visitor = (node: SsmlNode, context: VisitContext) => boolean | void;

function walkChildren(parent: ParentNode, path: NodePath, visitor: Visitor): void {
  parent.children.forEach((node, index) => {
    const childPath = [...path, index];
    const descend = visitor(node, { path: childPath, parent });
    if (descend !== false && node.kind !== "text" && node.kind !== "meta") {
      walkChildren(node, childPath, visitor);
    }
  });
}

export function walk(doc: SpeakDocument, visitor: Visitor): void {
  walkChildren(doc, [], visitor);
}

function isKind<K extends ElementKind>(node: SsmlNode, kind: K): node is Extract<SsmlNode, ElementNodeOf<K>> {
  return node.kind === kind;
}

/** All elements of one kind, in document order. */
export function collect<K extends Exclude<ElementKind, "speak">>(
  doc: SpeakDocument,
  kind: K
): Extract<SsmlNode, ElementNodeOf<K>>[] {
  const found: Extract<SsmlNode, ElementNodeOf<K>>[] = [];
  walk(doc, (node) => {
    if (isKind(node, kind)) found.push(node);
  });
  return found;
}

/** Concatenated text content, separated by single spaces. */
export function plainText(doc: SpeakDocument): string {
  const parts: string[] = [];
  walk(doc, (node) => {
    if (node.kind === "text") parts.push(node.text.trim());
  });
  return parts.filter(Boolean).join(" ");
}
