/**
 * Structural rules that hold for every flavor, enforced while the tree is built.
 * A node has exactly one owner: attaching it a second time, or under its own
 * descendant, is refused.
 */

import { ShapeError } from "../errors";
import { ELEMENT_SCHEMAS } from "./schema";
import type { GroupNode, NodeInput, NodeKind, ParentKind, ParentNode, SsmlNode, TextNode } from "./types";

const attached = new WeakSet<object>();
/** Members of a group that has not been placed yet; the group owns them. */
const grouped = new WeakSet<object>();

export function isTextNode(node: SsmlNode): node is TextNode {
  return node.kind === "text";
}

export function toNode(input: SsmlNode | string): SsmlNode {
  return typeof input === "string" ? { kind: "text", text: input } : input;
}

/** Why `child` can never be a child of `parent`, or undefined when it can. */
export function shapeProblem(parent: ParentKind, child: { readonly kind: NodeKind }): string | undefined {
  if (child.kind === "speak") return "<speak> is only valid as the document root";
  const schema = ELEMENT_SCHEMAS[parent];
  if (schema.content === "empty") return `<${parent}> cannot have children`;
  if (schema.content === "text" && child.kind !== "text") return `<${parent}> accepts text only`;
  if (schema.forbiddenChildren?.includes(child.kind)) return `<${child.kind}> may not be nested in <${parent}>`;
  return undefined;
}

/**
 * Throws ShapeError when `child` can never be a child of `parent`, whatever the flavor.
 */
export function checkShape(parent: ParentKind, child: { readonly kind: NodeKind }): void {
  const problem = shapeProblem(parent, child);
  if (problem !== undefined) throw new ShapeError(parent, child.kind, problem);
}

function contains(root: SsmlNode, target: object): boolean {
  if (root === target) return true;
  if (root.kind === "text" || root.kind === "meta") return false;
  return root.children.some((child) => contains(child, target));
}

interface Spliced {
  nodes: SsmlNode[];
  /** Nodes taken out of the groups in `groups`. */
  members: Set<SsmlNode>;
  groups: GroupNode[];
}

/** Replace each group with its members. */
function splice(parent: ParentKind | "group", inputs: Iterable<NodeInput>): Spliced {
  const spliced: Spliced = { nodes: [], members: new Set(), groups: [] };
  for (const input of inputs) {
    if (typeof input === "string" || input.kind !== "group") {
      spliced.nodes.push(toNode(input));
      continue;
    }
    if (attached.has(input)) throw new ShapeError(parent, "group", "group was already placed");
    spliced.groups.push(input);
    for (const member of input.children) {
      spliced.nodes.push(member);
      spliced.members.add(member);
    }
  }
  return spliced;
}

function claim(parent: ParentKind | "group", spliced: Spliced, owner?: ParentNode): void {
  for (const node of spliced.nodes) {
    if (attached.has(node) || (grouped.has(node) && !spliced.members.has(node))) {
      throw new ShapeError(parent, node.kind, "node already belongs to another parent");
    }
    if (owner !== undefined && contains(node, owner)) {
      throw new ShapeError(parent, node.kind, "node is an ancestor of its new parent");
    }
  }
  if (new Set(spliced.nodes).size !== spliced.nodes.length) {
    throw new ShapeError(parent, spliced.nodes[0].kind, "the same node was passed twice");
  }
  for (const placed of spliced.groups) attached.add(placed);
}

/** Validate and claim a batch of children for a parent of the given kind. */
export function adoptChildren(parent: ParentKind, inputs: Iterable<NodeInput>, owner?: ParentNode): SsmlNode[] {
  const spliced = splice(parent, inputs);
  for (const node of spliced.nodes) checkShape(parent, node);
  claim(parent, spliced, owner);
  for (const node of spliced.nodes) {
    grouped.delete(node);
    attached.add(node);
  }
  return spliced.nodes;
}

/**
 * Collect nodes into a tag-less group. Nested groups are flattened; shape checks
 * run when the group is placed.
 */
export function group(children: Iterable<NodeInput>): GroupNode {
  const spliced = splice("group", children);
  claim("group", spliced);
  for (const node of spliced.nodes) grouped.add(node);
  return { kind: "group", children: spliced.nodes };
}

/**
 * Append children to an existing element or document and return it.
 *
 * @throws ShapeError when a child is structurally invalid in `parent`
 */
export function append<P extends ParentNode>(parent: P, ...children: NodeInput[]): P {
  const adopted = adoptChildren(parent.kind, children, parent);
  const target: { children: readonly SsmlNode[] } = parent;
  target.children = [...parent.children, ...adopted];
  return parent;
}

/** True when the node has been placed under a parent. */
export function isAttached(node: SsmlNode): boolean {
  return attached.has(node);
}
