/**
 * Rendering of documents and fragments for a flavor.
 *
 * Attributes are written in each element's canonical order, with the flavor's tag and
 * attribute spellings. In compact output every text node inside mixed content is
 * followed by a single space so adjacent text nodes never run together.
 */

import { SerializeError, ShapeError } from "../errors";
import { elementSchema, type ContentModel } from "../elements/schema";
import { checkShape } from "../elements/tree";
import type { ElementKind, ElementNodeOf, ParentNode, SpeakDocument, SsmlNode } from "../elements/types";
import { elementSupport, flavorProfile } from "../flavors";
import type { Flavor, FlavorProfile, XmlAttribute } from "../flavors/types";
import { validate, type ValidatedDocument } from "../validate";
import { XmlWriter } from "./xml-writer";

export interface SerializeOptions {
  /** Target flavor (default: the validated document's flavor, else "generic"). */
  flavor?: Flavor;
  /** Tab-indented output, one node per line (default false). */
  pretty?: boolean;
  /** Validate before rendering in serializeToString (default true). */
  performChecks?: boolean;
}

export type SerializeResult = { ok: true; output: string } | { ok: false; error: SerializeError };

/** Nodes on the path from the root to the element being written. */
type Ancestors = ReadonlySet<object>;

function writeElement<K extends ElementKind>(
  writer: XmlWriter,
  node: ElementNodeOf<K>,
  profile: FlavorProfile,
  root: boolean,
  ancestors: Ancestors
): void {
  const schema = elementSchema(node.kind);
  const support = elementSupport(profile.flavor, node.kind);
  const attributes: XmlAttribute[] = root ? [...profile.root.leading] : [];
  const nested: { tag: string; text: string }[] = [];

  for (const name of schema.order) {
    const value = node.attrs[name];
    if (value == null) continue;
    const rule = support?.attributes[name];
    if (rule?.support === "supported" && rule.omit?.(value)) continue;
    const attribute = schema.attributes[name];
    const text = attribute.format(value);
    if (attribute.asChild !== undefined) {
      nested.push({ tag: attribute.asChild, text });
    } else {
      attributes.push({ name: support?.attributeNames?.[name] ?? attribute.xmlName, value: text });
    }
  }
  if (root) attributes.push(...profile.root.trailing);

  const inside = new Set(ancestors).add(node);
  for (const child of node.children) {
    checkShape(node.kind, child);
    if (inside.has(child)) throw new ShapeError(node.kind, child.kind, "node is an ancestor of its parent");
  }

  writer.element(
    support?.tag ?? schema.tag,
    attributes,
    () => {
      for (const child of nested) writer.element(child.tag, [], () => writer.text(child.text));
      for (const child of node.children) writeNode(writer, child, profile, inside, schema.content);
    },
    { pair: root }
  );
}

function writeNode(
  writer: XmlWriter,
  node: SsmlNode,
  profile: FlavorProfile,
  ancestors: Ancestors,
  context?: ContentModel
): void {
  switch (node.kind) {
    case "text":
      writer.text(context === "mixed" && !writer.pretty ? `${node.text} ` : node.text);
      return;
    case "meta":
      writer.raw(node.raw);
      return;
    default:
      writeElement(writer, node, profile, false, ancestors);
  }
}

function render(document: SpeakDocument, flavor: Flavor, pretty: boolean): string {
  const writer = new XmlWriter(pretty);
  writeElement(writer, document, flavorProfile(flavor), true, new Set());
  return writer.toString();
}

/**
 * Render a document without checking it against a flavor. Pass a ValidatedDocument to
 * render the normalized tree; its flavor is used unless `options.flavor` says otherwise.
 *
 * @throws ShapeError when the tree breaks a structural rule (only possible for trees
 * assembled around the builders)
 */
export function serialize(input: SpeakDocument | ValidatedDocument, options: SerializeOptions = {}): string {
  if (input.kind === "validated") {
    return render(input.document, options.flavor ?? input.flavor, options.pretty ?? false);
  }
  return render(input, options.flavor ?? "generic", options.pretty ?? false);
}

/**
 * Render a fragment. A `speak` node is rendered as a document root; any other node
 * is rendered on its own, with the flavor's tag spellings and no root attributes.
 */
export function serializeNode(node: SsmlNode | ParentNode, options: SerializeOptions = {}): string {
  const pretty = options.pretty ?? false;
  const flavor = options.flavor ?? "generic";
  if (node.kind === "speak") return render(node, flavor, pretty);
  const writer = new XmlWriter(pretty);
  writeNode(writer, node, flavorProfile(flavor), new Set());
  return writer.toString();
}

/** A structural fault found while rendering unchecked is a broken invariant, not a validation failure. */
function renderUnchecked(document: SpeakDocument, flavor: Flavor, pretty: boolean): SerializeResult {
  try {
    return { ok: true, output: render(document, flavor, pretty) };
  } catch (err) {
    if (err instanceof ShapeError) {
      return { ok: false, error: new SerializeError(`malformed tree: ${err.message}`) };
    }
    throw err;
  }
}

/**
 * Validate (unless told not to) and render.
 *
 * A ValidatedDocument for the requested flavor is rendered as is. Anything else is
 * validated first when `performChecks` is on, and a failure is returned as a
 * SerializeError whose `cause` is the validation error.
 */
export function serializeToString(
  input: SpeakDocument | ValidatedDocument,
  flavorOrOptions: Flavor | SerializeOptions = {}
): SerializeResult {
  const options: SerializeOptions =
    typeof flavorOrOptions === "string" ? { flavor: flavorOrOptions } : flavorOrOptions;
  const pretty = options.pretty ?? false;
  const flavor = options.flavor ?? (input.kind === "validated" ? input.flavor : "generic");

  if (input.kind === "validated" && input.flavor === flavor) {
    return { ok: true, output: render(input.document, flavor, pretty) };
  }
  const document = input.kind === "validated" ? input.document : input;
  if (options.performChecks === false) {
    return renderUnchecked(document, flavor, pretty);
  }
  const result = validate(document, flavor);
  if (!result.ok) return { ok: false, error: SerializeError.fromValidation(result.error) };
  return { ok: true, output: render(result.validated.document, flavor, pretty) };
}
