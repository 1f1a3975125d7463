/**
 * Error taxonomy for building, validating and rendering SSML.
 *
 * Construction faults (ShapeError, ValueError) are thrown from builders.
 * Validation and serialization faults are returned inside result objects and carry
 * the path of the offending node (child indices from the root).
 */

import type { ElementKind, NodeKind, NodePath, ParentKind } from "../elements/types";
import type { Flavor } from "../flavors/types";

export type SsmlErrorCode =
  | "shape"
  | "value"
  | "unsupported-element"
  | "unsupported-attribute"
  | "attribute-out-of-range"
  | "missing-attribute"
  | "invalid-structure"
  | "serialize";

export abstract class SsmlError extends Error {
  abstract readonly code: SsmlErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A child kind was placed where no flavor could ever accept it. */
export class ShapeError extends SsmlError {
  readonly code = "shape";

  constructor(
    readonly parent: ParentKind | "group",
    readonly child: NodeKind | "group",
    reason: string
  ) {
    super(`cannot place <${child}> inside <${parent}>: ${reason}`);
  }
}

/** A literal could not be parsed into a value type (e.g. "5m" as a duration). */
export class ValueError extends SsmlError {
  readonly code = "value";

  constructor(
    readonly input: string,
    readonly expected: string
  ) {
    super(`invalid value "${input}": expected ${expected}`);
  }
}

function formatPath(path: NodePath): string {
  return path.length === 0 ? "/" : `/${path.join("/")}`;
}

export abstract class ValidationError extends SsmlError {
  abstract readonly code:
    | "unsupported-element"
    | "unsupported-attribute"
    | "attribute-out-of-range"
    | "missing-attribute"
    | "invalid-structure";

  constructor(
    readonly flavor: Flavor,
    readonly element: NodeKind,
    readonly path: NodePath,
    message: string
  ) {
    super(`${message} (flavor ${flavor}, at ${formatPath(path)})`);
  }
}

export class UnsupportedElementError extends ValidationError {
  readonly code = "unsupported-element";

  constructor(flavor: Flavor, element: NodeKind, readonly parent: ParentKind | undefined, path: NodePath) {
    super(
      flavor,
      element,
      path,
      parent === undefined ? `<${element}> is not supported` : `<${element}> is not supported inside <${parent}>`
    );
  }
}

export class UnsupportedAttributeError extends ValidationError {
  readonly code = "unsupported-attribute";

  constructor(flavor: Flavor, element: ElementKind, readonly attribute: string, path: NodePath) {
    super(flavor, element, path, `attribute "${attribute}" of <${element}> is not supported`);
  }
}

export class AttributeOutOfRangeError extends ValidationError {
  readonly code = "attribute-out-of-range";

  constructor(
    flavor: Flavor,
    element: ElementKind,
    readonly attribute: string,
    readonly value: string,
    readonly domain: string,
    path: NodePath
  ) {
    super(flavor, element, path, `attribute "${attribute}" of <${element}> has value "${value}", accepted: ${domain}`);
  }
}

export class MissingAttributeError extends ValidationError {
  readonly code = "missing-attribute";

  constructor(flavor: Flavor, element: ElementKind, readonly attribute: string, path: NodePath) {
    super(flavor, element, path, `attribute "${attribute}" of <${element}> is required`);
  }
}

/**
 * The tree breaks a structural rule the builders enforce: a child its parent can never
 * hold, or a node reachable twice (shared or cyclic). Only trees assembled around the
 * builders get here.
 */
export class InvalidStructureError extends ValidationError {
  readonly code = "invalid-structure";

  constructor(flavor: Flavor, element: NodeKind, readonly parent: ParentKind, reason: string, path: NodePath) {
    super(flavor, element, path, `<${element}> cannot appear inside <${parent}>: ${reason}`);
  }
}

/**
 * Rendering failed. Wraps the validation error when validation ran implicitly;
 * without a cause it signals a broken internal invariant.
 */
export class SerializeError extends SsmlError {
  readonly code = "serialize";

  constructor(message: string, readonly cause?: ValidationError) {
    super(message);
  }

  static fromValidation(error: ValidationError): SerializeError {
    return new SerializeError(`validation failed: ${error.message}`, error);
  }
}
