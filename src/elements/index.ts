export type * from "./types";
export * from "./builders";
export { append, checkShape, group, isAttached } from "./tree";
export { ELEMENT_SCHEMAS, elementSchema, type ContentModel, type ElementSchema, type AttributeSchema } from "./schema";
export { walk, collect, plainText, type Visitor, type VisitContext } from "./visit";
