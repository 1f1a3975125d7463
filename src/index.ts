/**
 * Build SSML documents, validate them for a speech service and render them.
 *
 * ```ts
 * import { speak, breaks, serializeToString } from "ssml-compose";
 *
 * const result = serializeToString(speak("en-US", ["Hello,", breaks("300ms"), "world!"]), "azure");
 * if (result.ok) console.log(result.output);
 * ```
 */

export * from "./values";
export * from "./elements";
export {
  FLAVORS,
  isFlavor,
  flavorProfile,
  elementSupport,
  capability,
  elementAllowed,
  SYNTHESIS_NAMESPACE,
  MSTTS_NAMESPACE,
  type Flavor,
  type FlavorProfile,
  type ElementSupport,
  type Rule,
  type SupportedRule,
  type UnsupportedRule,
  type Normalized,
} from "./flavors";
export { validate, isValidatedDocument, type ValidatedDocument, type ValidationResult } from "./validate";
export * from "./serialize";
export * from "./errors";
export { loadConfig, type SsmlConfig } from "./config";
export { createLogger, type LoggerConfig, type LogLevel } from "./logging";
export { createRenderer, type Renderer } from "./renderer";
