/**
 * Renderer: binds config defaults and logging to validate/serialize.
 * The core functions stay pure; this is where events are logged.
 */

import type pino from "pino";
import { loadConfig, type SsmlConfig } from "./config";
import type { SpeakDocument } from "./elements/types";
import { walk } from "./elements/visit";
import type { Flavor } from "./flavors/types";
import { createLogger, logError, logRender, logValidation, logValidationFailure } from "./logging";
import { serializeToString, type SerializeResult } from "./serialize";
import { validate, type ValidatedDocument, type ValidationResult } from "./validate";

export interface Renderer {
  readonly flavor: Flavor;
  /** Validate against the configured flavor. */
  validate(document: SpeakDocument): ValidationResult;
  /** Render for the configured flavor, validating first unless checks are turned off. */
  render(document: SpeakDocument | ValidatedDocument): SerializeResult;
}

function countNodes(document: SpeakDocument): number {
  let count = 1;
  walk(document, () => {
    count += 1;
  });
  return count;
}

export function createRenderer(
  config: SsmlConfig = loadConfig(),
  log: pino.Logger = createLogger({ level: config.log.level })
): Renderer {
  const { flavor, pretty, performChecks } = config;

  return {
    flavor,

    validate(document) {
      const start = Date.now();
      const result = validate(document, flavor);
      if (result.ok) logValidation(log, flavor, countNodes(result.validated.document), Date.now() - start);
      else logValidationFailure(log, result.error);
      return result;
    },

    render(document) {
      const start = Date.now();
      const result = serializeToString(document, { flavor, pretty, performChecks });
      if (result.ok) {
        logRender(log, flavor, result.output.length, Date.now() - start);
      } else if (result.error.cause !== undefined) {
        logValidationFailure(log, result.error.cause);
      } else {
        logError(log, result.error, { flavor });
      }
      return result;
    },
  };
}
