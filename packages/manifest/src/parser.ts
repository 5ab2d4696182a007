/**
 * Synchronous manifest.json parser.
 * Strips a BOM, parses JSON, validates with Zod, and deep-freezes.
 */

import type { IntegrationManifest } from "@hearth/core";
import { getErrorMessage, ManifestParseError, ManifestSchemaError } from "@hearth/errors";

import { IntegrationManifestSchema } from "./schema.js";

export interface ParseManifestOptions {
  /** Path reported in errors. */
  readonly filePath?: string;
}

/**
 * Parses a manifest.json string into a validated, frozen IntegrationManifest.
 *
 * @throws {ManifestParseError} when the content is not JSON
 * @throws {ManifestSchemaError} when the JSON does not describe a manifest
 */
export function parseManifestJson(
  content: string,
  options?: ParseManifestOptions,
): IntegrationManifest {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error: unknown) {
    throw new ManifestParseError(options?.filePath, getErrorMessage(error), error);
  }

  return validateManifest(parsed);
}

/**
 * Validates an already-parsed value against the manifest schema.
 */
export function validateManifest(value: unknown): IntegrationManifest {
  const result = IntegrationManifestSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
    );
    throw new ManifestSchemaError(issues, result.error);
  }
  return deepFreeze(result.data);
}

/**
 * Recursively freezes an object graph in place and returns it.
 */
export function deepFreeze<T>(value: T): T {
  const stack: unknown[] = [value];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === null || typeof current !== "object" || Object.isFrozen(current)) {
      continue;
    }
    Object.freeze(current);
    stack.push(...Object.values(current));
  }
  return value;
}
