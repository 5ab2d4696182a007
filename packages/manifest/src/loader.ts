/**
 * File-based loaders: manifest.json and the built-in discovery tables.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import type { BuiltinDiscoveryTables, IntegrationManifest } from "@hearth/core";
import { ManifestParseError, ManifestSchemaError } from "@hearth/errors";

import { deepFreeze, parseManifestJson } from "./parser.js";
import { BuiltinDiscoveryTablesSchema } from "./schema.js";

/** Built-in tables with nothing in them. */
export const EMPTY_BUILTIN_TABLES: BuiltinDiscoveryTables = deepFreeze({
  zeroconf: {},
  homekit: {},
  ssdp: {},
  bluetooth: [],
  dhcp: [],
  usb: [],
  mqtt: {},
  configFlows: { integration: [], helper: [] },
  applicationCredentials: [],
});

/**
 * Reads a manifest.json file and returns a validated, frozen manifest.
 */
export async function loadManifest(filePath: string): Promise<IntegrationManifest> {
  const absolutePath = resolve(filePath);
  const content = await readFile(absolutePath, "utf-8");
  return parseManifestJson(content, { filePath: absolutePath });
}

/**
 * Reads the host's built-in discovery tables from a JSON file.
 * Missing tables default to empty.
 */
export async function loadBuiltinTables(filePath: string): Promise<BuiltinDiscoveryTables> {
  const absolutePath = resolve(filePath);
  const content = await readFile(absolutePath, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ManifestParseError(absolutePath, detail, error);
  }

  const result = BuiltinDiscoveryTablesSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ManifestSchemaError(issues, result.error);
  }
  return deepFreeze(result.data);
}
