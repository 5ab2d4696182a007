/**
 * @hearth/manifest
 *
 * manifest.json reader for Hearth integrations.
 * Parses manifests, validates them with Zod, and returns typed,
 * frozen IntegrationManifest objects.
 */

// ============================================================================
// PRIMARY API
// ============================================================================

export { EMPTY_BUILTIN_TABLES, loadBuiltinTables, loadManifest } from "./loader.js";
export {
  deepFreeze,
  type ParseManifestOptions,
  parseManifestJson,
  validateManifest,
} from "./parser.js";

// ============================================================================
// VERSIONS
// ============================================================================

export {
  ALL_VERSION_STRATEGIES,
  compareVersions,
  type ParsedVersion,
  parseVersion,
  type VersionStrategy,
} from "./version.js";

// ============================================================================
// SCHEMA
// ============================================================================

export {
  BluetoothEntrySchema,
  BuiltinDiscoveryTablesSchema,
  DhcpEntrySchema,
  HomekitEntrySchema,
  IntegrationManifestSchema,
  IntegrationTypeSchema,
  UsbEntrySchema,
  ZeroconfEntrySchema,
} from "./schema.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@hearth/manifest";
export const PACKAGE_VERSION = "0.1.0";
