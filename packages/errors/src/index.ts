/**
 * @hearth/errors
 *
 * Shared error taxonomy for the Hearth integration loader.
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, HearthError, isHearthError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export { getErrorMessage } from "./utils.js";

export { InternalError } from "./internal.js";

// ============================================================================
// LOADER ERRORS
// ============================================================================

export {
  CircularDependencyError,
  ComponentImportError,
  ConfigDirMissingError,
  HelperNotRegisteredError,
  IntegrationNotFoundError,
  IntegrationVersionError,
  InvalidDomainError,
  LoaderError,
  type VersionGateReason,
} from "./integration.js";

export {
  ManifestError,
  ManifestParseError,
  ManifestSchemaError,
  VersionParseError,
} from "./manifest.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@hearth/errors";
export const PACKAGE_VERSION = "0.1.0";
