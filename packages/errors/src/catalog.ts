/**
 * Error Catalog - Single Source of Truth
 *
 * This catalog defines all error codes used across the Hearth workspace.
 * Each error code maps to an HTTP status code, a gRPC canonical code, and a
 * behavioral base type.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, INTEGRATION, MANIFEST, LOADER
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "NotFoundError" | "ConflictError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // INTEGRATION ERRORS - Resolving and importing integrations
  // ============================================================================
  INTEGRATION_INVALID_DOMAIN: {
    domain: "integration",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid integration domain",
    description: "The integration domain contains characters that are not allowed",
  },
  INTEGRATION_NOT_FOUND: {
    domain: "integration",
    httpStatus: 404,
    grpcCode: "NOT_FOUND" as const,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Integration not found",
    description: "No loadable integration exists for the requested domain",
  },
  INTEGRATION_CIRCULAR_DEPENDENCY: {
    domain: "integration",
    httpStatus: 409,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Circular dependency",
    description: "The integration dependency graph contains a cycle",
  },
  INTEGRATION_VERSION_INVALID: {
    domain: "integration",
    httpStatus: 422,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid integration version",
    description: "A custom integration is missing a version or declares one that cannot be parsed",
  },
  INTEGRATION_IMPORT_FAILED: {
    domain: "integration",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Integration import failed",
    description: "Importing an integration module raised an unexpected error",
  },

  // ============================================================================
  // MANIFEST ERRORS - manifest.json parsing and validation
  // ============================================================================
  MANIFEST_PARSE_FAILED: {
    domain: "manifest",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Manifest parse failed",
    description: "The manifest file is not valid JSON",
  },
  MANIFEST_SCHEMA_INVALID: {
    domain: "manifest",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Manifest schema invalid",
    description: "The manifest does not match the integration manifest schema",
  },
  MANIFEST_VERSION_UNPARSABLE: {
    domain: "manifest",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Version unparsable",
    description: "The version string does not match any accepted versioning strategy",
  },

  // ============================================================================
  // LOADER ERRORS - Loader configuration
  // ============================================================================
  LOADER_CONFIG_DIR_MISSING: {
    domain: "loader",
    httpStatus: 500,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Configuration directory missing",
    description: "Integrations cannot be loaded because the configuration directory is not set",
  },
  LOADER_HELPER_NOT_REGISTERED: {
    domain: "loader",
    httpStatus: 404,
    grpcCode: "NOT_FOUND" as const,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Helper not registered",
    description: "No helper module was registered under the requested name",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
