import { HearthError } from "./base.js";
import {
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

// ---------------------------------------------------------------------------
// Abstract base for all loader errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for integration loader errors.
 *
 * Enables generic catch: `if (e instanceof LoaderError)`
 */
export abstract class LoaderError extends HearthError {}

// ---------------------------------------------------------------------------
// Invalid domain
// ---------------------------------------------------------------------------

/**
 * Returned when a requested domain is malformed (e.g. contains a dot).
 * Never cached; no filesystem access happens before it is reported.
 */
export class InvalidDomainError extends LoaderError {
  readonly _tag = "LoaderError" as const;
  readonly code = "INTEGRATION_INVALID_DOMAIN" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly integrationDomain: string;

  constructor(integrationDomain: string) {
    super(`Invalid domain ${integrationDomain}`);
    const entry = ERROR_CATALOG.INTEGRATION_INVALID_DOMAIN;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.integrationDomain = integrationDomain;
  }
}

// ---------------------------------------------------------------------------
// Not found
// ---------------------------------------------------------------------------

/**
 * Returned when no integration could be resolved for a domain. The
 * underlying failure, when there was one, is attached as `cause`.
 */
export class IntegrationNotFoundError extends LoaderError {
  readonly _tag = "LoaderError" as const;
  readonly code = "INTEGRATION_NOT_FOUND" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly integrationDomain: string;

  constructor(integrationDomain: string, cause?: unknown) {
    super(
      `Integration '${integrationDomain}' not found.`,
      cause === undefined ? undefined : { cause },
    );
    const entry = ERROR_CATALOG.INTEGRATION_NOT_FOUND;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.integrationDomain = integrationDomain;
  }
}

// ---------------------------------------------------------------------------
// Circular dependency
// ---------------------------------------------------------------------------

/**
 * Thrown when dependency resolution walks back onto a domain that is
 * still being resolved, or onto one ordered after the starting domain.
 */
export class CircularDependencyError extends LoaderError {
  readonly _tag = "LoaderError" as const;
  readonly code = "INTEGRATION_CIRCULAR_DEPENDENCY" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fromDomain: string;
  readonly toDomain: string;

  constructor(fromDomain: string, toDomain: string) {
    super(`Circular dependency detected: ${fromDomain} -> ${toDomain}.`);
    const entry = ERROR_CATALOG.INTEGRATION_CIRCULAR_DEPENDENCY;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fromDomain = fromDomain;
    this.toDomain = toDomain;
  }
}

// ---------------------------------------------------------------------------
// Version gate
// ---------------------------------------------------------------------------

/** Why a custom integration failed the version gate. */
export type VersionGateReason = "missing" | "unparsable";

/**
 * Raised when a custom integration has no version, or one that no known
 * versioning strategy accepts.
 */
export class IntegrationVersionError extends LoaderError {
  readonly _tag = "LoaderError" as const;
  readonly code = "INTEGRATION_VERSION_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly integrationDomain: string;
  readonly reason: VersionGateReason;
  readonly version: string | undefined;

  constructor(integrationDomain: string, reason: VersionGateReason, version?: string) {
    super(
      reason === "missing"
        ? `The custom integration '${integrationDomain}' does not have a version key in the manifest file and was blocked from loading.`
        : `The custom integration '${integrationDomain}' does not have a valid version key (${version}) in the manifest file and was blocked from loading.`,
    );
    const entry = ERROR_CATALOG.INTEGRATION_VERSION_INVALID;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.integrationDomain = integrationDomain;
    this.reason = reason;
    this.version = version;
  }
}

// ---------------------------------------------------------------------------
// Import failed
// ---------------------------------------------------------------------------

/**
 * Thrown when importing an integration's component or platform module
 * raises anything other than "module not found".
 */
export class ComponentImportError extends LoaderError {
  readonly _tag = "LoaderError" as const;
  readonly code = "INTEGRATION_IMPORT_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly modulePath: string;

  constructor(modulePath: string, cause?: unknown) {
    super(
      `Exception importing ${modulePath}`,
      cause === undefined ? undefined : { cause },
    );
    const entry = ERROR_CATALOG.INTEGRATION_IMPORT_FAILED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.modulePath = modulePath;
  }
}

// ---------------------------------------------------------------------------
// Configuration directory missing
// ---------------------------------------------------------------------------

/**
 * Raised when the loader is asked to resolve integrations without a
 * configuration directory.
 */
export class ConfigDirMissingError extends LoaderError {
  readonly _tag = "LoaderError" as const;
  readonly code = "LOADER_CONFIG_DIR_MISSING" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;

  constructor() {
    super("Can't load integrations - configuration directory is not set");
    const entry = ERROR_CATALOG.LOADER_CONFIG_DIR_MISSING;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}

// ---------------------------------------------------------------------------
// Unknown helper
// ---------------------------------------------------------------------------

/** Thrown by the helpers facade for a name nothing registered. */
export class HelperNotRegisteredError extends LoaderError {
  readonly _tag = "LoaderError" as const;
  readonly code = "LOADER_HELPER_NOT_REGISTERED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly helperName: string;

  constructor(helperName: string) {
    super(`Helper '${helperName}' is not registered`);
    const entry = ERROR_CATALOG.LOADER_HELPER_NOT_REGISTERED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.helperName = helperName;
  }
}
