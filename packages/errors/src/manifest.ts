import { HearthError } from "./base.js";
import {
  ERROR_CATALOG,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

/**
 * Abstract base class for manifest.json errors.
 */
export abstract class ManifestError extends HearthError {}

/**
 * Thrown when a manifest file is not valid JSON.
 */
export class ManifestParseError extends ManifestError {
  readonly _tag = "ManifestError" as const;
  readonly code = "MANIFEST_PARSE_FAILED" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly filePath: string | undefined;

  constructor(filePath: string | undefined, detail: string, cause?: unknown) {
    super(
      filePath
        ? `Error parsing manifest.json file at ${filePath}: ${detail}`
        : `Error parsing manifest: ${detail}`,
      cause === undefined ? undefined : { cause },
    );
    const entry = ERROR_CATALOG.MANIFEST_PARSE_FAILED;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.filePath = filePath;
  }
}

/**
 * Thrown when a parsed manifest does not satisfy the schema.
 */
export class ManifestSchemaError extends ManifestError {
  readonly _tag = "ManifestError" as const;
  readonly code = "MANIFEST_SCHEMA_INVALID" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly string[];

  constructor(issues: readonly string[], cause?: unknown) {
    super(
      `Manifest validation failed: ${issues.join("; ")}`,
      cause === undefined ? undefined : { cause },
    );
    const entry = ERROR_CATALOG.MANIFEST_SCHEMA_INVALID;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

/**
 * Thrown when a version string matches none of the requested strategies.
 */
export class VersionParseError extends ManifestError {
  readonly _tag = "ManifestError" as const;
  readonly code = "MANIFEST_VERSION_UNPARSABLE" as const;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly version: string;
  readonly strategies: readonly string[];

  constructor(version: string, strategies: readonly string[]) {
    super(`Version '${version}' does not match any of: ${strategies.join(", ")}`);
    const entry = ERROR_CATALOG.MANIFEST_VERSION_UNPARSABLE;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.version = version;
    this.strategies = strategies;
  }
}
