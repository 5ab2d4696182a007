import { describe, expect, it } from "vitest";
import {
  CircularDependencyError,
  ComponentImportError,
  ConfigDirMissingError,
  getErrorMessage,
  HearthError,
  HelperNotRegisteredError,
  IntegrationNotFoundError,
  IntegrationVersionError,
  InvalidDomainError,
  LoaderError,
  ManifestParseError,
  ManifestSchemaError,
} from "../../index.js";

describe("loader errors", () => {
  it("InvalidDomainError carries the rejected domain", () => {
    const err = new InvalidDomainError("hue.light");

    expect(err).toBeInstanceOf(LoaderError);
    expect(err).toBeInstanceOf(HearthError);
    expect(err.code).toBe("INTEGRATION_INVALID_DOMAIN");
    expect(err.integrationDomain).toBe("hue.light");
    expect(err.message).toBe("Invalid domain hue.light");
    expect(err.httpStatus).toBe(400);
  });

  it("IntegrationNotFoundError attaches the underlying cause", () => {
    const cause = new Error("disk on fire");
    const err = new IntegrationNotFoundError("hue", cause);

    expect(err.message).toBe("Integration 'hue' not found.");
    expect(err.cause).toBe(cause);
    expect(err.toJSON().cause).toBe("disk on fire");
  });

  it("IntegrationNotFoundError has no cause when none is given", () => {
    const err = new IntegrationNotFoundError("hue");

    expect(err.cause).toBeUndefined();
    expect(err.isExpected).toBe(true);
  });

  it("CircularDependencyError records both domains", () => {
    const err = new CircularDependencyError("c", "a");

    expect(err.fromDomain).toBe("c");
    expect(err.toDomain).toBe("a");
    expect(err.message).toBe("Circular dependency detected: c -> a.");
    expect(err.httpStatus).toBe(409);
  });

  it("IntegrationVersionError distinguishes missing from unparsable", () => {
    const missing = new IntegrationVersionError("acme", "missing");
    const bad = new IntegrationVersionError("acme", "unparsable", "banana");

    expect(missing.reason).toBe("missing");
    expect(missing.version).toBeUndefined();
    expect(missing.message).toContain("does not have a version key");
    expect(bad.reason).toBe("unparsable");
    expect(bad.message).toContain("valid version key (banana)");
  });

  it("ComponentImportError and ConfigDirMissingError are unexpected", () => {
    expect(new ComponentImportError("custom_components.acme").isExpected).toBe(false);
    expect(new ConfigDirMissingError().isExpected).toBe(false);
    expect(new IntegrationNotFoundError("x").isExpected).toBe(true);
  });

  it("HelperNotRegisteredError names the helper", () => {
    const error = new HelperNotRegisteredError("storage");

    expect(error.helperName).toBe("storage");
    expect(error.message).toBe("Helper 'storage' is not registered");
    expect(error.httpStatus).toBe(404);
  });

  it("manifest errors report location and issues", () => {
    const parse = new ManifestParseError("/cfg/acme/manifest.json", "Unexpected token");
    const schema = new ManifestSchemaError(["domain: Required", "name: Required"]);

    expect(parse.message).toBe(
      "Error parsing manifest.json file at /cfg/acme/manifest.json: Unexpected token",
    );
    expect(schema.issues).toHaveLength(2);
    expect(schema.message).toBe("Manifest validation failed: domain: Required; name: Required");
  });
});

describe("getErrorMessage", () => {
  it("handles non-errors", () => {
    expect(getErrorMessage(new Error("x"))).toBe("x");
    expect(getErrorMessage("y")).toBe("y");
    expect(getErrorMessage(undefined)).toBe("An unknown error occurred");
  });
});
