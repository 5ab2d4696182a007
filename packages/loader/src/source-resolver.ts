import { join } from "node:path";
import {
  getErrorMessage,
  IntegrationVersionError,
  isHearthError,
  ManifestError,
} from "@hearth/errors";
import { parseManifestJson, parseVersion } from "@hearth/manifest";
import { CUSTOM_INTEGRATION_WARNING, MANIFEST_FILENAME } from "./constants.js";
import { Integration, type IntegrationRuntime } from "./integration.js";
import type { ConcurrencyLimiter } from "./limiter.js";
import type { IntegrationRoot } from "./types.js";

const VERSION_REMEDIATION =
  'Add a "version" key to the manifest, for example "1.0.0". Accepted formats: CalVer, SemVer, SimpleVer, BuildVer and PEP 440.';

// ---------------------------------------------------------------------------
// Version gate
// ---------------------------------------------------------------------------

/**
 * Block custom integrations without a parseable version.
 *
 * @throws IntegrationVersionError after logging it with remediation text
 */
function checkCustomVersion(runtime: IntegrationRuntime, integration: Integration): void {
  const version = integration.version;

  if (version === undefined) {
    const error = new IntegrationVersionError(integration.domain, "missing");
    runtime.logger.error(`${error.message} ${VERSION_REMEDIATION}`);
    throw error;
  }

  try {
    parseVersion(version);
  } catch (cause) {
    const error = new IntegrationVersionError(integration.domain, "unparsable", version);
    runtime.logger.error(`${error.message} ${VERSION_REMEDIATION}`, {
      cause: getErrorMessage(cause),
    });
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Single domain
// ---------------------------------------------------------------------------

/**
 * Resolve `domain` from one root.
 *
 * Returns undefined when the root has no usable manifest for the domain.
 *
 * @throws IntegrationVersionError when a custom integration fails the version gate
 */
export async function resolveFromRoot(
  runtime: IntegrationRuntime,
  root: IntegrationRoot,
  domain: string,
): Promise<Integration | undefined> {
  const directory = join(root.path, domain);
  const manifestPath = join(directory, MANIFEST_FILENAME);

  if (!(await runtime.fileSystem.isFile(manifestPath))) {
    return undefined;
  }

  let integration: Integration;
  try {
    const manifest = parseManifestJson(await runtime.fileSystem.readText(manifestPath), {
      filePath: manifestPath,
    });
    if (manifest.domain !== domain) {
      runtime.logger.error(
        `Manifest at ${manifestPath} declares domain ${manifest.domain}, expected ${domain}`,
      );
      return undefined;
    }
    integration = new Integration(runtime, root, directory, manifest);
  } catch (error) {
    if (error instanceof ManifestError) {
      runtime.logger.error(error.message, { code: error.code });
      return undefined;
    }
    throw error;
  }

  if (!integration.isBuiltIn) {
    runtime.logger.warn(CUSTOM_INTEGRATION_WARNING.replace("%s", domain));
    checkCustomVersion(runtime, integration);
  }

  runtime.logger.info(`Loaded ${domain} from ${integration.pkgPath}`);
  return integration;
}

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

/**
 * Resolve many domains from one root through `limiter`.
 *
 * Failures are isolated per domain: the map holds an Integration, an Error,
 * or nothing for domains the root does not contain.
 */
export async function resolveIntegrationsFromRoot(
  runtime: IntegrationRuntime,
  root: IntegrationRoot,
  domains: readonly string[],
  limiter: ConcurrencyLimiter,
): Promise<Map<string, Integration | Error>> {
  const results = new Map<string, Integration | Error>();

  await Promise.all(
    domains.map((domain) =>
      limiter.run(async () => {
        try {
          const integration = await resolveFromRoot(runtime, root, domain);
          if (integration) results.set(domain, integration);
        } catch (error) {
          if (!isHearthError(error)) {
            runtime.logger.error(`Error loading ${root.name}.${domain}`, {
              error: getErrorMessage(error),
            });
          }
          results.set(domain, error instanceof Error ? error : new Error(String(error)));
        }
      }),
    ),
  );

  return results;
}
