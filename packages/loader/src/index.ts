/**
 * @hearth/loader
 *
 * Integration registry for Hearth: resolves integrations from the custom and
 * built-in roots, walks their dependency graphs, aggregates discovery
 * matchers and imports their modules.
 */

// ============================================================================
// REGISTRY
// ============================================================================

export { type IntegrationResult, IntegrationRegistry } from "./registry.js";
export { Integration, type IntegrationRuntime } from "./integration.js";
export { resolveConfig } from "./config.js";

// ============================================================================
// RESOLUTION
// ============================================================================

export {
  componentDependencies,
  type DependencyLookup,
  type DependencyNode,
} from "./dependencies.js";
export { resolveFromRoot, resolveIntegrationsFromRoot } from "./source-resolver.js";
export { ConcurrencyLimiter } from "./limiter.js";
export { nodeFileSystem } from "./fs.js";

// ============================================================================
// DISCOVERY
// ============================================================================

export { type ConfigFlowType, processZeroconfMatchDict } from "./discovery.js";

// ============================================================================
// MODULES
// ============================================================================

export { LegacyModuleLoader, manifestFromLegacyModule } from "./legacy.js";
export {
  type ComponentSource,
  Components,
  type HelperModuleLoader,
  Helpers,
  ModuleHandle,
} from "./facade.js";

// ============================================================================
// TYPES
// ============================================================================

export type {
  IntegrationFileSystem,
  IntegrationRegistryConfig,
  IntegrationRoot,
  ModuleImporter,
  ModuleNamespace,
  ResolvedIntegrationRegistryConfig,
} from "./types.js";

export {
  BUILTIN_PACKAGE,
  DEFAULT_CUSTOM_DIR_NAME,
  DEFAULT_MAX_CONCURRENT_LOADS,
} from "./constants.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@hearth/loader";
export const PACKAGE_VERSION = "0.1.0";
