import type { BuiltinDiscoveryTables, IntegrationSource, Logger } from "@hearth/core";

// ---------------------------------------------------------------------------
// Filesystem seam
// ---------------------------------------------------------------------------

/**
 * The filesystem operations the loader performs. The default implementation
 * wraps `node:fs/promises`; tests substitute an in-memory one.
 */
export interface IntegrationFileSystem {
  /** Names of the immediate subdirectories of `dir`. Empty when `dir` does not exist. */
  listDirectories(dir: string): Promise<string[]>;
  isFile(path: string): Promise<boolean>;
  readText(path: string): Promise<string>;
}

// ---------------------------------------------------------------------------
// Module import seam
// ---------------------------------------------------------------------------

/** An evaluated ES module, keyed by export name. */
export type ModuleNamespace = Readonly<Record<string, unknown>>;

/** Imports a module by absolute file path. Defaults to dynamic `import()`. */
export type ModuleImporter = (filePath: string) => Promise<unknown>;

// ---------------------------------------------------------------------------
// Roots
// ---------------------------------------------------------------------------

/** A directory integrations are resolved from. */
export interface IntegrationRoot {
  readonly kind: IntegrationSource;
  /** Package prefix, e.g. `custom_components`. */
  readonly name: string;
  readonly path: string;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface IntegrationRegistryConfig {
  /** Directory holding the built-in integrations. */
  readonly builtinRoot: string;
  /** Host configuration directory. Nothing loads while it is unset. */
  readonly configDir?: string | undefined;
  /** Skip custom integrations entirely. Default: false */
  readonly safeMode?: boolean;
  /** Subdirectory of `configDir` holding custom integrations. Default: "custom_components" */
  readonly customDirName?: string;
  /** Concurrent root lookups. Default: 4 */
  readonly maxConcurrentLoads?: number;
  /** Discovery tables shipped with the host. Default: all empty */
  readonly builtinTables?: BuiltinDiscoveryTables;
  readonly fileSystem?: IntegrationFileSystem;
  readonly importModule?: ModuleImporter;
  readonly logger?: Logger;
}

export interface ResolvedIntegrationRegistryConfig {
  readonly builtinRoot: string;
  readonly configDir: string | undefined;
  readonly safeMode: boolean;
  readonly customDirName: string;
  readonly maxConcurrentLoads: number;
  readonly builtinTables: BuiltinDiscoveryTables;
  readonly fileSystem: IntegrationFileSystem;
  readonly importModule: ModuleImporter;
  readonly logger: Logger;
}
