import { join } from "node:path";
import type {
  BluetoothMatcherFields,
  DhcpMatcherFields,
  HomekitManifestEntry,
  IntegrationManifest,
  IntegrationType,
  Logger,
  UsbManifestEntry,
  ZeroconfManifestEntry,
} from "@hearth/core";
import {
  CircularDependencyError,
  ComponentImportError,
  getErrorMessage,
  InternalError,
  IntegrationNotFoundError,
  InvalidDomainError,
  type LoaderError,
} from "@hearth/errors";
import { ENTRY_MODULE_NAMES } from "./constants.js";
import { componentDependencies, type DependencyNode } from "./dependencies.js";
import { findModuleFile, importModuleFile, moduleCandidates } from "./module-import.js";
import type {
  IntegrationFileSystem,
  IntegrationRoot,
  ModuleImporter,
  ModuleNamespace,
} from "./types.js";

/**
 * Services an Integration borrows from the registry that created it.
 */
export interface IntegrationRuntime {
  readonly logger: Logger;
  readonly fileSystem: IntegrationFileSystem;
  readonly importModule: ModuleImporter;
  getIntegration(domain: string): Promise<Integration>;
}

/**
 * A resolved integration: its manifest, where it lives, and lazily
 * resolved dependency closure and modules.
 */
export class Integration implements DependencyNode {
  readonly manifest: IntegrationManifest;
  readonly root: IntegrationRoot;
  /** Directory containing the integration's manifest.json. */
  readonly filePath: string;
  readonly pkgPath: string;

  private readonly runtime: IntegrationRuntime;
  private readonly modules = new Map<string, ModuleNamespace>();
  private allDependenciesValue: ReadonlySet<string> | undefined;
  private dependenciesResolved: boolean | undefined;
  private dependencyErrorValue: LoaderError | undefined;

  constructor(
    runtime: IntegrationRuntime,
    root: IntegrationRoot,
    filePath: string,
    manifest: IntegrationManifest,
  ) {
    this.runtime = runtime;
    this.root = root;
    this.filePath = filePath;
    this.manifest = manifest;
    this.pkgPath = `${root.name}.${manifest.domain}`;

    if (this.dependencies.length === 0) {
      this.allDependenciesValue = new Set();
      this.dependenciesResolved = true;
    }
  }

  // -------------------------------------------------------------------------
  // Manifest views
  // -------------------------------------------------------------------------

  get domain(): string {
    return this.manifest.domain;
  }

  get name(): string {
    return this.manifest.name;
  }

  get isBuiltIn(): boolean {
    return this.root.kind === "builtin";
  }

  get disabled(): string | undefined {
    return this.manifest.disabled;
  }

  get integrationType(): IntegrationType {
    return this.manifest.integration_type ?? "integration";
  }

  get dependencies(): readonly string[] {
    return this.manifest.dependencies ?? [];
  }

  get afterDependencies(): readonly string[] {
    return this.manifest.after_dependencies ?? [];
  }

  get requirements(): readonly string[] {
    return this.manifest.requirements ?? [];
  }

  get configFlow(): boolean {
    return this.manifest.config_flow ?? false;
  }

  get documentation(): string | undefined {
    return this.manifest.documentation;
  }

  get issueTracker(): string | undefined {
    return this.manifest.issue_tracker;
  }

  get qualityScale(): string | undefined {
    return this.manifest.quality_scale;
  }

  get iotClass(): string | undefined {
    return this.manifest.iot_class;
  }

  get loggers(): readonly string[] {
    return this.manifest.loggers ?? [];
  }

  get version(): string | undefined {
    return this.manifest.version;
  }

  get zeroconf(): readonly ZeroconfManifestEntry[] | undefined {
    return this.manifest.zeroconf;
  }

  get ssdp(): readonly Readonly<Record<string, string>>[] | undefined {
    return this.manifest.ssdp;
  }

  get bluetooth(): readonly BluetoothMatcherFields[] | undefined {
    return this.manifest.bluetooth;
  }

  get dhcp(): readonly DhcpMatcherFields[] | undefined {
    return this.manifest.dhcp;
  }

  get usb(): readonly UsbManifestEntry[] | undefined {
    return this.manifest.usb;
  }

  get homekit(): HomekitManifestEntry | undefined {
    return this.manifest.homekit;
  }

  get mqtt(): readonly string[] | undefined {
    return this.manifest.mqtt;
  }

  // -------------------------------------------------------------------------
  // Dependencies
  // -------------------------------------------------------------------------

  /**
   * Transitive hard dependencies, excluding this integration.
   *
   * @throws InternalError before resolveDependencies() has run
   */
  get allDependencies(): ReadonlySet<string> {
    if (this.allDependenciesValue === undefined) {
      throw new InternalError(`Dependencies of ${this.domain} not resolved`);
    }
    return this.allDependenciesValue;
  }

  /** True once resolution succeeded, false once it failed, undefined before. */
  get allDependenciesResolved(): boolean | undefined {
    return this.dependenciesResolved;
  }

  /** Why resolution failed, if it did. */
  get dependencyError(): LoaderError | undefined {
    return this.dependencyErrorValue;
  }

  /**
   * Resolve the dependency closure once. Later calls return the stored outcome.
   */
  async resolveDependencies(): Promise<boolean> {
    if (this.dependenciesResolved !== undefined) {
      return this.dependenciesResolved;
    }

    try {
      const closure = await componentDependencies(
        { getIntegration: (domain) => this.fetchDependency(domain) },
        this.domain,
        this,
        new Set(),
        new Set(),
      );
      closure.delete(this.domain);
      this.allDependenciesValue = closure;
      this.dependenciesResolved = true;
    } catch (error) {
      if (error instanceof IntegrationNotFoundError) {
        this.runtime.logger.error(
          `Unable to resolve dependencies for ${this.domain}: unable to resolve (sub)dependency ${error.integrationDomain}`,
        );
      } else if (error instanceof CircularDependencyError) {
        this.runtime.logger.error(
          `Unable to resolve dependencies for ${this.domain}: it contains a circular dependency: ${error.fromDomain} -> ${error.toDomain}`,
        );
      } else {
        throw error;
      }
      this.dependencyErrorValue = error;
      this.dependenciesResolved = false;
    }

    return this.dependenciesResolved;
  }

  private async fetchDependency(domain: string): Promise<Integration> {
    try {
      return await this.runtime.getIntegration(domain);
    } catch (error) {
      if (error instanceof InvalidDomainError) {
        throw new IntegrationNotFoundError(domain, error);
      }
      throw error;
    }
  }

  // -------------------------------------------------------------------------
  // Modules
  // -------------------------------------------------------------------------

  /**
   * Import the integration's entry module (`index.mjs` or `index.js`).
   *
   * @throws ComponentImportError when the module is missing or fails to evaluate
   */
  async getComponent(): Promise<ModuleNamespace> {
    return this.importCached(
      this.pkgPath,
      ENTRY_MODULE_NAMES.map((entry) => join(this.filePath, entry)),
    );
  }

  /**
   * Import one of the integration's platform modules, e.g. `light`.
   *
   * @throws ComponentImportError when the module is missing or fails to evaluate
   */
  async getPlatform(platformName: string): Promise<ModuleNamespace> {
    return this.importCached(
      `${this.pkgPath}.${platformName}`,
      moduleCandidates(this.filePath, platformName),
    );
  }

  private async importCached(
    modulePath: string,
    candidates: readonly string[],
  ): Promise<ModuleNamespace> {
    const cached = this.modules.get(modulePath);
    if (cached) return cached;

    const file = await findModuleFile(this.runtime.fileSystem, candidates);
    if (file === undefined) {
      throw new ComponentImportError(modulePath, new Error(`No module file found for ${modulePath}`));
    }

    try {
      const mod = await importModuleFile(this.runtime.importModule, file);
      this.modules.set(modulePath, mod);
      return mod;
    } catch (error) {
      this.runtime.logger.error(`Unexpected exception importing ${modulePath}`, {
        file,
        error: getErrorMessage(error),
      });
      throw new ComponentImportError(modulePath, error);
    }
  }
}
