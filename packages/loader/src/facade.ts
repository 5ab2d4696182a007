import { type HostContext, isHostBound } from "@hearth/core";
import { HelperNotRegisteredError, IntegrationNotFoundError } from "@hearth/errors";
import type { Integration } from "./integration.js";
import type { ModuleNamespace } from "./types.js";

// ---------------------------------------------------------------------------
// ModuleHandle
// ---------------------------------------------------------------------------

/**
 * Read-only view of an imported module. Exports created with `bindHost`
 * come back as plain functions with the host context already supplied.
 */
export class ModuleHandle {
  readonly name: string;
  private readonly module: ModuleNamespace;
  private readonly host: HostContext;
  private readonly resolved = new Map<string, unknown>();

  constructor(name: string, module: ModuleNamespace, host: HostContext) {
    this.name = name;
    this.module = module;
    this.host = host;
  }

  has(exportName: string): boolean {
    return exportName in this.module;
  }

  /** The export's value, or undefined when the module has no such export. */
  get(exportName: string): unknown {
    if (this.resolved.has(exportName)) return this.resolved.get(exportName);
    if (!this.has(exportName)) return undefined;

    const value = this.module[exportName];
    const resolved = isHostBound(value)
      ? (...args: readonly unknown[]) => value.fn(this.host, ...args)
      : value;
    this.resolved.set(exportName, resolved);
    return resolved;
  }

  /**
   * Call a function export.
   *
   * @throws TypeError when the export is missing or not callable
   */
  call(exportName: string, ...args: readonly unknown[]): unknown {
    const fn = this.get(exportName);
    if (typeof fn !== "function") {
      throw new TypeError(`${this.name}.${exportName} is not a function`);
    }
    return fn(...args);
  }
}

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

/** What the components facade needs from the registry. */
export interface ComponentSource {
  readonly host: HostContext;
  getCachedIntegration(domain: string): Integration | undefined;
  loadLegacyModule(name: string): Promise<ModuleNamespace | undefined>;
}

/**
 * Looks up component modules by name: the integration's entry module when
 * the integration is already resolved, the legacy loader otherwise.
 */
export class Components {
  private readonly source: ComponentSource;
  private readonly handles = new Map<string, ModuleHandle>();

  constructor(source: ComponentSource) {
    this.source = source;
  }

  /**
   * @throws IntegrationNotFoundError when nothing provides `name`
   * @throws ComponentImportError when a resolved integration's module fails to import
   */
  async get(name: string): Promise<ModuleHandle> {
    const cached = this.handles.get(name);
    if (cached) return cached;

    const integration = this.source.getCachedIntegration(name);
    const module = integration
      ? await integration.getComponent()
      : await this.source.loadLegacyModule(name);
    if (module === undefined) {
      throw new IntegrationNotFoundError(name);
    }

    const handle = new ModuleHandle(name, module, this.source.host);
    this.handles.set(name, handle);
    return handle;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Supplies a helper module, possibly lazily. */
export type HelperModuleLoader = () => ModuleNamespace | Promise<ModuleNamespace>;

/**
 * Registry of host helper modules, looked up by name.
 */
export class Helpers {
  private readonly host: HostContext;
  private readonly loaders = new Map<string, HelperModuleLoader>();
  private readonly handles = new Map<string, Promise<ModuleHandle>>();

  constructor(host: HostContext) {
    this.host = host;
  }

  register(name: string, loader: HelperModuleLoader): void {
    this.loaders.set(name, loader);
    this.handles.delete(name);
  }

  has(name: string): boolean {
    return this.loaders.has(name);
  }

  /**
   * @throws HelperNotRegisteredError
   */
  get(name: string): Promise<ModuleHandle> {
    const cached = this.handles.get(name);
    if (cached) return cached;

    const loader = this.loaders.get(name);
    if (loader === undefined) {
      return Promise.reject(new HelperNotRegisteredError(name));
    }

    const handle = Promise.resolve()
      .then(loader)
      .then((module) => new ModuleHandle(name, module, this.host));
    void handle.catch(() => {
      if (this.handles.get(name) === handle) this.handles.delete(name);
    });
    this.handles.set(name, handle);
    return handle;
  }
}
