import { join } from "node:path";
import type {
  BluetoothMatcher,
  DhcpMatcher,
  HomekitTable,
  HostContext,
  Logger,
  MqttTable,
  SsdpTable,
  UsbMatcher,
  ZeroconfTable,
} from "@hearth/core";
import {
  ConfigDirMissingError,
  getErrorMessage,
  IntegrationNotFoundError,
  InvalidDomainError,
  type LoaderError,
} from "@hearth/errors";
import { resolveConfig } from "./config.js";
import { BUILTIN_PACKAGE } from "./constants.js";
import {
  buildApplicationCredentials,
  buildBluetooth,
  buildConfigFlows,
  buildDhcp,
  buildHomekit,
  buildMqtt,
  buildSsdp,
  buildUsb,
  buildZeroconf,
  type ConfigFlowType,
} from "./discovery.js";
import { Components, Helpers } from "./facade.js";
import { Integration, type IntegrationRuntime } from "./integration.js";
import { LegacyModuleLoader } from "./legacy.js";
import { ConcurrencyLimiter } from "./limiter.js";
import { resolveIntegrationsFromRoot } from "./source-resolver.js";
import type {
  IntegrationFileSystem,
  IntegrationRegistryConfig,
  IntegrationRoot,
  ModuleImporter,
  ModuleNamespace,
  ResolvedIntegrationRegistryConfig,
} from "./types.js";

// ---------------------------------------------------------------------------
// Pending markers
// ---------------------------------------------------------------------------

/** Placeholder cached while a domain is being resolved. */
interface PendingEntry {
  readonly settled: Promise<void>;
  release(): void;
}

function createPendingEntry(): PendingEntry {
  let resolve: () => void = () => {};
  const settled = new Promise<void>((r) => {
    resolve = r;
  });
  return { settled, release: () => resolve() };
}

/** Result of a batch lookup: the integration, or why there is none. */
export type IntegrationResult = Integration | LoaderError;

interface DiscoveryTables {
  readonly zeroconf: ZeroconfTable;
  readonly bluetooth: readonly BluetoothMatcher[];
  readonly dhcp: readonly DhcpMatcher[];
  readonly usb: readonly UsbMatcher[];
  readonly homekit: HomekitTable;
  readonly ssdp: SsdpTable;
  readonly mqtt: MqttTable;
}

type DiscoveryCache = { [K in keyof DiscoveryTables]?: Promise<DiscoveryTables[K]> };

// ---------------------------------------------------------------------------
// IntegrationRegistry
// ---------------------------------------------------------------------------

/**
 * Resolves integrations by domain and caches them for its lifetime.
 *
 * Lookups consult custom integrations (under `<configDir>/custom_components`)
 * before the built-in root. Concurrent lookups for the same domain share a
 * single resolution.
 */
export class IntegrationRegistry implements IntegrationRuntime {
  readonly config: ResolvedIntegrationRegistryConfig;
  readonly host: HostContext;
  readonly builtinRoot: IntegrationRoot;
  readonly customRoot: IntegrationRoot | undefined;

  private readonly cache = new Map<string, Integration | PendingEntry>();
  private readonly limiter: ConcurrencyLimiter;
  private readonly legacyLoader: LegacyModuleLoader;
  private customIntegrations: Promise<ReadonlyMap<string, Integration>> | undefined;
  private readonly discoveryCache: DiscoveryCache = {};
  private componentsFacade: Components | undefined;
  private helpersFacade: Helpers | undefined;

  constructor(config: IntegrationRegistryConfig) {
    this.config = resolveConfig(config);
    this.host = { configDir: this.config.configDir, safeMode: this.config.safeMode };
    this.limiter = new ConcurrencyLimiter(this.config.maxConcurrentLoads);
    this.builtinRoot = { kind: "builtin", name: BUILTIN_PACKAGE, path: this.config.builtinRoot };
    this.customRoot =
      this.config.configDir === undefined
        ? undefined
        : {
            kind: "custom",
            name: this.config.customDirName,
            path: join(this.config.configDir, this.config.customDirName),
          };
    this.legacyLoader = new LegacyModuleLoader(this, this.lookupRoots());
  }

  // -------------------------------------------------------------------------
  // IntegrationRuntime
  // -------------------------------------------------------------------------

  get logger(): Logger {
    return this.config.logger;
  }

  get fileSystem(): IntegrationFileSystem {
    return this.config.fileSystem;
  }

  get importModule(): ModuleImporter {
    return this.config.importModule;
  }

  // -------------------------------------------------------------------------
  // Lookup
  // -------------------------------------------------------------------------

  /**
   * Resolve a single domain.
   *
   * @throws InvalidDomainError | IntegrationNotFoundError
   */
  async getIntegration(domain: string): Promise<Integration> {
    const result = (await this.getIntegrations([domain])).get(domain);
    if (result instanceof Integration) return result;
    throw result ?? new IntegrationNotFoundError(domain);
  }

  /**
   * Resolve several domains at once. Never rejects for a missing or
   * malformed domain; those map to an error instead.
   */
  async getIntegrations(domains: Iterable<string>): Promise<Map<string, IntegrationResult>> {
    const requested = [...new Set(domains)];
    const results = new Map<string, IntegrationResult>();

    if (this.config.configDir === undefined) {
      const error = new ConfigDirMissingError();
      this.logger.error(error.message);
      for (const domain of requested) {
        results.set(domain, new IntegrationNotFoundError(domain, error));
      }
      return results;
    }

    const needed = new Map<string, PendingEntry>();
    const inProgress = new Map<string, PendingEntry>();

    for (const domain of requested) {
      const entry = this.cache.get(domain);
      if (entry instanceof Integration) {
        results.set(domain, entry);
      } else if (entry !== undefined) {
        inProgress.set(domain, entry);
      } else if (domain.includes(".")) {
        results.set(domain, new InvalidDomainError(domain));
      } else {
        const pending = createPendingEntry();
        this.cache.set(domain, pending);
        needed.set(domain, pending);
      }
    }

    await Promise.all([
      this.awaitInProgress(inProgress, results),
      this.resolveNeeded(needed, results),
    ]);

    return results;
  }

  /** Cached integration for `domain`, without resolving it. */
  getCachedIntegration(domain: string): Integration | undefined {
    const entry = this.cache.get(domain);
    return entry instanceof Integration ? entry : undefined;
  }

  private async awaitInProgress(
    inProgress: ReadonlyMap<string, PendingEntry>,
    results: Map<string, IntegrationResult>,
  ): Promise<void> {
    await Promise.all([...inProgress.values()].map((pending) => pending.settled));

    for (const domain of inProgress.keys()) {
      results.set(domain, this.getCachedIntegration(domain) ?? new IntegrationNotFoundError(domain));
    }
  }

  private async resolveNeeded(
    needed: ReadonlyMap<string, PendingEntry>,
    results: Map<string, IntegrationResult>,
  ): Promise<void> {
    if (needed.size === 0) return;
    const remaining = new Map(needed);

    try {
      const custom = await this.getCustomIntegrations();
      for (const [domain, pending] of remaining) {
        const integration = custom.get(domain);
        if (integration === undefined) continue;
        this.settle(domain, pending, results, integration);
        remaining.delete(domain);
      }

      if (remaining.size === 0) return;

      const resolved = await resolveIntegrationsFromRoot(
        this,
        this.builtinRoot,
        [...remaining.keys()],
        this.limiter,
      );
      for (const [domain, pending] of remaining) {
        const outcome = resolved.get(domain);
        if (outcome instanceof Integration) {
          this.settle(domain, pending, results, outcome);
        } else {
          this.fail(domain, pending, results, outcome);
        }
        remaining.delete(domain);
      }
    } catch (error) {
      this.logger.error("Unexpected error resolving integrations", {
        domains: [...remaining.keys()],
        error: getErrorMessage(error),
      });
      for (const [domain, pending] of remaining) {
        this.fail(domain, pending, results, error);
      }
    }
  }

  private settle(
    domain: string,
    pending: PendingEntry,
    results: Map<string, IntegrationResult>,
    integration: Integration,
  ): void {
    this.cache.set(domain, integration);
    results.set(domain, integration);
    pending.release();
  }

  private fail(
    domain: string,
    pending: PendingEntry,
    results: Map<string, IntegrationResult>,
    cause: unknown,
  ): void {
    if (this.cache.get(domain) === pending) {
      this.cache.delete(domain);
    }
    results.set(domain, new IntegrationNotFoundError(domain, cause));
    pending.release();
  }

  // -------------------------------------------------------------------------
  // Custom integrations
  // -------------------------------------------------------------------------

  /**
   * Every custom integration, keyed by domain. Computed once and shared by
   * concurrent callers. Empty in safe mode.
   */
  getCustomIntegrations(): Promise<ReadonlyMap<string, Integration>> {
    if (this.customIntegrations === undefined) {
      this.customIntegrations = this.scanCustomIntegrations();
    }
    return this.customIntegrations;
  }

  private async scanCustomIntegrations(): Promise<ReadonlyMap<string, Integration>> {
    const found = new Map<string, Integration>();
    const root = this.customRoot;
    if (this.config.safeMode || root === undefined) return found;

    let names: string[];
    try {
      names = await this.fileSystem.listDirectories(root.path);
    } catch (error) {
      this.logger.error(`Unable to list custom integrations in ${root.path}`, {
        error: getErrorMessage(error),
      });
      return found;
    }

    const resolved = await resolveIntegrationsFromRoot(
      this,
      root,
      names.filter((name) => !name.includes(".")),
      this.limiter,
    );
    for (const outcome of resolved.values()) {
      if (outcome instanceof Integration) found.set(outcome.domain, outcome);
    }
    return found;
  }

  // -------------------------------------------------------------------------
  // Discovery
  // -------------------------------------------------------------------------

  private discovery<K extends keyof DiscoveryTables>(
    key: K,
    build: (custom: readonly Integration[]) => DiscoveryTables[K],
  ): Promise<DiscoveryTables[K]> {
    const cache: { [P in K]?: Promise<DiscoveryTables[P]> } = this.discoveryCache;
    const cached = cache[key];
    if (cached) return cached;

    const table = this.getCustomIntegrations().then((custom) => build([...custom.values()]));
    cache[key] = table;
    return table;
  }

  /** Zeroconf matchers keyed by service type. */
  getZeroconf(): Promise<ZeroconfTable> {
    return this.discovery("zeroconf", (custom) =>
      buildZeroconf(this.config.builtinTables.zeroconf, custom, this.logger),
    );
  }

  getBluetooth(): Promise<readonly BluetoothMatcher[]> {
    return this.discovery("bluetooth", (custom) =>
      buildBluetooth(this.config.builtinTables.bluetooth, custom),
    );
  }

  getDhcp(): Promise<readonly DhcpMatcher[]> {
    return this.discovery("dhcp", (custom) => buildDhcp(this.config.builtinTables.dhcp, custom));
  }

  getUsb(): Promise<readonly UsbMatcher[]> {
    return this.discovery("usb", (custom) => buildUsb(this.config.builtinTables.usb, custom));
  }

  /** HomeKit model → domain. */
  getHomekit(): Promise<HomekitTable> {
    return this.discovery("homekit", (custom) =>
      buildHomekit(this.config.builtinTables.homekit, custom),
    );
  }

  /** SSDP matchers keyed by domain. */
  getSsdp(): Promise<SsdpTable> {
    return this.discovery("ssdp", (custom) => buildSsdp(this.config.builtinTables.ssdp, custom));
  }

  /** MQTT topics keyed by domain. */
  getMqtt(): Promise<MqttTable> {
    return this.discovery("mqtt", (custom) => buildMqtt(this.config.builtinTables.mqtt, custom));
  }

  async getConfigFlows(typeFilter?: ConfigFlowType): Promise<Set<string>> {
    const custom = await this.getCustomIntegrations();
    return buildConfigFlows(this.config.builtinTables.configFlows, [...custom.values()], typeFilter);
  }

  async getApplicationCredentials(): Promise<string[]> {
    const custom = await this.getCustomIntegrations();
    return buildApplicationCredentials(this.config.builtinTables.applicationCredentials, [
      ...custom.values(),
    ]);
  }

  // -------------------------------------------------------------------------
  // Modules
  // -------------------------------------------------------------------------

  /** Roots the legacy loader searches, in order. */
  lookupRoots(): readonly IntegrationRoot[] {
    if (this.config.configDir === undefined) return [];
    if (this.config.safeMode || this.customRoot === undefined) return [this.builtinRoot];
    return [this.customRoot, this.builtinRoot];
  }

  /** Import a module by dotted name from the lookup roots. */
  loadLegacyModule(name: string): Promise<ModuleNamespace | undefined> {
    return this.legacyLoader.load(name);
  }

  get components(): Components {
    if (this.componentsFacade === undefined) {
      this.componentsFacade = new Components(this);
    }
    return this.componentsFacade;
  }

  get helpers(): Helpers {
    if (this.helpersFacade === undefined) {
      this.helpersFacade = new Helpers(this.host);
    }
    return this.helpersFacade;
  }
}
