/**
 * Discovery table aggregation: built-in tables plus the fragments custom
 * integrations declare in their manifests.
 */

import type {
  BluetoothMatcher,
  BuiltinDiscoveryTables,
  DhcpMatcher,
  HomekitTable,
  IntegrationType,
  Logger,
  MqttTable,
  SsdpTable,
  UsbMatcher,
  ZeroconfMatcher,
  ZeroconfTable,
} from "@hearth/core";
import { MOVED_ZEROCONF_PROPERTIES } from "./constants.js";
import type { Integration } from "./integration.js";

// ---------------------------------------------------------------------------
// Zeroconf
// ---------------------------------------------------------------------------

interface MutableZeroconfMatcher {
  domain: string;
  properties?: Record<string, string>;
  [key: string]: unknown;
}

function isMovedProperty(key: string): boolean {
  return MOVED_ZEROCONF_PROPERTIES.some((moved) => moved === key);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    value !== null &&
    typeof value === "object" &&
    Object.values(value).every((v) => typeof v === "string")
  );
}

/**
 * Turn a zeroconf matcher dict into a stored matcher: drop `type` and move
 * the legacy top-level keys into `properties`, lower-cased.
 */
export function processZeroconfMatchDict(
  domain: string,
  entry: Readonly<Record<string, unknown>>,
  logger: Logger,
): ZeroconfMatcher {
  const matcher: MutableZeroconfMatcher = { domain };
  let properties = isStringRecord(entry.properties) ? { ...entry.properties } : undefined;

  for (const [key, value] of Object.entries(entry)) {
    if (key === "type" || key === "properties" || key === "domain") continue;

    if (!isMovedProperty(key)) {
      matcher[key] = value;
      continue;
    }

    logger.warn(
      `Matching the zeroconf property "${key}" at top-level is deprecated and should be moved into a properties dict; found in ${domain}`,
    );
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      properties = { ...properties, [key]: String(value).toLowerCase() };
    }
  }

  if (properties !== undefined) matcher.properties = properties;
  return matcher;
}

export function buildZeroconf(
  builtin: ZeroconfTable,
  integrations: readonly Integration[],
  logger: Logger,
): ZeroconfTable {
  const table: Record<string, ZeroconfMatcher[]> = {};
  for (const [serviceType, matchers] of Object.entries(builtin)) {
    table[serviceType] = [...matchers];
  }

  for (const integration of integrations) {
    for (const entry of integration.zeroconf ?? []) {
      const serviceType = typeof entry === "string" ? entry : entry.type;
      const matcher: ZeroconfMatcher =
        typeof entry === "string"
          ? { domain: integration.domain }
          : processZeroconfMatchDict(integration.domain, entry, logger);
      const list = table[serviceType];
      if (list) list.push(matcher);
      else table[serviceType] = [matcher];
    }
  }

  return table;
}

// ---------------------------------------------------------------------------
// Matcher lists
// ---------------------------------------------------------------------------

export function buildBluetooth(
  builtin: readonly BluetoothMatcher[],
  integrations: readonly Integration[],
): BluetoothMatcher[] {
  const matchers = [...builtin];
  for (const integration of integrations) {
    for (const entry of integration.bluetooth ?? []) {
      matchers.push({ domain: integration.domain, ...entry });
    }
  }
  return matchers;
}

export function buildDhcp(
  builtin: readonly DhcpMatcher[],
  integrations: readonly Integration[],
): DhcpMatcher[] {
  const matchers = [...builtin];
  for (const integration of integrations) {
    for (const entry of integration.dhcp ?? []) {
      matchers.push({ domain: integration.domain, ...entry });
    }
  }
  return matchers;
}

export function buildUsb(
  builtin: readonly UsbMatcher[],
  integrations: readonly Integration[],
): UsbMatcher[] {
  const matchers = [...builtin];
  for (const integration of integrations) {
    for (const { known_devices: _knownDevices, ...entry } of integration.usb ?? []) {
      matchers.push({ domain: integration.domain, ...entry });
    }
  }
  return matchers;
}

// ---------------------------------------------------------------------------
// Keyed tables
// ---------------------------------------------------------------------------

/** HomeKit model name → domain. */
export function buildHomekit(
  builtin: HomekitTable,
  integrations: readonly Integration[],
): HomekitTable {
  const table: Record<string, string> = { ...builtin };
  for (const integration of integrations) {
    for (const model of integration.homekit?.models ?? []) {
      table[model] = integration.domain;
    }
  }
  return table;
}

export function buildSsdp(builtin: SsdpTable, integrations: readonly Integration[]): SsdpTable {
  const table: Record<string, readonly Readonly<Record<string, string>>[]> = { ...builtin };
  for (const integration of integrations) {
    if (integration.ssdp && integration.ssdp.length > 0) {
      table[integration.domain] = integration.ssdp;
    }
  }
  return table;
}

export function buildMqtt(builtin: MqttTable, integrations: readonly Integration[]): MqttTable {
  const table: Record<string, readonly string[]> = { ...builtin };
  for (const integration of integrations) {
    if (integration.mqtt && integration.mqtt.length > 0) {
      table[integration.domain] = integration.mqtt;
    }
  }
  return table;
}

// ---------------------------------------------------------------------------
// Config flows and application credentials
// ---------------------------------------------------------------------------

/** Integration types whose config flows are listed. */
export type ConfigFlowType = "integration" | "helper";

export function buildConfigFlows(
  builtin: BuiltinDiscoveryTables["configFlows"],
  integrations: readonly Integration[],
  typeFilter?: ConfigFlowType,
): Set<string> {
  const flows = new Set<string>();
  const types: readonly ConfigFlowType[] = typeFilter ? [typeFilter] : ["integration", "helper"];

  for (const type of types) {
    for (const domain of builtin[type]) flows.add(domain);
  }

  for (const integration of integrations) {
    if (!integration.configFlow) continue;
    if (typeFilter !== undefined && !matchesFlowType(integration.integrationType, typeFilter)) {
      continue;
    }
    flows.add(integration.domain);
  }

  return flows;
}

function matchesFlowType(type: IntegrationType, filter: ConfigFlowType): boolean {
  return filter === "helper" ? type === "helper" : type !== "helper";
}

export function buildApplicationCredentials(
  builtin: readonly string[],
  integrations: readonly Integration[],
): string[] {
  const domains = [...builtin];
  for (const integration of integrations) {
    if (integration.dependencies.includes("application_credentials")) {
      domains.push(integration.domain);
    }
  }
  return domains;
}
