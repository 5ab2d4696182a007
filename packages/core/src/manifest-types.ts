// ---------------------------------------------------------------------------
// Integration classification
// ---------------------------------------------------------------------------

/** Fixed classification tag carried by every manifest. */
export type IntegrationType = "entity" | "integration" | "hardware" | "helper" | "system";

export const INTEGRATION_TYPES: readonly IntegrationType[] = [
  "entity",
  "integration",
  "hardware",
  "helper",
  "system",
];

/** Which search root an integration was resolved from. */
export type IntegrationSource = "builtin" | "custom";

// ---------------------------------------------------------------------------
// Discovery matcher fragments (as written in manifest.json)
// ---------------------------------------------------------------------------

/** Zeroconf entry: either a bare service type or a matcher dict with `type`. */
export type ZeroconfManifestEntry =
  | string
  | ({ readonly type: string; readonly properties?: Readonly<Record<string, string>> } & Readonly<
      Record<string, unknown>
    >);

export interface BluetoothMatcherFields {
  readonly local_name?: string;
  readonly service_uuid?: string;
  readonly service_data_uuid?: string;
  readonly manufacturer_id?: number;
  readonly manufacturer_data_start?: readonly number[];
  readonly connectable?: boolean;
}

export interface DhcpMatcherFields {
  readonly macaddress?: string;
  readonly hostname?: string;
  readonly registered_devices?: boolean;
}

export interface UsbMatcherFields {
  readonly vid?: string;
  readonly pid?: string;
  readonly serial_number?: string;
  readonly manufacturer?: string;
  readonly description?: string;
}

/** USB entries in a manifest may also carry a `known_devices` list. */
export interface UsbManifestEntry extends UsbMatcherFields {
  readonly known_devices?: readonly string[];
}

export interface HomekitManifestEntry {
  readonly models?: readonly string[];
}

// ---------------------------------------------------------------------------
// Manifest
// ---------------------------------------------------------------------------

/**
 * Static descriptor of an integration, read from `<root>/<domain>/manifest.json`.
 *
 * Optional keys may be omitted on disk; when present they are never null.
 */
export interface IntegrationManifest {
  readonly domain: string;
  readonly name: string;
  readonly disabled?: string;
  readonly integration_type?: IntegrationType;
  readonly dependencies?: readonly string[];
  readonly after_dependencies?: readonly string[];
  readonly requirements?: readonly string[];
  readonly config_flow?: boolean;
  readonly documentation?: string;
  readonly issue_tracker?: string;
  readonly quality_scale?: string;
  readonly iot_class?: string;
  readonly codeowners?: readonly string[];
  readonly loggers?: readonly string[];
  readonly supported_brands?: Readonly<Record<string, string>>;
  readonly version?: string;
  readonly zeroconf?: readonly ZeroconfManifestEntry[];
  readonly ssdp?: readonly Readonly<Record<string, string>>[];
  readonly bluetooth?: readonly BluetoothMatcherFields[];
  readonly dhcp?: readonly DhcpMatcherFields[];
  readonly usb?: readonly UsbManifestEntry[];
  readonly homekit?: HomekitManifestEntry;
  readonly mqtt?: readonly string[];
}

// ---------------------------------------------------------------------------
// Aggregated matcher records (tagged with the owning domain)
// ---------------------------------------------------------------------------

export interface BluetoothMatcher extends BluetoothMatcherFields {
  readonly domain: string;
}

export interface DhcpMatcher extends DhcpMatcherFields {
  readonly domain: string;
}

export interface UsbMatcher extends UsbMatcherFields {
  readonly domain: string;
}

/** Zeroconf matcher as stored in the aggregate, keyed by service type. */
export interface ZeroconfMatcher {
  readonly domain: string;
  readonly properties?: Readonly<Record<string, string>>;
  readonly [key: string]: unknown;
}

export type ZeroconfTable = Readonly<Record<string, readonly ZeroconfMatcher[]>>;
export type SsdpTable = Readonly<Record<string, readonly Readonly<Record<string, string>>[]>>;
export type HomekitTable = Readonly<Record<string, string>>;
export type MqttTable = Readonly<Record<string, readonly string[]>>;

/** Config flow domains grouped by the integration type that offers them. */
export type ConfigFlowTable = Readonly<Record<"integration" | "helper", readonly string[]>>;

/**
 * Built-in discovery tables shipped with the host. Custom integration
 * fragments are appended to copies of these.
 */
export interface BuiltinDiscoveryTables {
  readonly zeroconf: ZeroconfTable;
  readonly homekit: HomekitTable;
  readonly ssdp: SsdpTable;
  readonly bluetooth: readonly BluetoothMatcher[];
  readonly dhcp: readonly DhcpMatcher[];
  readonly usb: readonly UsbMatcher[];
  readonly mqtt: MqttTable;
  readonly configFlows: ConfigFlowTable;
  readonly applicationCredentials: readonly string[];
}
