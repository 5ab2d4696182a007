export const PACKAGE_NAME = "@hearth/core" as const;

// Host context + binding
export { bindHost, type HostBoundFunction, type HostContext, isHostBound } from "./host-types.js";
// Logging
export { createConsoleLogger, type Logger } from "./logger.js";
// Manifest + matcher types
export {
  type BluetoothMatcher,
  type BluetoothMatcherFields,
  type BuiltinDiscoveryTables,
  type ConfigFlowTable,
  type DhcpMatcher,
  type DhcpMatcherFields,
  type HomekitManifestEntry,
  type HomekitTable,
  INTEGRATION_TYPES,
  type IntegrationManifest,
  type IntegrationSource,
  type IntegrationType,
  type MqttTable,
  type SsdpTable,
  type UsbManifestEntry,
  type UsbMatcher,
  type UsbMatcherFields,
  type ZeroconfManifestEntry,
  type ZeroconfMatcher,
  type ZeroconfTable,
} from "./manifest-types.js";
