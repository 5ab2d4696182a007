/** Default number of root lookups allowed in flight at once. */
export const DEFAULT_MAX_CONCURRENT_LOADS = 4;

export const DEFAULT_CUSTOM_DIR_NAME = "custom_components";

/** Package prefix for integrations under the built-in root. */
export const BUILTIN_PACKAGE = "components";

export const MANIFEST_FILENAME = "manifest.json";

/** Entry module names tried, in order, for an integration's component. */
export const ENTRY_MODULE_NAMES = ["index.mjs", "index.js"] as const;

/** File extensions tried for flat module files. */
export const MODULE_EXTENSIONS = [".mjs", ".js"] as const;

/** Zeroconf keys that used to sit at the top level of a matcher. */
export const MOVED_ZEROCONF_PROPERTIES = ["macaddress", "model", "manufacturer"] as const;

export const CUSTOM_INTEGRATION_WARNING =
  "We found a custom integration %s which has not been tested by the host. " +
  "It may cause stability problems, be aware of this if you experience issues.";
