import { createConsoleLogger } from "@hearth/core";
import { EMPTY_BUILTIN_TABLES } from "@hearth/manifest";
import { DEFAULT_CUSTOM_DIR_NAME, DEFAULT_MAX_CONCURRENT_LOADS } from "./constants.js";
import { nodeFileSystem } from "./fs.js";
import type { IntegrationRegistryConfig, ResolvedIntegrationRegistryConfig } from "./types.js";

const importByPath = (filePath: string): Promise<unknown> => import(filePath);

export function resolveConfig(config: IntegrationRegistryConfig): ResolvedIntegrationRegistryConfig {
  return {
    builtinRoot: config.builtinRoot,
    configDir: config.configDir,
    safeMode: config.safeMode ?? false,
    customDirName: config.customDirName ?? DEFAULT_CUSTOM_DIR_NAME,
    maxConcurrentLoads: config.maxConcurrentLoads ?? DEFAULT_MAX_CONCURRENT_LOADS,
    builtinTables: config.builtinTables ?? EMPTY_BUILTIN_TABLES,
    fileSystem: config.fileSystem ?? nodeFileSystem,
    importModule: config.importModule ?? importByPath,
    logger: config.logger ?? createConsoleLogger("loader"),
  };
}
