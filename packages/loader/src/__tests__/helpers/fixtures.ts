import type { Logger } from "@hearth/core";
import { type Mock, vi } from "vitest";
import { IntegrationRegistry } from "../../registry.js";
import type { IntegrationRegistryConfig } from "../../types.js";
import { MemoryFileSystem } from "./memory-fs.js";

export const BUILTIN_ROOT = "/hearth/components";
export const CONFIG_DIR = "/config";
export const CUSTOM_ROOT = "/config/custom_components";

export interface SpyLogger extends Logger {
  readonly debug: Mock;
  readonly info: Mock;
  readonly warn: Mock;
  readonly error: Mock;
}

export function createSpyLogger(): SpyLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Messages passed to one level of a spy logger. */
export function messages(spy: Mock): string[] {
  return spy.mock.calls.map((call) => String(call[0]));
}

export function manifest(
  domain: string,
  extra: Record<string, unknown> = {},
): Record<string, unknown> {
  return { domain, name: domain.replace(/_/g, " "), ...extra };
}

export interface RegistryHarness {
  readonly registry: IntegrationRegistry;
  readonly fs: MemoryFileSystem;
  readonly logger: SpyLogger;
}

export function createRegistry(
  fs: MemoryFileSystem = new MemoryFileSystem(),
  overrides: Partial<IntegrationRegistryConfig> = {},
): RegistryHarness {
  const logger = createSpyLogger();
  const registry = new IntegrationRegistry({
    builtinRoot: BUILTIN_ROOT,
    configDir: CONFIG_DIR,
    fileSystem: fs,
    logger,
    ...overrides,
  });
  return { registry, fs, logger };
}
