import type { IntegrationManifest } from "@hearth/core";
import { getErrorMessage } from "@hearth/errors";
import { validateManifest } from "@hearth/manifest";
import type { IntegrationRuntime } from "./integration.js";
import { findModuleFile, importModuleFile, moduleCandidates } from "./module-import.js";
import type { IntegrationRoot, ModuleNamespace } from "./types.js";

/**
 * Imports modules by dotted name from an ordered list of roots, for code
 * that predates manifests. The first root holding the module wins.
 */
export class LegacyModuleLoader {
  private readonly cache = new Map<string, ModuleNamespace>();
  private readonly runtime: IntegrationRuntime;
  private readonly roots: readonly IntegrationRoot[];

  constructor(runtime: IntegrationRuntime, roots: readonly IntegrationRoot[]) {
    this.runtime = runtime;
    this.roots = roots;
  }

  /**
   * Load `name` (e.g. `switch` or `switch.acme`). Returns undefined when no
   * root has it, or when every copy found failed to import.
   */
  async load(name: string): Promise<ModuleNamespace | undefined> {
    const cached = this.cache.get(name);
    if (cached) return cached;

    for (const root of this.roots) {
      const file = await findModuleFile(this.runtime.fileSystem, moduleCandidates(root.path, name));
      if (file === undefined) continue;

      try {
        const mod = await importModuleFile(this.runtime.importModule, file);
        this.cache.set(name, mod);
        return mod;
      } catch (error) {
        this.runtime.logger.error(
          `Error loading ${root.name}.${name}. Make sure all dependencies are installed`,
          { file, error: getErrorMessage(error) },
        );
      }
    }

    return undefined;
  }
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

/**
 * Minimal manifest for a module without manifest.json, built from its
 * `REQUIREMENTS` and `DEPENDENCIES` exports.
 *
 * @throws ManifestSchemaError when `domain` is not a valid domain
 */
export function manifestFromLegacyModule(
  domain: string,
  module: ModuleNamespace,
): IntegrationManifest {
  return validateManifest({
    domain,
    name: domain,
    documentation: "",
    requirements: stringList(module.REQUIREMENTS) ?? [],
    dependencies: stringList(module.DEPENDENCIES) ?? [],
    codeowners: [],
  });
}
