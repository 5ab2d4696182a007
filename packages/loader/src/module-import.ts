import { join } from "node:path";
import { ENTRY_MODULE_NAMES, MODULE_EXTENSIONS } from "./constants.js";
import type { IntegrationFileSystem, ModuleImporter, ModuleNamespace } from "./types.js";

function isModuleNamespace(value: unknown): value is ModuleNamespace {
  return value !== null && typeof value === "object";
}

/**
 * Candidate files for a dotted module name under `baseDir`:
 * `a.b` → `a/b.mjs`, `a/b.js`, `a/b/index.mjs`, `a/b/index.js`.
 */
export function moduleCandidates(baseDir: string, name: string): string[] {
  const modulePath = join(baseDir, ...name.split("."));
  return [
    ...MODULE_EXTENSIONS.map((ext) => `${modulePath}${ext}`),
    ...ENTRY_MODULE_NAMES.map((entry) => join(modulePath, entry)),
  ];
}

/** First candidate that exists as a file. */
export async function findModuleFile(
  fileSystem: IntegrationFileSystem,
  candidates: readonly string[],
): Promise<string | undefined> {
  for (const candidate of candidates) {
    if (await fileSystem.isFile(candidate)) return candidate;
  }
  return undefined;
}

/** Import a module file and check it evaluated to a namespace object. */
export async function importModuleFile(
  importModule: ModuleImporter,
  filePath: string,
): Promise<ModuleNamespace> {
  const mod = await importModule(filePath);
  if (!isModuleNamespace(mod)) {
    throw new TypeError(`${filePath} did not evaluate to a module namespace`);
  }
  return mod;
}
