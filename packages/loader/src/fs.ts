import { readdir, readFile, stat } from "node:fs/promises";
import type { IntegrationFileSystem } from "./types.js";

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * `IntegrationFileSystem` backed by `node:fs/promises`.
 */
export const nodeFileSystem: IntegrationFileSystem = {
  async listDirectories(dir) {
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries
        .filter((e) => e.isDirectory() && !e.name.startsWith("."))
        .map((e) => e.name)
        .sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  },

  async isFile(path) {
    try {
      return (await stat(path)).isFile();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  },

  async readText(path) {
    return readFile(path, "utf-8");
  },
};
