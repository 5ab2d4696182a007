import { join } from "node:path";
import {
  ConfigDirMissingError,
  IntegrationNotFoundError,
  InvalidDomainError,
} from "@hearth/errors";
import { describe, expect, it } from "vitest";
import { Integration } from "../integration.js";
import {
  BUILTIN_ROOT,
  CUSTOM_ROOT,
  createRegistry,
  manifest,
  messages,
} from "./helpers/fixtures.js";
import { MemoryFileSystem } from "./helpers/memory-fs.js";

const builtinManifestPath = (domain: string) => join(BUILTIN_ROOT, domain, "manifest.json");

describe("IntegrationRegistry", () => {
  // -------------------------------------------------------------------------
  // getIntegrations
  // -------------------------------------------------------------------------

  describe("getIntegrations", () => {
    it("should resolve a built-in integration", async () => {
      const fs = new MemoryFileSystem().writeManifest(BUILTIN_ROOT, "light", manifest("light"));
      const { registry } = createRegistry(fs);

      const results = await registry.getIntegrations(["light"]);
      const light = results.get("light");

      expect(light).toBeInstanceOf(Integration);
      if (light instanceof Integration) {
        expect(light.isBuiltIn).toBe(true);
        expect(light.pkgPath).toBe("components.light");
        expect(light.filePath).toBe(join(BUILTIN_ROOT, "light"));
      }
    });

    it("should return the cached instance without touching the filesystem", async () => {
      const fs = new MemoryFileSystem().writeManifest(BUILTIN_ROOT, "light", manifest("light"));
      const { registry } = createRegistry(fs);

      const first = await registry.getIntegration("light");
      const callsAfterFirst = fs.calls.length;
      const second = await registry.getIntegration("light");

      expect(second).toBe(first);
      expect(fs.calls).toHaveLength(callsAfterFirst);
    });

    it("should read the filesystem once for concurrent requests", async () => {
      const fs = new MemoryFileSystem().writeManifest(BUILTIN_ROOT, "light", manifest("light"));
      const { registry } = createRegistry(fs);

      const [a, b, c] = await Promise.all([
        registry.getIntegrations(["light"]),
        registry.getIntegrations(["light", "light"]),
        registry.getIntegration("light"),
      ]);

      expect(a.get("light")).toBe(c);
      expect(b.get("light")).toBe(c);
      expect(fs.callsFor(builtinManifestPath("light"))).toBe(2); // isFile + readText
      expect(fs.calls.filter((call) => call.startsWith("listDirectories"))).toHaveLength(1);
    });

    it("should reject dotted domains without any I/O", async () => {
      const fs = new MemoryFileSystem();
      const { registry } = createRegistry(fs);

      const results = await registry.getIntegrations(["light.hue"]);

      expect(results.get("light.hue")).toBeInstanceOf(InvalidDomainError);
      expect(fs.calls).toEqual([]);
    });

    it("should report unknown domains as not found", async () => {
      const { registry } = createRegistry();

      const result = (await registry.getIntegrations(["nope"])).get("nope");

      expect(result).toBeInstanceOf(IntegrationNotFoundError);
      if (result instanceof IntegrationNotFoundError) {
        expect(result.message).toBe("Integration 'nope' not found.");
        expect(result.cause).toBeUndefined();
      }
    });

    it("should not cache failures", async () => {
      const fs = new MemoryFileSystem();
      const { registry } = createRegistry(fs);

      expect((await registry.getIntegrations(["late"])).get("late")).toBeInstanceOf(
        IntegrationNotFoundError,
      );

      fs.writeManifest(BUILTIN_ROOT, "late", manifest("late"));
      expect((await registry.getIntegrations(["late"])).get("late")).toBeInstanceOf(Integration);
    });

    it("should report not found to waiters when the resolution fails", async () => {
      const { registry } = createRegistry();

      const [first, second] = await Promise.all([
        registry.getIntegrations(["ghost"]),
        registry.getIntegrations(["ghost"]),
      ]);

      expect(first.get("ghost")).toBeInstanceOf(IntegrationNotFoundError);
      expect(second.get("ghost")).toBeInstanceOf(IntegrationNotFoundError);
    });

    it("should resolve mixed batches independently", async () => {
      const fs = new MemoryFileSystem()
        .writeManifest(BUILTIN_ROOT, "light", manifest("light"))
        .write(builtinManifestPath("broken"), "{ not json");
      const { registry, logger } = createRegistry(fs);

      const results = await registry.getIntegrations(["light", "broken", "bad.domain"]);

      expect(results.get("light")).toBeInstanceOf(Integration);
      expect(results.get("broken")).toBeInstanceOf(IntegrationNotFoundError);
      expect(results.get("bad.domain")).toBeInstanceOf(InvalidDomainError);
      expect(messages(logger.error)[0]).toMatch(
        /^Error parsing manifest\.json file at \/hearth\/components\/broken\/manifest\.json: /,
      );
    });

    it("should skip manifests whose domain does not match their directory", async () => {
      const fs = new MemoryFileSystem().writeManifest(BUILTIN_ROOT, "light", manifest("lamp"));
      const { registry, logger } = createRegistry(fs);

      expect((await registry.getIntegrations(["light"])).get("light")).toBeInstanceOf(
        IntegrationNotFoundError,
      );
      expect(messages(logger.error)).toEqual([
        "Manifest at /hearth/components/light/manifest.json declares domain lamp, expected light",
      ]);
    });

    it("should report every domain as not found without a config directory", async () => {
      const fs = new MemoryFileSystem().writeManifest(BUILTIN_ROOT, "light", manifest("light"));
      const { registry, logger } = createRegistry(fs, { configDir: undefined });

      const result = (await registry.getIntegrations(["light"])).get("light");

      expect(result).toBeInstanceOf(IntegrationNotFoundError);
      if (result instanceof IntegrationNotFoundError) {
        expect(result.cause).toBeInstanceOf(ConfigDirMissingError);
      }
      expect(messages(logger.error)).toEqual([
        "Can't load integrations - configuration directory is not set",
      ]);
      expect(fs.calls).toEqual([]);
    });
  });

  // -------------------------------------------------------------------------
  // getIntegration
  // -------------------------------------------------------------------------

  describe("getIntegration", () => {
    it("should throw the lookup error", async () => {
      const { registry } = createRegistry();

      await expect(registry.getIntegration("nope")).rejects.toBeInstanceOf(
        IntegrationNotFoundError,
      );
      await expect(registry.getIntegration("a.b")).rejects.toBeInstanceOf(InvalidDomainError);
    });
  });

  // -------------------------------------------------------------------------
  // Custom integrations
  // -------------------------------------------------------------------------

  describe("custom integrations", () => {
    it("should prefer a custom integration over a built-in one", async () => {
      const fs = new MemoryFileSystem()
        .writeManifest(BUILTIN_ROOT, "light", manifest("light"))
        .writeManifest(CUSTOM_ROOT, "light", manifest("light", { version: "1.0.0" }));
      const { registry, logger } = createRegistry(fs);

      const light = await registry.getIntegration("light");

      expect(light.isBuiltIn).toBe(false);
      expect(light.pkgPath).toBe("custom_components.light");
      expect(fs.callsFor(builtinManifestPath("light"))).toBe(0);
      expect(messages(logger.warn)).toEqual([
        "We found a custom integration light which has not been tested by the host. It may cause stability problems, be aware of this if you experience issues.",
      ]);
    });

    it("should block custom integrations without a version", async () => {
      const fs = new MemoryFileSystem().writeManifest(CUSTOM_ROOT, "acme", manifest("acme"));
      const { registry, logger } = createRegistry(fs);

      const result = (await registry.getIntegrations(["acme"])).get("acme");

      expect(result).toBeInstanceOf(IntegrationNotFoundError);
      expect(messages(logger.error)).toHaveLength(1);
      expect(messages(logger.error)[0]).toMatch(
        /^The custom integration 'acme' does not have a version key in the manifest file and was blocked from loading\. Add a "version" key/,
      );
    });

    it("should block custom integrations with an unparsable version", async () => {
      const fs = new MemoryFileSystem().writeManifest(
        CUSTOM_ROOT,
        "acme",
        manifest("acme", { version: "banana" }),
      );
      const { registry, logger } = createRegistry(fs);

      const custom = await registry.getCustomIntegrations();

      expect(custom.size).toBe(0);
      expect(messages(logger.error)[0]).toMatch(
        /^The custom integration 'acme' does not have a valid version key \(banana\)/,
      );
    });

    it("should enumerate custom integrations once", async () => {
      const fs = new MemoryFileSystem()
        .writeManifest(CUSTOM_ROOT, "acme", manifest("acme", { version: "2024.1.0" }))
        .writeManifest(CUSTOM_ROOT, "zeta", manifest("zeta", { version: "3" }));
      const { registry } = createRegistry(fs);

      const [a, b] = await Promise.all([
        registry.getCustomIntegrations(),
        registry.getCustomIntegrations(),
      ]);

      expect(a).toBe(b);
      expect([...a.keys()].sort()).toEqual(["acme", "zeta"]);
      expect(fs.callsFor(CUSTOM_ROOT)).toBe(1);
    });

    it("should ignore custom integrations in safe mode", async () => {
      const fs = new MemoryFileSystem()
        .writeManifest(BUILTIN_ROOT, "light", manifest("light"))
        .writeManifest(CUSTOM_ROOT, "light", manifest("light", { version: "1.0.0" }));
      const { registry } = createRegistry(fs, { safeMode: true });

      const light = await registry.getIntegration("light");

      expect(light.isBuiltIn).toBe(true);
      expect(fs.callsFor(CUSTOM_ROOT)).toBe(0);
      expect((await registry.getCustomIntegrations()).size).toBe(0);
    });

    it("should fall back to built-ins when the custom root cannot be listed", async () => {
      const fs = new MemoryFileSystem().writeManifest(BUILTIN_ROOT, "light", manifest("light"));
      fs.brokenDirs.add(CUSTOM_ROOT);
      const { registry, logger } = createRegistry(fs);

      const light = await registry.getIntegration("light");

      expect(light.isBuiltIn).toBe(true);
      expect(messages(logger.error)).toEqual([
        "Unable to list custom integrations in /config/custom_components",
      ]);
    });

    it("should honour a custom directory name", async () => {
      const fs = new MemoryFileSystem().writeManifest(
        "/config/addons",
        "acme",
        manifest("acme", { version: "1.0" }),
      );
      const { registry } = createRegistry(fs, { customDirName: "addons" });

      const acme = await registry.getIntegration("acme");

      expect(acme.pkgPath).toBe("addons.acme");
    });
  });

  // -------------------------------------------------------------------------
  // Concurrency
  // -------------------------------------------------------------------------

  describe("concurrency", () => {
    class SlowFileSystem extends MemoryFileSystem {
      inFlight = 0;
      maxInFlight = 0;

      override async isFile(path: string): Promise<boolean> {
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        this.inFlight--;
        return super.isFile(path);
      }
    }

    it("should bound concurrent root lookups", async () => {
      const fs = new SlowFileSystem();
      const domains = Array.from({ length: 10 }, (_, i) => `domain_${i}`);
      for (const domain of domains) fs.writeManifest(BUILTIN_ROOT, domain, manifest(domain));
      const { registry } = createRegistry(fs, { maxConcurrentLoads: 3 });

      const results = await registry.getIntegrations(domains);

      expect([...results.values()].every((r) => r instanceof Integration)).toBe(true);
      expect(fs.maxInFlight).toBe(3);
    });
  });
});
