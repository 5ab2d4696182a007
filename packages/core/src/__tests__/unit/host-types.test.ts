import { describe, expect, it, vi } from "vitest";
import { bindHost, createConsoleLogger, type HostContext, isHostBound } from "../../index.js";

const host: HostContext = { configDir: "/config", safeMode: false };

describe("bindHost", () => {
  it("wraps a function in a frozen host-bound descriptor", () => {
    const bound = bindHost((h: HostContext, name: string) => `${h.configDir}/${name}`);

    expect(bound.kind).toBe("host-bound");
    expect(Object.isFrozen(bound)).toBe(true);
    expect(bound.fn(host, "x")).toBe("/config/x");
  });
});

describe("isHostBound", () => {
  it("accepts descriptors created by bindHost", () => {
    expect(isHostBound(bindHost(() => 1))).toBe(true);
  });

  it("rejects plain functions and look-alikes", () => {
    expect(isHostBound(() => 1)).toBe(false);
    expect(isHostBound({ kind: "host-bound" })).toBe(false);
    expect(isHostBound({ kind: "other", fn: () => 1 })).toBe(false);
    expect(isHostBound(null)).toBe(false);
  });
});

describe("createConsoleLogger", () => {
  it("prefixes messages with the tag", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    const log = createConsoleLogger("loader");
    log.warn("careful");
    log.info("loaded", { domain: "hue" });

    expect(warn).toHaveBeenCalledWith("[loader] careful");
    expect(info).toHaveBeenCalledWith("[loader] loaded", { domain: "hue" });

    warn.mockRestore();
    info.mockRestore();
  });
});
