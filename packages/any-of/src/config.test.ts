/**
 * Configuration Tests
 */
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { config, defineConfig, isLogLevel } from "./config.js";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "any-of-config-"));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    config.reset();
    rmSync(dir, { recursive: true, force: true });
  });

  function writeRc(contents: string): void {
    writeFileSync(join(dir, ".anyofrc.json"), contents);
  }

  it("uses the defaults when nothing is configured", () => {
    expect(config.loadFrom(dir)).toEqual({
      debug: false,
      log: { level: "warn" },
      errors: { showValue: false },
    });
    expect(config.getConfigFilePath()).toBeUndefined();
  });

  it("loads a config file", () => {
    writeRc(JSON.stringify({ log: { level: "debug" } }));
    expect(config.loadFrom(dir).log.level).toBe("debug");
    expect(config.getConfigFilePath()).toBe(join(dir, ".anyofrc.json"));
  });

  it("reads the anyof key of package.json", () => {
    writeFileSync(
      join(dir, "package.json"),
      JSON.stringify({ name: "fixture", anyof: { errors: { showValue: true } } })
    );
    expect(config.loadFrom(dir).errors.showValue).toBe(true);
  });

  it("reads the default export of a module config file", () => {
    writeFileSync(
      join(dir, "anyof.config.cjs"),
      "module.exports = { __esModule: true, default: { errors: { showValue: true } } };\n"
    );
    expect(config.loadFrom(dir).errors.showValue).toBe(true);
    expect(config.getConfigFilePath()).toBe(join(dir, "anyof.config.cjs"));
  });

  it("lets environment variables override the file", () => {
    writeRc(JSON.stringify({ debug: false, log: { level: "error" } }));
    vi.stubEnv("ANY_OF_DEBUG", "true");
    vi.stubEnv("ANY_OF_LOG_LEVEL", "info");
    const resolved = config.loadFrom(dir);
    expect(resolved.debug).toBe(true);
    expect(resolved.log.level).toBe("info");
  });

  it("parses 0 / empty environment values as false", () => {
    vi.stubEnv("ANY_OF_ERRORS_SHOW_VALUE", "0");
    expect(config.loadFrom(dir).errors.showValue).toBe(false);
    vi.stubEnv("ANY_OF_ERRORS_SHOW_VALUE", "1");
    expect(config.loadFrom(dir).errors.showValue).toBe(true);
  });

  it("falls back to the default for values of the wrong type", () => {
    writeRc(JSON.stringify({ debug: "yes", log: { level: "loud" } }));
    const resolved = config.loadFrom(dir);
    expect(resolved.debug).toBe(false);
    expect(resolved.log.level).toBe("warn");
  });

  it("set merges over the loaded values", () => {
    writeRc(JSON.stringify({ errors: { showValue: true } }));
    config.loadFrom(dir);
    config.set({ log: { level: "info" } });
    expect(config.get("log.level")).toBe("info");
    expect(config.get("errors.showValue")).toBe(true);
    expect(config.get("log.missing")).toBeUndefined();
  });

  it("reports an unreadable file through the logger", () => {
    writeRc("{ not json");
    vi.stubEnv("ANY_OF_DEBUG", "1");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    expect(config.loadFrom(dir).debug).toBe(true);
    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0][0]).toBe("[any-of] Failed to load config file:");
  });

  it("defineConfig returns its argument", () => {
    const value = { log: { level: "error" as const } };
    expect(defineConfig(value)).toBe(value);
  });

  it("isLogLevel", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
