/**
 * Unit tests for configuration loading.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { loadConfig, parseBooleanEnv } from "./config.js";

// ── Mocks ──────────────────────────────────────────────────────────

function silentLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "strata-config-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeFile(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

describe("parseBooleanEnv", () => {
  it("should recognise boolean spellings", () => {
    expect(parseBooleanEnv("1")).toBe(true);
    expect(parseBooleanEnv(" TRUE ")).toBe(true);
    expect(parseBooleanEnv("on")).toBe(true);
    expect(parseBooleanEnv("no")).toBe(false);
    expect(parseBooleanEnv("0")).toBe(false);
  });

  it("should return undefined for anything else", () => {
    expect(parseBooleanEnv(undefined)).toBeUndefined();
    expect(parseBooleanEnv("")).toBeUndefined();
    expect(parseBooleanEnv("maybe")).toBeUndefined();
  });
});

describe("loadConfig", () => {
  it("should return defaults without any source", () => {
    const log = silentLogger();
    const config = loadConfig({ env: {}, log });

    expect(config.debug).toBe(false);
    expect(config.middlewares.liveReload.enabled).toBe(false);
    expect(config.middlewares.session.cookieName).toBe("id");
    expect(log.warn).not.toHaveBeenCalled();
  });

  it("should read the JSON config file", () => {
    const configPath = writeFile(
      "strata.json",
      JSON.stringify({ middlewares: { liveReload: { enabled: true }, session: { cookieName: "sid" } } })
    );
    const log = silentLogger();

    const config = loadConfig({ configPath, env: {}, log });

    expect(config.middlewares.liveReload.enabled).toBe(true);
    expect(config.middlewares.session.cookieName).toBe("sid");
    expect(log.info).toHaveBeenCalledWith({ configPath }, "strata-common:config:loadConfig - Loaded config from file");
  });

  it("should take the config path from STRATA_CONFIG_PATH", () => {
    const configPath = writeFile("strata.json", JSON.stringify({ debug: true }));
    const config = loadConfig({ env: { STRATA_CONFIG_PATH: configPath }, log: silentLogger() });
    expect(config.debug).toBe(true);
  });

  it("should warn and use defaults when the config file is missing", () => {
    const log = silentLogger();
    const configPath = join(dir, "missing.json");

    const config = loadConfig({ configPath, env: {}, log });

    expect(config.middlewares.liveReload.enabled).toBe(false);
    expect(log.warn).toHaveBeenCalledWith({ configPath }, "strata-common:config:loadConfig - Config file not found");
  });

  it("should log and use defaults when the config file is not JSON", () => {
    const log = silentLogger();
    const configPath = writeFile("broken.json", "{ not json");

    const config = loadConfig({ configPath, env: {}, log });

    expect(config.middlewares.liveReload.enabled).toBe(false);
    expect(log.error).toHaveBeenCalledTimes(1);
  });

  it("should use defaults when the config is not an object", () => {
    const log = silentLogger();
    const configPath = writeFile("array.json", "[1, 2]");

    const config = loadConfig({ configPath, env: {}, log });

    expect(config.middlewares.session.cookieName).toBe("id");
    expect(log.warn).toHaveBeenCalledWith(
      { configPath },
      "strata-common:config:loadConfig - Config is not an object, using defaults"
    );
  });

  it("should apply environment overrides over the file", () => {
    const configPath = writeFile("strata.json", JSON.stringify({ middlewares: { liveReload: { enabled: true } } }));

    const config = loadConfig({
      configPath,
      env: { STRATA_LIVE_RELOAD: "off", STRATA_DEBUG: "yes", STRATA_SESSION_COOKIE: " sid " },
      log: silentLogger(),
    });

    expect(config.middlewares.liveReload.enabled).toBe(false);
    expect(config.debug).toBe(true);
    expect(config.middlewares.session.cookieName).toBe("sid");
  });

  it("should not carry overrides over to a later load", () => {
    const first = loadConfig({
      env: { STRATA_LIVE_RELOAD: "true", STRATA_SESSION_COOKIE: "sid" },
      log: silentLogger(),
    });
    const second = loadConfig({ env: {}, log: silentLogger() });

    expect(first.middlewares.liveReload.enabled).toBe(true);
    expect(second.middlewares).toEqual({
      liveReload: { enabled: false },
      session: { cookieName: "id", ttlSeconds: undefined, secure: true },
    });
  });

  it("should ignore a malformed live-reload override", () => {
    const log = silentLogger();
    const config = loadConfig({ env: { STRATA_LIVE_RELOAD: "sometimes" }, log });

    expect(config.middlewares.liveReload.enabled).toBe(false);
    expect(log.warn).toHaveBeenCalledWith(
      { value: "sometimes" },
      "strata-common:config:loadConfig - Ignoring malformed STRATA_LIVE_RELOAD"
    );
  });

  it("should read a dotenv file with the environment taking precedence", () => {
    const envFile = writeFile(".env", "STRATA_LIVE_RELOAD=true\nSTRATA_SESSION_COOKIE=from-file\n");

    const config = loadConfig({
      envFile,
      env: { STRATA_SESSION_COOKIE: "from-env" },
      log: silentLogger(),
    });

    expect(config.middlewares.liveReload.enabled).toBe(true);
    expect(config.middlewares.session.cookieName).toBe("from-env");
  });

  it("should warn about a missing dotenv file", () => {
    const log = silentLogger();
    const envFile = join(dir, ".env.missing");

    loadConfig({ envFile, env: {}, log });

    expect(log.warn).toHaveBeenCalledWith({ envFile }, "strata-common:config:loadConfig - Env file not found");
  });
});
