/**
 * Project configuration loading.
 *
 * Sources, lowest precedence first: schema defaults, a JSON config file,
 * a dotenv file, the process environment. The configuration is read once,
 * when the pipeline is built.
 *
 * Env: STRATA_CONFIG_PATH, STRATA_DEBUG, STRATA_LIVE_RELOAD, STRATA_SESSION_COOKIE.
 */

import { existsSync, readFileSync } from "node:fs";
import { parse as parseDotenv } from "dotenv";
import { ProjectConfigSchema, defaultProjectConfig, type ProjectConfig } from "@strata/core";
import type { Logger } from "./logger.js";

const LOG_PREFIX = "strata-common:config";

export interface LoadConfigParams {
  /** JSON config file; falls back to STRATA_CONFIG_PATH */
  configPath?: string;
  /** dotenv file; variables already in `env` take precedence over it */
  envFile?: string;
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
  log?: Logger;
}

/**
 * Parses a boolean environment value. Returns undefined for values that are
 * not recognisably boolean, so they leave the configured value alone.
 */
export function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const v = value.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return undefined;
}

function readEnvFile(path: string, log: Logger): Record<string, string> {
  if (!existsSync(path)) {
    log.warn?.({ envFile: path }, `${LOG_PREFIX}:loadConfig - Env file not found`);
    return {};
  }
  return parseDotenv(readFileSync(path));
}

function readConfigFile(path: string, log: Logger): unknown {
  if (!existsSync(path)) {
    log.warn?.({ configPath: path }, `${LOG_PREFIX}:loadConfig - Config file not found`);
    return {};
  }
  try {
    const data: unknown = JSON.parse(readFileSync(path, "utf-8"));
    log.info?.({ configPath: path }, `${LOG_PREFIX}:loadConfig - Loaded config from file`);
    return data;
  } catch (err) {
    log.error?.(
      { configPath: path, error: err instanceof Error ? err.message : String(err) },
      `${LOG_PREFIX}:loadConfig - Failed to load config file`
    );
    return {};
  }
}

/**
 * Load config from an optional JSON file and the environment. Missing or
 * malformed input is logged and replaced by defaults; this never throws.
 */
export function loadConfig(params: LoadConfigParams = {}): ProjectConfig {
  const log: Logger = params.log ?? console;
  const processEnv = params.env ?? process.env;
  const env: Record<string, string | undefined> = params.envFile
    ? { ...readEnvFile(params.envFile, log), ...processEnv }
    : { ...processEnv };

  const configPath = params.configPath ?? env.STRATA_CONFIG_PATH;
  const raw = configPath ? readConfigFile(configPath, log) : {};

  const parsed = ProjectConfigSchema.safeParse(raw);
  let config: ProjectConfig;
  if (parsed.success) {
    config = parsed.data;
  } else {
    log.warn?.({ configPath }, `${LOG_PREFIX}:loadConfig - Config is not an object, using defaults`);
    config = defaultProjectConfig();
  }

  const debug = parseBooleanEnv(env.STRATA_DEBUG);
  if (debug !== undefined) config.debug = debug;

  const liveReload = parseBooleanEnv(env.STRATA_LIVE_RELOAD);
  if (liveReload !== undefined) {
    config.middlewares.liveReload.enabled = liveReload;
  } else if (env.STRATA_LIVE_RELOAD !== undefined) {
    log.warn?.(
      { value: env.STRATA_LIVE_RELOAD },
      `${LOG_PREFIX}:loadConfig - Ignoring malformed STRATA_LIVE_RELOAD`
    );
  }

  const cookieName = env.STRATA_SESSION_COOKIE?.trim();
  if (cookieName) config.middlewares.session.cookieName = cookieName;

  return config;
}
