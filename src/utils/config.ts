/**
 * Configuration loading
 *
 * Defaults, then `.pokemon-meetup/config.json`, then environment variables.
 *
 * @module
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigurationError, ErrorCode } from "../core/errors.js";
import { getConfigPath, getDatabasePath, getProjectRoot, readJson } from "./index.js";
import { AppConfigFileSchema, AppConfigSchema, formatZodError, type AppConfig } from "./validation.js";

export const ENV_DATABASE_PATH = "POKEMON_MEETUP_DB";
export const ENV_API_URL = "POKEMON_MEETUP_API_URL";
export const ENV_TIMEOUT_MS = "POKEMON_MEETUP_TIMEOUT_MS";
export const ENV_TEMPLATES_DIR = "POKEMON_MEETUP_TEMPLATES";

/**
 * Templates ship at the package root, two levels above this module in
 * both src/ and dist/.
 */
export function getBundledTemplatesDir(): string {
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "templates");
}

export interface LoadConfigOptions {
  projectRoot?: string;
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = readJson(configPath);
  } catch (error) {
    throw new ConfigurationError(`Could not read ${configPath}`, ErrorCode.CONFIG_READ_FAILED, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  if (raw === null) {
    return {};
  }

  const parsed = AppConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration in ${configPath}`, ErrorCode.CONFIG_INVALID, {
      issues: formatZodError(parsed.error),
    });
  }
  return parsed.data;
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  if (env[ENV_DATABASE_PATH]) values.databasePath = env[ENV_DATABASE_PATH];
  if (env[ENV_API_URL]) values.apiBaseUrl = env[ENV_API_URL];
  if (env[ENV_TIMEOUT_MS]) values.requestTimeoutMs = env[ENV_TIMEOUT_MS];
  if (env[ENV_TEMPLATES_DIR]) values.templatesDir = env[ENV_TEMPLATES_DIR];
  return values;
}

/**
 * Resolve the application configuration.
 *
 * @throws {ConfigurationError} when the merged values fail validation
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const projectRoot = options.projectRoot ?? getProjectRoot();
  const env = options.env ?? process.env;

  const merged: Record<string, unknown> = {
    databasePath: getDatabasePath(projectRoot),
    templatesDir: getBundledTemplatesDir(),
    ...readConfigFile(getConfigPath(projectRoot)),
    ...readEnv(env),
  };

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError("Invalid configuration", ErrorCode.CONFIG_INVALID, {
      issues: formatZodError(parsed.error),
    });
  }
  return parsed.data;
}
