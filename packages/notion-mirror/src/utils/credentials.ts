/**
 * Notion integration token lookup.
 *
 * Resolution order:
 * 1. NOTION_TOKEN environment variable
 * 2. "token" field of ~/.notion-mirror/config.json
 *
 * The token is resolved once at start-up and handed to the document service;
 * nothing below the CLI reads it from the environment.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigurationError, describeError } from '../mirror/errors.js';

/** Shape of ~/.notion-mirror/config.json */
export interface MirrorConfigFile {
  /** Notion internal integration token */
  token?: string;
}

/**
 * Override for the config directory base path.
 * Set via NOTION_MIRROR_CONFIG_HOME env var or _setConfigHome (for testing).
 * When null, defaults to os.homedir().
 */
let configHomeOverride: string | null = null;

/**
 * Set the base directory for config files. Intended for testing only.
 */
export function _setConfigHome(dir: string | null): void {
  configHomeOverride = dir;
}

function getConfigDir(): string {
  const base = configHomeOverride
    ?? process.env['NOTION_MIRROR_CONFIG_HOME']
    ?? os.homedir();
  return path.join(base, '.notion-mirror');
}

/**
 * Get the config file path (for display/debugging).
 */
export function getConfigFilePath(): string {
  return path.join(getConfigDir(), 'config.json');
}

/**
 * Read the config file. Returns null when it does not exist.
 * Throws ConfigurationError when it exists but is not a JSON object.
 */
export function readConfigFile(): MirrorConfigFile | null {
  const configPath = getConfigFilePath();
  if (!fs.existsSync(configPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${configPath}: ${describeError(err)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`${configPath} must contain a JSON object`);
  }

  const token: unknown = Reflect.get(parsed, 'token');
  return typeof token === 'string' ? { token } : {};
}

/**
 * Resolve the Notion integration token.
 * Throws ConfigurationError when none is configured.
 */
export function resolveNotionToken(): string {
  const fromEnv = process.env['NOTION_TOKEN']?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  const fromFile = readConfigFile()?.token?.trim();
  if (fromFile) {
    return fromFile;
  }

  throw new ConfigurationError(
    `Missing Notion integration token. Set NOTION_TOKEN or add "token" to ${getConfigFilePath()}.`
  );
}
