/**
 * Mirror configuration builder.
 *
 * Reads from environment variables with defaults. All values can be
 * overridden programmatically (the CLI passes its flags as overrides).
 */

import { DEFAULT_MIRROR_CONFIG } from './types.js';
import type { MirrorConfig, RemoteErrorPolicy } from './types.js';
import type { ChunkSplitMode } from './chunker.js';

const ERROR_POLICIES: readonly RemoteErrorPolicy[] = ['abort', 'skip'];
const SPLIT_MODES: readonly ChunkSplitMode[] = ['length', 'whitespace'];

function getEnvNumber(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function getEnvBoolean(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined) return fallback;
  return raw === 'true' || raw === '1';
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], fallback: T): T {
  const raw = process.env[key];
  return choices.find((c) => c === raw) ?? fallback;
}

/**
 * Build mirror config from environment variables and optional overrides.
 *
 * Environment variables:
 * - NOTION_MIRROR_ON_ERROR: 'abort' or 'skip' (default: abort)
 * - NOTION_MIRROR_INCLUDE_HIDDEN: mirror dot-files (default: false)
 * - NOTION_MIRROR_SPLIT_AT: 'length' or 'whitespace' (default: length)
 * - NOTION_MIRROR_MAX_TEXT_BYTES: text file size cap (default: 5 MB)
 * - NOTION_MIRROR_PLACEHOLDER_URL: base URL for file references
 */
export function buildMirrorConfig(overrides?: Partial<MirrorConfig>): MirrorConfig {
  return {
    onRemoteError:
      overrides?.onRemoteError ??
      getEnvChoice('NOTION_MIRROR_ON_ERROR', ERROR_POLICIES, DEFAULT_MIRROR_CONFIG.onRemoteError),
    includeHidden:
      overrides?.includeHidden ??
      getEnvBoolean('NOTION_MIRROR_INCLUDE_HIDDEN', DEFAULT_MIRROR_CONFIG.includeHidden),
    splitAt:
      overrides?.splitAt ??
      getEnvChoice('NOTION_MIRROR_SPLIT_AT', SPLIT_MODES, DEFAULT_MIRROR_CONFIG.splitAt),
    maxTextFileBytes:
      overrides?.maxTextFileBytes ??
      getEnvNumber('NOTION_MIRROR_MAX_TEXT_BYTES', DEFAULT_MIRROR_CONFIG.maxTextFileBytes),
    placeholderBaseUrl:
      overrides?.placeholderBaseUrl ??
      process.env['NOTION_MIRROR_PLACEHOLDER_URL'] ??
      DEFAULT_MIRROR_CONFIG.placeholderBaseUrl,
  };
}

/**
 * Validate a mirror configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateMirrorConfig(config: MirrorConfig): string[] {
  const errors: string[] = [];

  if (!ERROR_POLICIES.includes(config.onRemoteError)) {
    errors.push(`onRemoteError must be one of: ${ERROR_POLICIES.join(', ')}`);
  }

  if (!SPLIT_MODES.includes(config.splitAt)) {
    errors.push(`splitAt must be one of: ${SPLIT_MODES.join(', ')}`);
  }

  if (config.maxTextFileBytes < 0) {
    errors.push('maxTextFileBytes must not be negative');
  }

  try {
    const url = new URL(config.placeholderBaseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      errors.push('placeholderBaseUrl must be an http(s) URL');
    }
  } catch {
    errors.push(`placeholderBaseUrl is not a valid URL: ${config.placeholderBaseUrl}`);
  }

  return errors;
}
