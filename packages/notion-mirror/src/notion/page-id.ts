/**
 * Notion page id parsing.
 */

import { ConfigurationError } from '../mirror/errors.js';

const HEX_ID = /^[0-9a-f]{32}$/i;
const UUID_ID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
// Page URLs end in "<slug>-<32 hex>" or just "<32 hex>", optionally with a query
const URL_ID = /([0-9a-f]{32})(?:[?#].*)?$/i;

/**
 * Normalize a page id given with or without hyphens, or a page URL, to the
 * lowercase hyphenated form. Throws ConfigurationError for anything else.
 */
export function normalizePageId(input: string): string {
  const trimmed = input.trim();

  let hex: string | undefined;
  if (HEX_ID.test(trimmed)) {
    hex = trimmed;
  } else if (UUID_ID.test(trimmed)) {
    hex = trimmed.replace(/-/g, '');
  } else if (/^https?:\/\//i.test(trimmed)) {
    hex = URL_ID.exec(trimmed)?.[1];
  }

  if (hex === undefined) {
    throw new ConfigurationError(
      `Invalid Notion page id "${input}": expected 32 hex digits, with or without hyphens`
    );
  }

  const h = hex.toLowerCase();
  return `${h.slice(0, 8)}-${h.slice(8, 12)}-${h.slice(12, 16)}-${h.slice(16, 20)}-${h.slice(20)}`;
}
