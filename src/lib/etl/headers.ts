import type { HttpHeaders } from '../events/types';
import type { HeaderRow } from './types';

// Each entry is also a column of the header record; see buildEventTable.
export const ALLOWED_HTTP_HEADERS = [
  'Accept',
  'Accept-Charset',
  'Accept-Language',
  'Access-Control-Allow-Origin',
  'Authorization',
  'Connection',
  'Content-Encoding',
  'Content-Language',
  'Content-Location',
  'Content-Type',
  'Cookie',
  'Date',
  'ETag',
  'Forwarded',
  'Host',
  'Link',
  'Location',
  'Origin',
  'Proxy-Authorization',
  'Referer',
  'Server',
  'Set-Cookie',
  'Upgrade',
  'User-Agent',
  'Via',
  'WWW-Authenticate',
  'X-Forwarded-For',
  'X-Forwarded-Host'
] as const;

const ALLOWED_LOWERCASE: ReadonlySet<string> = new Set(
  ALLOWED_HTTP_HEADERS.map((name) => name.toLowerCase())
);

export function normalizeHeaderName(name: string): string {
  return name.replace(/-/g, '').toLowerCase();
}

export function isAllowedHeader(name: string): boolean {
  return ALLOWED_LOWERCASE.has(name.toLowerCase());
}

export function headerColumns(): string[] {
  return ALLOWED_HTTP_HEADERS.map((name) => normalizeHeaderName(name));
}

/**
 * Folds header maps into one row record keyed by normalized name. Maps are
 * applied in order, so a later name wins on collision.
 */
export function buildHeaderRow(...sources: (HttpHeaders | undefined)[]): HeaderRow {
  const row: HeaderRow = {};

  for (const headers of sources) {
    if (!headers) {
      continue;
    }

    for (const [name, value] of Object.entries(headers)) {
      if (isAllowedHeader(name)) {
        row[normalizeHeaderName(name)] = value;
      }
    }
  }

  return row;
}
