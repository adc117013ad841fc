import { fileURLToPath } from 'url';

export type ResourceClass = 'document' | 'local';

const ABSOLUTE_URL_PATTERN = /^[a-zA-Z][a-zA-Z\d+\-.]*:/;

function tryParseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

/**
 * Single scheme predicate shared by navigation and refresh.
 */
export function classifyUrl(url: string): ResourceClass {
  const parsed = tryParseUrl(url.trim());
  if (parsed && (parsed.protocol === 'http:' || parsed.protocol === 'https:')) {
    return 'document';
  }
  return 'local';
}

export function toLocalPath(url: string): string {
  const trimmed = url.trim();
  const parsed = tryParseUrl(trimmed);
  if (parsed?.protocol === 'file:') {
    try {
      return fileURLToPath(parsed);
    } catch {
      return trimmed;
    }
  }
  return trimmed;
}

/**
 * Resolves an `href` found in a document against the document's URL.
 *
 * Absolute URLs are kept. Both `/path` and `path` are rooted at the document's
 * origin, so a relative reference replaces the document URL's whole path.
 */
export function resolveLinkedResourceUrl(documentUrl: string, href: string | null): string | null {
  const trimmed = href?.trim();
  if (!trimmed) return null;

  if (ABSOLUTE_URL_PATTERN.test(trimmed)) {
    return tryParseUrl(trimmed)?.toString() ?? null;
  }

  const base = tryParseUrl(documentUrl);
  if (!base) return null;

  const rooted = trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
  try {
    return new URL(rooted, base.origin).toString();
  } catch {
    return null;
  }
}
