import { describeError, logDebug } from '../../lib/logger';
import type { ParsedDocument, ParsedStylesheet } from '../pages/types';
import { isResourceLoadError, ResourceLoadError } from './errors';
import { parseHtmlDocument, parseStylesheet } from './parsers';
import type {
  AssetFetcher,
  DocumentFetcher,
  FetchedAsset,
  RequestHeaders,
  StylesheetFetcher,
} from './types';

async function fetchWithTimeout<T>(
  url: string,
  headers: RequestHeaders,
  timeoutMs: number,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { headers, signal: controller.signal });
    if (!response.ok) {
      const kind = response.status === 404 || response.status === 410 ? 'not-found' : 'transport';
      throw new ResourceLoadError(kind, url, `HTTP ${response.status} while fetching ${url}`);
    }
    return await read(response);
  } catch (error) {
    if (isResourceLoadError(error)) throw error;
    throw new ResourceLoadError('transport', url, `Failed to fetch ${url}: ${describeError(error)}`, {
      cause: error,
    });
  } finally {
    clearTimeout(timeoutId);
  }
}

export function fetchTextWithTimeout(url: string, headers: RequestHeaders, timeoutMs: number): Promise<string> {
  return fetchWithTimeout(url, headers, timeoutMs, (response) => response.text());
}

export function fetchAssetWithTimeout(
  url: string,
  headers: RequestHeaders,
  timeoutMs: number,
): Promise<FetchedAsset> {
  return fetchWithTimeout(url, headers, timeoutMs, async (response) => ({
    bytes: new Uint8Array(await response.arrayBuffer()),
    contentType: response.headers.get('content-type'),
  }));
}

type FetcherOptions<T> = {
  timeoutMs: number;
  parse: (source: string) => T | null;
};

function createParsingFetcher<T>(resource: string, options: FetcherOptions<T>) {
  return async (url: string, headers: RequestHeaders): Promise<T | null> => {
    try {
      const source = await fetchTextWithTimeout(url, headers, options.timeoutMs);
      const parsed = options.parse(source);
      if (parsed === null) {
        throw new ResourceLoadError('parse', url, `Could not parse ${resource} at ${url}`);
      }
      return parsed;
    } catch (error) {
      logDebug('navigation', `${resource} fetch failed`, { url, error: describeError(error) });
      return null;
    }
  };
}

export function createDocumentFetcher(
  options: Pick<FetcherOptions<ParsedDocument>, 'timeoutMs'> & Partial<FetcherOptions<ParsedDocument>>,
): DocumentFetcher {
  return createParsingFetcher('document', { parse: parseHtmlDocument, ...options });
}

export function createStylesheetFetcher(
  options: Pick<FetcherOptions<ParsedStylesheet>, 'timeoutMs'> & Partial<FetcherOptions<ParsedStylesheet>>,
): StylesheetFetcher {
  return createParsingFetcher('stylesheet', { parse: parseStylesheet, ...options });
}

export function createAssetFetcher(options: { timeoutMs: number }): AssetFetcher {
  return (url, headers) => fetchAssetWithTimeout(url, headers, options.timeoutMs);
}
