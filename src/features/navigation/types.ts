import type {
  BrowserImage,
  DirectoryEntry,
  ParsedDocument,
  ParsedStylesheet,
} from '../pages/types';

export type Awaitable<T> = T | Promise<T>;

export type RequestHeaders = Record<string, string>;

export type FetchedAsset = {
  bytes: Uint8Array;
  contentType: string | null;
};

export type DocumentFetcher = (url: string, headers: RequestHeaders) => Promise<ParsedDocument | null>;
export type StylesheetFetcher = (url: string, headers: RequestHeaders) => Promise<ParsedStylesheet | null>;

/**
 * Fetches raw bytes. Unlike the document and stylesheet fetchers, failures
 * are thrown.
 */
export type AssetFetcher = (url: string, headers: RequestHeaders) => Promise<FetchedAsset>;

export type DirectoryExplorer = (path: string) => Awaitable<ReadonlyArray<DirectoryEntry>>;

/**
 * True only when a regular file exists at the path.
 */
export type FileCheck = (path: string) => Awaitable<boolean>;

/**
 * URL-keyed store for favicons.
 */
export interface FaviconCache {
  lookup(url: string): Awaitable<BrowserImage | null>;
  /** Persists the bytes and returns the local storage location. */
  store(url: string, bytes: Uint8Array): Awaitable<string>;
}

export interface CacheMetadataRegistry {
  register(storedName: string, originUrl: string, contentType: string): Awaitable<void>;
}

export interface NavigationServices {
  fetchDocument: DocumentFetcher;
  fetchStylesheet: StylesheetFetcher;
  fetchAsset: AssetFetcher;
  explore: DirectoryExplorer;
  isFile: FileCheck;
  faviconCache: FaviconCache;
  cacheMetadata: CacheMetadataRegistry;
}
