import path from 'path';
import { lookup as lookupMimeType } from 'mime-types';
import { describeError, logDebug, logError } from '../../lib/logger';
import { createDirectoryPage, createDocumentPage, createMediaPage } from '../pages/pages';
import type { BrowserImage, DocumentPage, Page, ParsedDocument, ParsedStylesheet } from '../pages/types';
import { classifyUrl, resolveLinkedResourceUrl, toLocalPath } from './urls';
import type { NavigationServices, RequestHeaders } from './types';

const STYLESHEET_SELECTOR = 'link[rel="stylesheet"]';
const FAVICON_SELECTOR = 'link[rel="icon"]';
const FALLBACK_MIME_TYPE = 'application/octet-stream';

function errorPageFor(placeholder: Page): Page {
  switch (placeholder.kind) {
    case 'document':
      return createDocumentPage({ id: placeholder.id, sourceUrl: placeholder.sourceUrl, status: 'error' });
    case 'directory':
      return createDirectoryPage({ id: placeholder.id, sourceUrl: placeholder.sourceUrl, status: 'error' });
    case 'media':
      return createMediaPage({
        id: placeholder.id,
        sourceUrl: placeholder.sourceUrl,
        status: 'error',
        path: placeholder.path,
        isLocalMedia: false,
      });
  }
}

function findLinkedUrl(document: ParsedDocument, selector: string, documentUrl: string): string | null {
  const href = document.querySelector(selector)?.getAttribute('href') ?? null;
  return resolveLinkedResourceUrl(documentUrl, href);
}

/**
 * Turns a URL into a page: http(s) URLs load a document with its stylesheet
 * and favicon, anything else is a local path that is either a media file or a
 * directory listing.
 */
export class ResourceResolver {
  private readonly services: NavigationServices;
  private readonly headers: RequestHeaders;
  private readonly pendingFavicons = new Map<string, Promise<BrowserImage | null>>();

  constructor(services: NavigationServices, headers: RequestHeaders) {
    this.services = services;
    this.headers = { ...headers };
  }

  createPlaceholder(url: string): Page {
    if (classifyUrl(url) === 'document') {
      return createDocumentPage({ sourceUrl: url, status: 'loading' });
    }
    return createDirectoryPage({ sourceUrl: url, status: 'loading' });
  }

  /**
   * Settles a placeholder. Never rejects: every failure is reported through
   * the returned page's status, and the page keeps the placeholder's id.
   */
  async load(placeholder: Page): Promise<Page> {
    const url = placeholder.sourceUrl;
    try {
      if (classifyUrl(url) === 'document') {
        return await this.loadDocument(placeholder.id, url);
      }
      return await this.loadLocal(placeholder.id, url);
    } catch (error) {
      logError('navigation', 'page pipeline failed', { url, error: describeError(error) });
      return errorPageFor(placeholder);
    }
  }

  async resolve(url: string): Promise<Page> {
    return this.load(this.createPlaceholder(url));
  }

  private async loadDocument(id: string, url: string): Promise<DocumentPage> {
    const document = await this.services.fetchDocument(url, this.headers);
    if (!document) {
      return createDocumentPage({ id, sourceUrl: url, status: 'error' });
    }

    const [cssom, favicon] = await Promise.all([
      this.loadStylesheet(document, url),
      this.loadFavicon(document, url),
    ]);

    return createDocumentPage({ id, sourceUrl: url, status: 'success', document, cssom, favicon });
  }

  private async loadStylesheet(document: ParsedDocument, documentUrl: string): Promise<ParsedStylesheet | null> {
    try {
      const stylesheetUrl = findLinkedUrl(document, STYLESHEET_SELECTOR, documentUrl);
      if (!stylesheetUrl) return null;
      return await this.services.fetchStylesheet(stylesheetUrl, this.headers);
    } catch (error) {
      logDebug('navigation', 'stylesheet stage failed', { url: documentUrl, error: describeError(error) });
      return null;
    }
  }

  private findFaviconUrl(document: ParsedDocument, documentUrl: string): string | null {
    try {
      return findLinkedUrl(document, FAVICON_SELECTOR, documentUrl);
    } catch (error) {
      logDebug('navigation', 'favicon link lookup failed', { url: documentUrl, error: describeError(error) });
      return null;
    }
  }

  private loadFavicon(document: ParsedDocument, documentUrl: string): Promise<BrowserImage | null> {
    const iconUrl = this.findFaviconUrl(document, documentUrl);
    if (!iconUrl) return Promise.resolve(null);

    // Tabs loading the same icon share one lookup/store.
    const pending = this.pendingFavicons.get(iconUrl);
    if (pending) return pending;

    const task = this.lookupOrCacheFavicon(iconUrl).finally(() => {
      this.pendingFavicons.delete(iconUrl);
    });
    this.pendingFavicons.set(iconUrl, task);
    return task;
  }

  private async lookupOrCacheFavicon(iconUrl: string): Promise<BrowserImage | null> {
    try {
      const cached = await this.services.faviconCache.lookup(iconUrl);
      if (cached) return cached;

      const asset = await this.services.fetchAsset(iconUrl, this.headers);
      const location = await this.services.faviconCache.store(iconUrl, asset.bytes);
      const mimetype = lookupMimeType(location) || asset.contentType || FALLBACK_MIME_TYPE;

      await this.services.cacheMetadata.register(path.basename(location), iconUrl, asset.contentType ?? mimetype);
      logDebug('navigation', 'favicon cached', { url: iconUrl, location });

      return { path: location, mimetype };
    } catch (error) {
      logDebug('navigation', 'favicon stage failed', { url: iconUrl, error: describeError(error) });
      return null;
    }
  }

  private async loadLocal(id: string, url: string): Promise<Page> {
    const localPath = toLocalPath(url);

    if (await this.isFile(localPath)) {
      return createMediaPage({ id, sourceUrl: url, status: 'success', path: localPath, isLocalMedia: true });
    }

    try {
      const entries = await this.services.explore(localPath);
      return createDirectoryPage({ id, sourceUrl: url, status: 'success', entries });
    } catch (error) {
      logDebug('navigation', 'directory exploration failed', { path: localPath, error: describeError(error) });
      return createDirectoryPage({ id, sourceUrl: url, status: 'error' });
    }
  }

  private async isFile(localPath: string): Promise<boolean> {
    try {
      return await this.services.isFile(localPath);
    } catch (error) {
      logDebug('navigation', 'file check failed', { path: localPath, error: describeError(error) });
      return false;
    }
  }
}
