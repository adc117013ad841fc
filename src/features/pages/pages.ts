import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type {
  BrowserImage,
  DirectoryEntry,
  DirectoryPage,
  DocumentPage,
  MediaPage,
  Page,
  PageStatus,
  ParsedDocument,
  ParsedStylesheet,
} from './types';

type PageInit = {
  id?: string;
  sourceUrl: string;
  status: PageStatus;
};

export function createDocumentPage(
  init: PageInit & {
    document?: ParsedDocument | null;
    cssom?: ParsedStylesheet | null;
    favicon?: BrowserImage | null;
  },
): DocumentPage {
  return {
    kind: 'document',
    id: init.id ?? uuidv4(),
    sourceUrl: init.sourceUrl,
    status: init.status,
    document: init.document ?? null,
    cssom: init.cssom ?? null,
    favicon: init.favicon ?? null,
  };
}

export function createDirectoryPage(
  init: PageInit & { entries?: ReadonlyArray<DirectoryEntry> },
): DirectoryPage {
  return {
    kind: 'directory',
    id: init.id ?? uuidv4(),
    sourceUrl: init.sourceUrl,
    status: init.status,
    entries: init.entries ? [...init.entries] : [],
  };
}

export function createMediaPage(init: PageInit & { path: string; isLocalMedia?: boolean }): MediaPage {
  return {
    kind: 'media',
    id: init.id ?? uuidv4(),
    sourceUrl: init.sourceUrl,
    status: init.status,
    isLocalMedia: init.isLocalMedia ?? true,
    path: init.path,
  };
}

export function isTerminalPage(page: Page): boolean {
  return page.status !== 'loading';
}

/**
 * Title shown for a page: the document's `<title>` text, an index heading for
 * directory listings, or the file name for local media.
 */
export function getPageTitle(page: Page): string | null {
  switch (page.kind) {
    case 'document': {
      const title = page.document?.querySelector('title')?.textContent?.trim();
      return title ?? null;
    }
    case 'directory':
      return `Index of ${page.sourceUrl}`;
    case 'media':
      return path.basename(page.path);
  }
}
