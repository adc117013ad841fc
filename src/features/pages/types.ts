/**
 * Lifecycle status shared by every page variant.
 */
export type PageStatus = 'loading' | 'error' | 'success';

export type PageKind = 'document' | 'directory' | 'media';

/**
 * Element handle returned by a parsed document's query interface.
 */
export interface ParsedElement {
  getAttribute(name: string): string | null;
  readonly textContent: string | null;
}

/**
 * Structured document produced by the document parser.
 */
export interface ParsedDocument {
  querySelector(selectors: string): ParsedElement | null;
}

export interface ParsedStyleRule {
  readonly cssText: string;
}

/**
 * Structured stylesheet produced by the stylesheet parser.
 */
export interface ParsedStylesheet {
  readonly cssRules: ReadonlyArray<ParsedStyleRule>;
}

/**
 * Cached auxiliary image (a site icon) stored on local disk.
 */
export type BrowserImage = {
  readonly path: string;
  readonly mimetype: string;
};

export type DirectoryEntryType = 'file' | 'directory' | 'other';

export type DirectoryEntry = {
  readonly name: string;
  readonly path: string;
  readonly type: DirectoryEntryType;
};

type PageBase = {
  readonly id: string;
  readonly sourceUrl: string;
  readonly status: PageStatus;
};

export type DocumentPage = PageBase & {
  readonly kind: 'document';
  readonly document: ParsedDocument | null;
  readonly cssom: ParsedStylesheet | null;
  readonly favicon: BrowserImage | null;
};

export type DirectoryPage = PageBase & {
  readonly kind: 'directory';
  readonly entries: ReadonlyArray<DirectoryEntry>;
};

export type MediaPage = PageBase & {
  readonly kind: 'media';
  readonly isLocalMedia: boolean;
  readonly path: string;
};

export type Page = DocumentPage | DirectoryPage | MediaPage;
