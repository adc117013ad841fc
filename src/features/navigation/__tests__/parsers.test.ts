import { describe, it, expect } from 'vitest';
import { parseHtmlDocument, parseStylesheet } from '../parsers';
import { createDocumentPage, getPageTitle } from '../../pages/pages';

const HTML = `<!doctype html>
<html>
  <head>
    <title>  Field Notes  </title>
    <link rel="stylesheet" href="/css/site.css">
    <link rel="icon" href="/favicon.png">
  </head>
  <body><p>hello</p></body>
</html>`;

describe('parseHtmlDocument', () => {
  it('exposes link attributes through querySelector', () => {
    const document = parseHtmlDocument(HTML);

    expect(document?.querySelector('link[rel="stylesheet"]')?.getAttribute('href')).toBe('/css/site.css');
    expect(document?.querySelector('link[rel="icon"]')?.getAttribute('href')).toBe('/favicon.png');
  });

  it('returns null for selectors that match nothing', () => {
    const document = parseHtmlDocument('<html><head></head><body></body></html>');
    expect(document?.querySelector('link[rel="icon"]')).toBeNull();
  });

  it('feeds the trimmed title into page titles', () => {
    const document = parseHtmlDocument(HTML);
    const page = createDocumentPage({ sourceUrl: 'https://example.com', status: 'success', document });

    expect(getPageTitle(page)).toBe('Field Notes');
  });
});

describe('parseStylesheet', () => {
  it('produces one rule per style rule', () => {
    const sheet = parseStylesheet('body { color: red; } p { margin: 0; }');

    expect(sheet?.cssRules).toHaveLength(2);
    expect(sheet?.cssRules[0]?.cssText).toContain('red');
  });

  it('returns an empty rule list for an empty stylesheet', () => {
    expect(parseStylesheet('')?.cssRules).toEqual([]);
  });
});
