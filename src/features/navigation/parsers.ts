import { DOMParser, parseHTML } from 'linkedom';
import { describeError, logDebug } from '../../lib/logger';
import type { ParsedDocument, ParsedElement, ParsedStyleRule, ParsedStylesheet } from '../pages/types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function parseHtmlDocument(html: string): ParsedDocument | null {
  try {
    const document = new DOMParser().parseFromString(html, 'text/html');
    return {
      querySelector(selectors: string): ParsedElement | null {
        const element = document.querySelector(selectors);
        if (!element) return null;
        return {
          getAttribute: (name: string): string | null => element.getAttribute(name),
          textContent: element.textContent,
        };
      },
    };
  } catch (error) {
    logDebug('parser', 'html parse failed', { error: describeError(error) });
    return null;
  }
}

function toStyleRules(value: unknown): ParsedStyleRule[] | null {
  if (!isRecord(value) || !Array.isArray(value.cssRules)) return null;

  const rules: ParsedStyleRule[] = [];
  for (const rule of value.cssRules) {
    if (isRecord(rule) && typeof rule.cssText === 'string') {
      rules.push({ cssText: rule.cssText });
    }
  }
  return rules;
}

/**
 * Builds a CSSOM through a detached `<style>` element so that linkedom's own
 * stylesheet parser does the work.
 */
export function parseStylesheet(css: string): ParsedStylesheet | null {
  try {
    const { document } = parseHTML('<!doctype html><html><head></head><body></body></html>');
    const style = document.createElement('style');
    style.textContent = css;
    const cssRules = toStyleRules(style.sheet);
    return cssRules ? { cssRules } : null;
  } catch (error) {
    logDebug('parser', 'stylesheet parse failed', { error: describeError(error) });
    return null;
  }
}
