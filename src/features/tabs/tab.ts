import { v4 as uuidv4 } from 'uuid';
import { logDebug } from '../../lib/logger';
import type { ResourceResolver } from '../navigation/resolver';
import type { Page } from '../pages/types';

export type NavigationCallbacks = {
  onNavigationStarted?: () => void;
  onNavigationDone?: () => void;
};

/**
 * One navigation history: an ordered list of pages plus a cursor.
 *
 * A navigation publishes a loading placeholder synchronously, then swaps in
 * the terminal page once the resolver settles. The swap only happens while
 * the slot still holds that placeholder, so results from superseded
 * navigations are dropped.
 */
export class Tab {
  readonly id: string;
  private readonly resolver: ResourceResolver;
  private readonly pages: Page[] = [];
  private cursor = -1;

  constructor(resolver: ResourceResolver, id: string = uuidv4()) {
    this.resolver = resolver;
    this.id = id;
  }

  get history(): ReadonlyArray<Page> {
    return this.pages;
  }

  get currentIndex(): number {
    return this.cursor;
  }

  get currentPage(): Page | null {
    return this.cursor >= 0 ? this.pages[this.cursor] ?? null : null;
  }

  async navigateTo(url: string, callbacks: NavigationCallbacks = {}): Promise<void> {
    this.pages.splice(this.cursor + 1);

    const placeholder = this.resolver.createPlaceholder(url);
    this.pages.push(placeholder);
    this.cursor = this.pages.length - 1;
    const index = this.cursor;
    callbacks.onNavigationStarted?.();

    const settled = await this.resolver.load(placeholder);
    if (this.install(index, placeholder, settled)) {
      callbacks.onNavigationDone?.();
    }
  }

  /**
   * Reloads the current page in place. History length and cursor are left
   * untouched; the slot receives a fresh page.
   */
  async refresh(callbacks: NavigationCallbacks = {}): Promise<void> {
    const current = this.currentPage;
    if (!current) return;

    const index = this.cursor;
    const placeholder = this.resolver.createPlaceholder(current.sourceUrl);
    this.pages[index] = placeholder;
    callbacks.onNavigationStarted?.();

    const settled = await this.resolver.load(placeholder);
    if (this.install(index, placeholder, settled)) {
      callbacks.onNavigationDone?.();
    }
  }

  canGoBack(): boolean {
    return this.cursor > 0;
  }

  canGoForward(): boolean {
    return this.cursor < this.pages.length - 1;
  }

  goBack(): boolean {
    if (!this.canGoBack()) return false;
    this.cursor -= 1;
    return true;
  }

  goForward(): boolean {
    if (!this.canGoForward()) return false;
    this.cursor += 1;
    return true;
  }

  private install(index: number, placeholder: Page, settled: Page): boolean {
    if (this.pages[index]?.id !== placeholder.id) {
      logDebug('tab', 'discarding stale navigation result', { tabId: this.id, url: placeholder.sourceUrl });
      return false;
    }

    this.pages[index] = settled;
    return true;
  }
}
