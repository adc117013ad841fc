import { configureLogger, describeError, logError } from '../../lib/logger';
import { ResourceResolver } from '../navigation/resolver';
import type { NavigationServices } from '../navigation/types';
import type { Page } from '../pages/types';
import {
  DEFAULT_NAVIGATION_SETTINGS,
  getRequestHeaders,
  type NavigationSettings,
} from '../settings/navigationSettings';
import { Tab, type NavigationCallbacks } from '../tabs/tab';

export type BrowserOptions = {
  /** Change notification, fired after every observable state mutation. */
  onUpdate?: () => void;
};

/**
 * The set of open tabs and which one is active. All mutations report through
 * the single `onUpdate` sink supplied by the owner.
 */
export class Browser {
  private readonly resolver: ResourceResolver;
  private readonly tabList: Tab[] = [];
  private activeId: string | null = null;
  private readonly onUpdate: () => void;

  constructor(resolver: ResourceResolver, options: BrowserOptions = {}) {
    this.resolver = resolver;
    this.onUpdate = options.onUpdate ?? (() => undefined);
  }

  get tabs(): ReadonlyArray<Tab> {
    return this.tabList;
  }

  get activeTabId(): string | null {
    return this.activeId;
  }

  get currentTab(): Tab | null {
    if (this.activeId === null) return null;
    return this.tabList.find((tab) => tab.id === this.activeId) ?? null;
  }

  get currentPage(): Page | null {
    return this.currentTab?.currentPage ?? null;
  }

  /**
   * Opens a tab. A URL starts loading right away; the caller is not blocked
   * on it.
   */
  openNewTab(url?: string, switchTab = true): Tab {
    const tab = new Tab(this.resolver);
    this.tabList.push(tab);
    if (switchTab) {
      this.activeId = tab.id;
    }
    this.notify();

    if (url !== undefined) {
      this.startNavigation(tab, url);
    }
    return tab;
  }

  /**
   * Navigates the active tab, or opens a new tab when there is none.
   */
  navigate(url: string): void {
    const tab = this.currentTab;
    if (!tab) {
      this.openNewTab(url);
      return;
    }
    this.startNavigation(tab, url);
  }

  refresh(): void {
    const tab = this.currentTab;
    if (!tab) return;

    tab.refresh(this.navigationCallbacks(tab)).catch((error: unknown) => {
      logError('browser', 'refresh failed', { tabId: tab.id, error: describeError(error) });
    });
  }

  goBack(): void {
    if (this.currentTab?.goBack()) this.notify();
  }

  goForward(): void {
    if (this.currentTab?.goForward()) this.notify();
  }

  closeCurrentTab(): void {
    if (this.activeId === null) return;
    this.closeTab(this.activeId);
  }

  /**
   * Removes a tab. When it was active, the tab before it takes over; closing
   * the first tab hands over to the new first tab, and closing the last one
   * leaves no active tab.
   */
  closeTab(id: string): void {
    const index = this.tabList.findIndex((tab) => tab.id === id);
    if (index === -1) return;

    this.tabList.splice(index, 1);

    if (this.activeId === id) {
      const successor = this.tabList[Math.max(index - 1, 0)];
      this.activeId = successor?.id ?? null;
    }
    this.notify();
  }

  switchToTab(id: string): void {
    this.activeId = id;
    this.notify();
  }

  private startNavigation(tab: Tab, url: string): void {
    tab.navigateTo(url, this.navigationCallbacks(tab)).catch((error: unknown) => {
      logError('browser', 'navigation failed', { tabId: tab.id, url, error: describeError(error) });
    });
  }

  // A tab closed mid-navigation still settles, but is no longer observable.
  private navigationCallbacks(tab: Tab): NavigationCallbacks {
    const notifyIfOpen = () => {
      if (this.tabList.includes(tab)) this.notify();
    };
    return {
      onNavigationStarted: notifyIfOpen,
      onNavigationDone: notifyIfOpen,
    };
  }

  private notify(): void {
    this.onUpdate();
  }
}

export type CreateBrowserOptions = BrowserOptions & {
  settings?: NavigationSettings;
};

/**
 * Wires a browser from its collaborators: request headers and logging come
 * from the settings.
 */
export function createBrowser(services: NavigationServices, options: CreateBrowserOptions = {}): Browser {
  const settings = options.settings ?? DEFAULT_NAVIGATION_SETTINGS;
  configureLogger({ enabled: settings.debugLogsEnabled, filePath: settings.debugLogFile });

  const resolver = new ResourceResolver(services, getRequestHeaders(settings));
  return new Browser(resolver, { onUpdate: options.onUpdate });
}
