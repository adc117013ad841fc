import React, { createContext, useCallback, useContext, useState } from 'react';
import type { NavigationServices } from '../navigation/types';
import type { Page } from '../pages/types';
import type { NavigationSettings } from '../settings/navigationSettings';
import type { Tab } from '../tabs/tab';
import { createBrowser, type Browser } from './browser';

type BrowserContextType = {
  browser: Browser;
  tabs: ReadonlyArray<Tab>;
  activeTabId: string | null;
  currentTab: Tab | null;
  currentPage: Page | null;
  openNewTab: (url?: string, switchTab?: boolean) => void;
  closeTab: (id: string) => void;
  closeCurrentTab: () => void;
  switchToTab: (id: string) => void;
  navigate: (url: string) => void;
  goBack: () => void;
  goForward: () => void;
  refresh: () => void;
};

const BrowserContext = createContext<BrowserContextType | null>(null);

export const useBrowser = () => {
  const ctx = useContext(BrowserContext);
  if (!ctx) throw new Error('useBrowser must be used within BrowserProvider');
  return ctx;
};

type BrowserProviderProps = {
  services: NavigationServices;
  settings?: NavigationSettings;
  children: React.ReactNode;
};

/**
 * Owns one Browser for the lifetime of the subtree and re-renders it on every
 * change notification.
 */
export default function BrowserProvider({ services, settings, children }: BrowserProviderProps) {
  const [, setRevision] = useState(0);
  const [browser] = useState(() =>
    createBrowser(services, {
      settings,
      onUpdate: () => setRevision((revision) => revision + 1),
    }),
  );

  const openNewTab = useCallback(
    (url?: string, switchTab = true) => {
      browser.openNewTab(url, switchTab);
    },
    [browser],
  );

  return (
    <BrowserContext.Provider
      value={{
        browser,
        tabs: [...browser.tabs],
        activeTabId: browser.activeTabId,
        currentTab: browser.currentTab,
        currentPage: browser.currentPage,
        openNewTab,
        closeTab: (id) => browser.closeTab(id),
        closeCurrentTab: () => browser.closeCurrentTab(),
        switchToTab: (id) => browser.switchToTab(id),
        navigate: (url) => browser.navigate(url),
        goBack: () => browser.goBack(),
        goForward: () => browser.goForward(),
        refresh: () => browser.refresh(),
      }}
    >
      {children}
    </BrowserContext.Provider>
  );
}
