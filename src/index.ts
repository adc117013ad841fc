export { Browser, createBrowser, type BrowserOptions, type CreateBrowserOptions } from './features/browser/browser';
export { default as BrowserProvider, useBrowser } from './features/browser/BrowserProvider';
export { Tab, type NavigationCallbacks } from './features/tabs/tab';
export { ResourceResolver } from './features/navigation/resolver';
export { ResourceLoadError, isResourceLoadError, type ResourceLoadErrorKind } from './features/navigation/errors';
export { classifyUrl, resolveLinkedResourceUrl, toLocalPath, type ResourceClass } from './features/navigation/urls';
export {
  createAssetFetcher,
  createDocumentFetcher,
  createStylesheetFetcher,
  fetchAssetWithTimeout,
  fetchTextWithTimeout,
} from './features/navigation/http';
export { parseHtmlDocument, parseStylesheet } from './features/navigation/parsers';
export { isRegularFile } from './features/navigation/fileSystem';
export { createNavigationServices } from './features/navigation/services';
export type * from './features/navigation/types';
export {
  createDirectoryPage,
  createDocumentPage,
  createMediaPage,
  getPageTitle,
  isTerminalPage,
} from './features/pages/pages';
export type * from './features/pages/types';
export {
  DEFAULT_NAVIGATION_SETTINGS,
  DEFAULT_USER_AGENT,
  getRequestHeaders,
  loadNavigationSettings,
  normalizeNavigationSettings,
  type NavigationSettings,
} from './features/settings/navigationSettings';
export {
  configureLogger,
  describeError,
  getLoggerOptions,
  logDebug,
  logError,
  type LoggerOptions,
} from './lib/logger';
