import type { NavigationSettings } from '../settings/navigationSettings';
import { isRegularFile } from './fileSystem';
import { createAssetFetcher, createDocumentFetcher, createStylesheetFetcher } from './http';
import type { NavigationServices } from './types';

type ExternalCollaborators = Pick<NavigationServices, 'explore' | 'faviconCache' | 'cacheMetadata'>;

/**
 * Fills in the HTTP and filesystem collaborators. The directory explorer and
 * the favicon cache with its metadata index are owned elsewhere and must be
 * supplied.
 */
export function createNavigationServices(
  settings: NavigationSettings,
  collaborators: ExternalCollaborators & Partial<NavigationServices>,
): NavigationServices {
  const { fetchTimeoutMs: timeoutMs } = settings;

  return {
    fetchDocument: createDocumentFetcher({ timeoutMs }),
    fetchStylesheet: createStylesheetFetcher({ timeoutMs }),
    fetchAsset: createAssetFetcher({ timeoutMs }),
    isFile: isRegularFile,
    ...collaborators,
  };
}
