export type ResourceLoadErrorKind = 'transport' | 'parse' | 'not-found';

/**
 * Failure raised while fetching or parsing a resource. The resolver catches it
 * and reports it through the page status.
 */
export class ResourceLoadError extends Error {
  readonly kind: ResourceLoadErrorKind;
  readonly url: string;

  constructor(kind: ResourceLoadErrorKind, url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResourceLoadError';
    this.kind = kind;
    this.url = url;
  }
}

export function isResourceLoadError(error: unknown): error is ResourceLoadError {
  return error instanceof ResourceLoadError;
}
