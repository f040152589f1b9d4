import type { Page } from '../domain/repository.js';

/**
 * Fill in whatever the caller left out of a page request.
 */
export function resolvePage(page: Partial<Page> | undefined, defaultLimit: number): Page {
  return {
    limit: page?.limit ?? defaultLimit,
    offset: page?.offset ?? 0,
  };
}
