import type { Catalog } from '../../types/index.js';

/**
 * Source of a fresh catalog. Implementations reject with CatalogFetchError
 * when the remote listing cannot be retrieved or understood.
 */
export interface CatalogFetcher {
  fetch(): Promise<Catalog>;
}
