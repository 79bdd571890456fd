/**
 * @module @sprig/plugin-execution/catalog
 */

export {
  ManifestCatalog,
  grammarEntrySchema,
  grammarManifestSchema,
  type GrammarEntry,
  type GrammarManifest,
} from './manifest-catalog.js';
export { DirectoryCatalog } from './directory-catalog.js';
export { CdnCatalog, CDN_BASES, type CdnCatalogOptions } from './cdn-catalog.js';
