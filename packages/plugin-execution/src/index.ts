/**
 * @module @sprig/plugin-execution
 *
 * Host side of the grammar plugin system: configuration, catalogs,
 * fetchers, the instance registry and the highlighter facade.
 *
 * @example
 * ```typescript
 * import { createHighlighter, DirectoryCatalog } from '@sprig/plugin-execution';
 *
 * const highlighter = createHighlighter({ catalog: new DirectoryCatalog('./grammars') });
 * const html = await highlighter.highlight('rs', 'fn main() {}');
 * ```
 */

// Highlighter
export {
  createHighlighter,
  type Highlighter,
  type HighlighterOptions,
  type HighlightCallOptions,
  type HighlightOutcome,
  type ParsedSource,
} from './highlighter.js';

// Registry
export {
  PluginRegistry,
  type PluginRegistryOptions,
  type RegistryEvents,
  type RegistryStats,
  type EvictionReason,
} from './registry.js';

// Catalogs
export {
  ManifestCatalog,
  DirectoryCatalog,
  CdnCatalog,
  CDN_BASES,
  grammarEntrySchema,
  grammarManifestSchema,
  type GrammarEntry,
  type GrammarManifest,
  type CdnCatalogOptions,
} from './catalog/index.js';

// Fetchers
export {
  createModuleFetcher,
  FileModuleFetcher,
  HttpModuleFetcher,
  type HttpModuleFetcherOptions,
} from './fetch/index.js';

// Languages
export {
  knownLanguages,
  normalizeLanguage,
  extractLanguageFromClass,
  languageForPath,
  detectLanguage,
  languageEntrySchema,
  languageTableSchema,
  type LanguageEntry,
} from './languages.js';

// Config
export {
  highlighterConfigSchema,
  configFromEnv,
  resolveConfig,
  type HighlighterConfig,
  type HighlighterConfigInput,
} from './config.js';
