/**
 * @module @sprig/plugin-execution/highlighter
 *
 * Public entry point: language + source in, tagged HTML out.
 */

import { fileURLToPath } from 'node:url';
import {
  isHighlightError,
  normalizeError,
  type Injection,
  type Logger,
  type ModuleCatalog,
  type ModuleFetcher,
  type SandboxEngine,
  type SerializedHighlightError,
  type Span,
} from '@sprig/plugin-contracts';
import {
  ProcessEngine,
  WebAssemblyEngine,
  createLogger,
  escapeHtml,
  invokeHighlight,
  spansToHtml,
} from '@sprig/plugin-runtime';
import { CdnCatalog, ManifestCatalog } from './catalog/index.js';
import { resolveConfig, type HighlighterConfig, type HighlighterConfigInput } from './config.js';
import { createModuleFetcher } from './fetch/index.js';
import { knownLanguages, normalizeLanguage } from './languages.js';
import { PluginRegistry } from './registry.js';

export interface HighlighterOptions extends HighlighterConfigInput {
  /** Default: manifest at `pluginsUrl`, else the CDN catalog */
  catalog?: ModuleCatalog;
  /** Default: createModuleFetcher() */
  fetcher?: ModuleFetcher;
  /** Default: ProcessEngine, or WebAssemblyEngine with `isolation: 'none'` */
  engine?: SandboxEngine;
  logger?: Logger;
  /** Environment to read SPRIG_* variables from (default: process.env) */
  env?: Record<string, string | undefined>;
}

export interface HighlightCallOptions {
  signal?: AbortSignal;
}

/**
 * Validated spans for one source, injections already resolved.
 */
export interface ParsedSource {
  languageId: string;
  spans: Span[];
  /** Injection regions the grammar reported */
  injections: Injection[];
  /** Captures dropped by validation, injected languages included */
  dropped: number;
}

/**
 * Result of tryHighlight(). Failures still carry displayable HTML: the
 * escaped source.
 */
export type HighlightOutcome =
  | { ok: true; html: string; languageId: string; dropped: number }
  | { ok: false; html: string; languageId: string; error: SerializedHighlightError };

export interface Highlighter {
  readonly config: HighlighterConfig;
  readonly registry: PluginRegistry;
  /** @throws HighlightError */
  highlight(languageId: string, source: string, options?: HighlightCallOptions): Promise<string>;
  /** Never rejects */
  tryHighlight(languageId: string, source: string, options?: HighlightCallOptions): Promise<HighlightOutcome>;
  /** Load a grammar without highlighting anything */
  preload(languageId: string): Promise<void>;
  parse(languageId: string, source: string, options?: HighlightCallOptions): Promise<ParsedSource>;
  /** Languages the catalog can resolve */
  languages(): Promise<string[]>;
  dispose(): void;
}

/**
 * Catalog whose construction is deferred to first use. A failed load is
 * retried on the next call.
 */
function lazyCatalog(load: () => Promise<ModuleCatalog>): ModuleCatalog {
  let pending: Promise<ModuleCatalog> | undefined;
  const get = () => {
    pending ??= load().catch((error: unknown) => {
      pending = undefined;
      throw error;
    });
    return pending;
  };
  return {
    resolve: async (languageId) => (await get()).resolve(languageId),
    languages: async () => (await get()).languages(),
  };
}

function defaultCatalog(config: HighlighterConfig): ModuleCatalog {
  const { pluginsUrl } = config;
  if (pluginsUrl) {
    return lazyCatalog(() =>
      pluginsUrl.startsWith('file:')
        ? ManifestCatalog.fromFile(fileURLToPath(pluginsUrl))
        : ManifestCatalog.fromUrl(pluginsUrl)
    );
  }
  return new CdnCatalog({ cdn: config.cdn, version: config.version, languages: knownLanguages() });
}

function defaultEngine(config: HighlighterConfig, logger: Logger): SandboxEngine {
  if (config.isolation === 'none') {
    return new WebAssemblyEngine();
  }
  return new ProcessEngine({
    onEffect: (languageId, event) => logger.debug('Capability effect', { languageId, ...event }),
  });
}

/**
 * Keep injections that do not overlap an earlier one, in source order.
 */
function disjointInjections(injections: readonly Injection[]): Injection[] {
  const ordered = [...injections].sort((a, b) => a.start - b.start);
  const kept: Injection[] = [];
  let pos = 0;
  for (const injection of ordered) {
    if (injection.start < pos || injection.start === injection.end) {
      continue;
    }
    kept.push(injection);
    pos = injection.end;
  }
  return kept;
}

/**
 * A span strictly inside an injection region marks a child of the injected
 * node. Without `includeChildren` the children keep the parent's captures.
 */
function isNestedIn(span: Span, injection: Injection): boolean {
  const inside = span.start >= injection.start && span.end <= injection.end;
  const whole = span.start === injection.start && span.end === injection.end;
  return inside && !whole;
}

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Create a highlighter.
 *
 * @example
 * ```typescript
 * const highlighter = createHighlighter({ pluginsUrl: 'file:///srv/grammars/plugins.json' });
 * const html = await highlighter.highlight('rust', 'fn main() {}');
 * ```
 */
export function createHighlighter(options: HighlighterOptions = {}): Highlighter {
  const { catalog, fetcher, engine, logger: providedLogger, env, ...input } = options;
  const config = resolveConfig(input, env);
  const logger = providedLogger ?? createLogger('highlighter', { level: config.logLevel });

  const registry = new PluginRegistry({
    catalog: catalog ?? defaultCatalog(config),
    fetcher: fetcher ?? createModuleFetcher(),
    engine: engine ?? defaultEngine(config, logger.child({ component: 'engine' })),
    maxInstances: config.maxInstances,
    logger: logger.child({ component: 'registry' }),
  });

  const parseAt = async (
    languageId: string,
    source: string,
    depth: number,
    signal: AbortSignal | undefined
  ): Promise<ParsedSource> => {
    const instance = await registry.acquire(languageId);
    const result = await invokeHighlight(instance, source, { timeoutMs: config.timeoutMs, signal, logger });

    let spans = result.spans;
    let dropped = result.dropped;

    if (depth > 0) {
      for (const injection of disjointInjections(result.injections)) {
        const injected = normalizeLanguage(injection.language);
        let child: ParsedSource;
        try {
          child = await parseAt(injected, source.slice(injection.start, injection.end), depth - 1, signal);
        } catch (error) {
          if (isHighlightError(error) && error.code === 'ABORTED') {
            throw error;
          }
          // The region keeps the parent's highlighting
          const { code, message } = normalizeError(error);
          logger.warn('Injected language failed', { languageId, injected, code, reason: message });
          continue;
        }
        const nested = injection.includeChildren ? [] : spans.filter((span) => isNestedIn(span, injection));
        spans = spans.filter((span) => span.end <= injection.start || span.start >= injection.end);
        spans.push(...nested);
        for (const span of child.spans) {
          const shifted = { ...span, start: span.start + injection.start, end: span.end + injection.start };
          if (!nested.some((kept) => overlaps(kept, shifted))) {
            spans.push(shifted);
          }
        }
        dropped += child.dropped;
      }
    }

    return { languageId, spans, injections: result.injections, dropped };
  };

  const parse = (languageId: string, source: string, callOptions: HighlightCallOptions = {}) =>
    parseAt(normalizeLanguage(languageId), source, config.injectionDepth, callOptions.signal);

  return {
    config,
    registry,

    parse,

    async highlight(languageId, source, callOptions) {
      const parsed = await parse(languageId, source, callOptions);
      return spansToHtml(source, parsed.spans);
    },

    async tryHighlight(languageId, source, callOptions) {
      const canonical = normalizeLanguage(languageId);
      try {
        const parsed = await parse(canonical, source, callOptions);
        return { ok: true, html: spansToHtml(source, parsed.spans), languageId: canonical, dropped: parsed.dropped };
      } catch (error) {
        const serialized = normalizeError(error);
        logger.warn('Highlighting failed, showing plain text', {
          languageId: canonical,
          code: serialized.code,
          reason: serialized.message,
        });
        return { ok: false, html: escapeHtml(source), languageId: canonical, error: serialized };
      }
    },

    async preload(languageId) {
      await registry.acquire(normalizeLanguage(languageId));
    },

    languages() {
      return registry.languages();
    },

    dispose() {
      registry.dispose();
    },
  };
}
