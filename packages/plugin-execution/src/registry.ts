/**
 * @module @sprig/plugin-execution/registry
 *
 * Plugin registry: maps a language ID to a ready grammar instance.
 *
 * - one cached instance per canonical `languageId@interfaceVersion`; an alias
 *   the catalog resolves shares the canonical language's instance
 * - concurrent first use of a language joins one in-flight load
 * - failed loads cache nothing, so the next acquire starts over
 * - discarded instances (trap, timeout) are replaced on the next acquire
 * - evicted instances are closed: calls already queued finish, then the
 *   engine releases the module
 */

import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import {
  HighlightError,
  INTERFACE_VERSION,
  InstantiationError,
  UnknownLanguageError,
  isHighlightError,
  noopLogger,
  type CapabilityEnvironment,
  type Logger,
  type ModuleCatalog,
  type ModuleLocation,
  type ModuleFetcher,
  type SandboxEngine,
} from '@sprig/plugin-contracts';
import {
  PluginInstance,
  WebAssemblyEngine,
  createCapabilityEnvironment,
} from '@sprig/plugin-runtime';

export type EvictionReason = 'discarded' | 'lru' | 'manual' | 'clear';

/**
 * Registry events
 */
export interface RegistryEvents {
  loaded: [instance: PluginInstance, durationMs: number];
  loadFailed: [languageId: string, error: HighlightError];
  joined: [languageId: string];
  evicted: [instance: PluginInstance, reason: EvictionReason];
}

export interface RegistryStats {
  /** Acquires answered from the cache */
  hits: number;
  /** Acquires that started a load */
  misses: number;
  /** Acquires that joined a load already in flight */
  joins: number;
  loads: number;
  failures: number;
  evictions: number;
  cached: number;
  inFlight: number;
}

export interface PluginRegistryOptions {
  catalog: ModuleCatalog;
  fetcher: ModuleFetcher;
  /** Default: WebAssemblyEngine */
  engine?: SandboxEngine;
  /** Capability environment per instance (default: createCapabilityEnvironment) */
  createEnvironment?: (languageId: string) => CapabilityEnvironment;
  /** Cache bound, least recently used first out */
  maxInstances?: number;
  logger?: Logger;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class PluginRegistry extends EventEmitter<RegistryEvents> {
  private readonly catalog: ModuleCatalog;
  private readonly fetcher: ModuleFetcher;
  private readonly engine: SandboxEngine;
  private readonly createEnvironment: (languageId: string) => CapabilityEnvironment;
  private readonly maxInstances?: number;
  private readonly logger: Logger;

  /** Insertion order doubles as recency order */
  private readonly instances = new Map<string, PluginInstance>();
  private readonly inFlight = new Map<string, Promise<PluginInstance>>();
  /** Requested ID → canonical ID, learned from the catalog */
  private readonly canonical = new Map<string, string>();
  private readonly counters = { hits: 0, misses: 0, joins: 0, loads: 0, failures: 0, evictions: 0 };
  private disposed = false;

  constructor(options: PluginRegistryOptions) {
    super();
    this.catalog = options.catalog;
    this.fetcher = options.fetcher;
    this.engine = options.engine ?? new WebAssemblyEngine();
    this.maxInstances = options.maxInstances;
    this.logger = options.logger ?? noopLogger;
    this.createEnvironment =
      options.createEnvironment ??
      ((languageId) => {
        const log = this.logger.child({ languageId });
        return createCapabilityEnvironment({
          onEffect: (event) => log.debug('Capability effect', { ...event }),
        });
      });
  }

  /** Cache key for a language under the supplied handler set */
  keyFor(languageId: string): string {
    return `${languageId}@${INTERFACE_VERSION}`;
  }

  /**
   * Get a ready instance for a language, loading it on first use.
   */
  acquire(languageId: string): Promise<PluginInstance> {
    if (this.disposed) {
      return Promise.reject(new HighlightError('Plugin registry has been disposed'));
    }

    const key = this.keyFor(this.canonicalId(languageId));
    const ready = this.cached(key) ?? this.joinable(key, languageId);
    if (ready) {
      return ready;
    }

    this.counters.misses++;
    return this.track(key, this.load(languageId));
  }

  /** Whether a usable instance is cached */
  has(languageId: string): boolean {
    const instance = this.instances.get(this.keyFor(this.canonicalId(languageId)));
    return instance !== undefined && !instance.discarded;
  }

  /**
   * Drop a language's instance. Calls already queued on it finish before the
   * engine releases the module.
   */
  evict(languageId: string): boolean {
    const key = this.keyFor(this.canonicalId(languageId));
    const instance = this.instances.get(key);
    if (!instance) {
      return false;
    }
    this.remove(key, instance, 'manual');
    return true;
  }

  /** Languages the catalog can resolve */
  languages(): Promise<string[]> {
    return this.catalog.languages();
  }

  clear(): void {
    for (const [key, instance] of [...this.instances]) {
      this.remove(key, instance, 'clear');
    }
  }

  stats(): RegistryStats {
    return {
      ...this.counters,
      cached: this.instances.size,
      inFlight: this.inFlight.size,
    };
  }

  /**
   * Drop every instance and refuse further acquires. Loads already in flight
   * still settle for their callers but are not cached; those callers own
   * the instance and release it with `close()`.
   */
  dispose(): void {
    this.disposed = true;
    this.clear();
    this.removeAllListeners();
  }

  private canonicalId(languageId: string): string {
    return this.canonical.get(languageId) ?? languageId;
  }

  /** Cache hit, refreshed as most recently used */
  private cached(key: string): Promise<PluginInstance> | undefined {
    const instance = this.instances.get(key);
    if (!instance) {
      return undefined;
    }
    if (instance.discarded) {
      this.remove(key, instance, 'discarded');
      return undefined;
    }
    this.counters.hits++;
    this.instances.delete(key);
    this.instances.set(key, instance);
    return Promise.resolve(instance);
  }

  private joinable(key: string, languageId: string): Promise<PluginInstance> | undefined {
    const pending = this.inFlight.get(key);
    if (pending) {
      this.counters.joins++;
      this.emit('joined', languageId);
    }
    return pending;
  }

  private track(key: string, load: Promise<PluginInstance>): Promise<PluginInstance> {
    const tracked = load.finally(() => {
      if (this.inFlight.get(key) === tracked) {
        this.inFlight.delete(key);
      }
    });
    this.inFlight.set(key, tracked);
    return tracked;
  }

  private async load(languageId: string): Promise<PluginInstance> {
    let location: ModuleLocation;
    try {
      const resolved = await this.catalog.resolve(languageId);
      if (!resolved) {
        throw new UnknownLanguageError(languageId);
      }
      location = resolved;
    } catch (error) {
      throw this.failed(languageId, error);
    }

    const canonical = location.languageId;
    if (canonical === languageId) {
      return this.instantiate(location);
    }

    // An alias: share whatever the canonical language already has
    this.canonical.set(languageId, canonical);
    const key = this.keyFor(canonical);
    const existing = this.instances.get(key);
    if (existing && !existing.discarded) {
      return existing;
    }
    if (existing) {
      this.remove(key, existing, 'discarded');
    }
    return this.inFlight.get(key) ?? this.track(key, this.instantiate(location));
  }

  private async instantiate(location: ModuleLocation): Promise<PluginInstance> {
    const { languageId } = location;
    const log = this.logger.child({ languageId });
    const startedAt = performance.now();

    let instance: PluginInstance;
    let size: number;
    try {
      if (location.interfaceVersion !== undefined && location.interfaceVersion !== INTERFACE_VERSION) {
        throw new InstantiationError(
          `Grammar module for ${languageId} targets interface ${location.interfaceVersion}, host supplies ${INTERFACE_VERSION}`,
          'INCOMPATIBLE_INTERFACE',
          { languageId, interfaceVersion: location.interfaceVersion }
        );
      }

      log.debug('Fetching grammar module', { url: location.url });
      const bytes = await this.fetcher.fetch(location);
      size = bytes.byteLength;

      const environment = this.createEnvironment(languageId);
      const exports = await this.engine.instantiate(bytes, { languageId, environment });
      instance = new PluginInstance({
        languageId,
        interfaceVersion: environment.version,
        exports,
        location,
      });
    } catch (error) {
      throw this.failed(languageId, error);
    }

    const durationMs = performance.now() - startedAt;
    this.counters.loads++;
    if (!this.disposed) {
      this.instances.set(this.keyFor(languageId), instance);
      this.enforceLimit();
    }
    log.info('Grammar loaded', {
      instanceId: instance.id,
      engine: this.engine.name,
      bytes: size,
      durationMs: Math.round(durationMs),
    });
    this.emit('loaded', instance, durationMs);
    return instance;
  }

  private failed(languageId: string, error: unknown): HighlightError {
    const failure = isHighlightError(error)
      ? error
      : new InstantiationError(
          `Failed to load grammar for ${languageId}: ${messageOf(error)}`,
          'INSTANTIATION_FAILED',
          { languageId },
          { cause: error }
        );
    this.counters.failures++;
    this.logger.warn('Grammar load failed', { languageId, code: failure.code, reason: failure.message });
    this.emit('loadFailed', languageId, failure);
    return failure;
  }

  private enforceLimit(): void {
    if (this.maxInstances === undefined) {
      return;
    }
    while (this.instances.size > this.maxInstances) {
      const oldest = this.instances.entries().next();
      if (oldest.done) {
        return;
      }
      const [key, instance] = oldest.value;
      this.remove(key, instance, 'lru');
    }
  }

  private remove(key: string, instance: PluginInstance, reason: EvictionReason): void {
    this.instances.delete(key);
    instance.close(`evicted (${reason})`);
    this.counters.evictions++;
    this.logger.debug('Grammar instance evicted', { languageId: instance.languageId, instanceId: instance.id, reason });
    this.emit('evicted', instance, reason);
  }
}
