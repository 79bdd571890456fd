/**
 * @module @sprig/plugin-execution/catalog/cdn
 */

import type { ModuleCatalog, ModuleLocation } from '@sprig/plugin-contracts';

/** Well-known package CDNs */
export const CDN_BASES: Readonly<Record<string, string>> = {
  jsdelivr: 'https://cdn.jsdelivr.net/npm',
  unpkg: 'https://unpkg.com',
};

export interface CdnCatalogOptions {
  /** Languages published to the CDN */
  languages: readonly string[];
  /** `jsdelivr`, `unpkg` or a base URL (default: jsdelivr) */
  cdn?: string;
  /** Package version, `latest` for the newest (default: latest) */
  version?: string;
  /** Package name prefix (default: `@sprig/grammar-`) */
  packagePrefix?: string;
  /** Path of the module inside the package (default: `grammar.wasm`) */
  file?: string;
}

/**
 * Catalog of grammar packages published to an npm CDN:
 * `<base>/<prefix><languageId>[@version]/<file>`.
 */
export class CdnCatalog implements ModuleCatalog {
  private readonly known: ReadonlySet<string>;
  private readonly base: string;
  private readonly versionSuffix: string;
  private readonly packagePrefix: string;
  private readonly file: string;

  constructor(options: CdnCatalogOptions) {
    const cdn = options.cdn ?? 'jsdelivr';
    const version = options.version ?? 'latest';
    this.known = new Set(options.languages);
    this.base = (CDN_BASES[cdn] ?? cdn).replace(/\/+$/, '');
    this.versionSuffix = version === 'latest' ? '' : `@${version}`;
    this.packagePrefix = options.packagePrefix ?? '@sprig/grammar-';
    this.file = options.file ?? 'grammar.wasm';
  }

  async resolve(languageId: string): Promise<ModuleLocation | undefined> {
    if (!this.known.has(languageId)) {
      return undefined;
    }
    return {
      languageId,
      url: `${this.base}/${this.packagePrefix}${languageId}${this.versionSuffix}/${this.file}`,
    };
  }

  async languages(): Promise<string[]> {
    return [...this.known];
  }
}
