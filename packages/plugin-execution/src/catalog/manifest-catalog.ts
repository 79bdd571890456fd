/**
 * @module @sprig/plugin-execution/catalog/manifest
 *
 * Catalog backed by a JSON manifest listing grammar module files:
 *
 * ```json
 * { "interfaceVersion": "0.2.3",
 *   "languages": [{ "id": "rust", "file": "rust.wasm", "aliases": ["rs"] }] }
 * ```
 *
 * `file` is resolved against the manifest's own URL.
 */

import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { z } from 'zod';
import {
  ConfigError,
  FetchFailureError,
  type ModuleCatalog,
  type ModuleLocation,
} from '@sprig/plugin-contracts';

export const grammarEntrySchema = z.object({
  id: z.string().min(1),
  file: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
  interfaceVersion: z.string().min(1).optional(),
});

export const grammarManifestSchema = z.object({
  version: z.string().optional(),
  /** Default for entries that do not declare one */
  interfaceVersion: z.string().min(1).optional(),
  languages: z.array(grammarEntrySchema),
});

export type GrammarEntry = z.infer<typeof grammarEntrySchema>;
export type GrammarManifest = z.infer<typeof grammarManifestSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

export class ManifestCatalog implements ModuleCatalog {
  private readonly entries = new Map<string, GrammarEntry>();

  constructor(
    private readonly manifest: GrammarManifest,
    private readonly baseUrl: string | URL
  ) {
    for (const entry of manifest.languages) {
      this.entries.set(entry.id, entry);
    }
    // Canonical IDs win over aliases
    for (const entry of manifest.languages) {
      for (const alias of entry.aliases) {
        if (!this.entries.has(alias)) {
          this.entries.set(alias, entry);
        }
      }
    }
  }

  /**
   * Validate a parsed manifest.
   */
  static parse(raw: unknown, baseUrl: string | URL): ManifestCatalog {
    const parsed = grammarManifestSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new ConfigError(`Invalid grammar manifest: ${issues.join('; ')}`, { issues });
    }
    return new ManifestCatalog(parsed.data, baseUrl);
  }

  static async fromFile(path: string): Promise<ManifestCatalog> {
    const url = pathToFileURL(path);
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      throw new FetchFailureError(url.href, 'cannot read manifest', { cause: error });
    }
    return ManifestCatalog.parse(parseJson(text, url.href), url);
  }

  static async fromUrl(url: string, fetchImpl: typeof fetch = globalThis.fetch): Promise<ManifestCatalog> {
    let response: Response;
    try {
      response = await fetchImpl(url, { headers: { accept: 'application/json' } });
    } catch (error) {
      throw new FetchFailureError(url, error instanceof Error ? error.message : String(error), { cause: error });
    }
    if (!response.ok) {
      throw new FetchFailureError(url, `HTTP ${response.status}`, { status: response.status });
    }
    return ManifestCatalog.parse(parseJson(await response.text(), url), url);
  }

  async resolve(languageId: string): Promise<ModuleLocation | undefined> {
    const entry = this.entries.get(languageId);
    if (!entry) {
      return undefined;
    }
    return {
      languageId: entry.id,
      url: new URL(entry.file, this.baseUrl).href,
      interfaceVersion: entry.interfaceVersion ?? this.manifest.interfaceVersion,
    };
  }

  async languages(): Promise<string[]> {
    return this.manifest.languages.map((entry) => entry.id);
  }
}

function parseJson(text: string, source: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in grammar manifest ${source}: ${error.message}`, { source });
    }
    throw error;
  }
}
