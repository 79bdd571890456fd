/**
 * @module @sprig/plugin-execution/catalog/directory
 */

import { basename, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { glob } from 'glob';
import type { ModuleCatalog, ModuleLocation } from '@sprig/plugin-contracts';

/**
 * Catalog over a directory of `<languageId>.wasm` files, searched
 * recursively. Scanned once, on first use.
 */
export class DirectoryCatalog implements ModuleCatalog {
  private readonly root: string;
  private scan?: Promise<Map<string, string>>;

  constructor(directory: string) {
    this.root = resolve(directory);
  }

  private files(): Promise<Map<string, string>> {
    this.scan ??= glob('**/*.wasm', { cwd: this.root, absolute: true, nodir: true }).then((paths) => {
      const byLanguage = new Map<string, string>();
      // Sorted so the shallowest, then alphabetically first, file wins
      for (const path of [...paths].sort((a, b) => a.length - b.length || a.localeCompare(b))) {
        const languageId = basename(path, '.wasm');
        if (!byLanguage.has(languageId)) {
          byLanguage.set(languageId, path);
        }
      }
      return byLanguage;
    });
    return this.scan;
  }

  /** Forget the last scan */
  refresh(): void {
    this.scan = undefined;
  }

  async resolve(languageId: string): Promise<ModuleLocation | undefined> {
    const path = (await this.files()).get(languageId);
    return path ? { languageId, url: pathToFileURL(path).href } : undefined;
  }

  async languages(): Promise<string[]> {
    return [...(await this.files()).keys()].sort();
  }
}
