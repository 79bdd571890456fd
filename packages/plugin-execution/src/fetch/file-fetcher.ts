/**
 * @module @sprig/plugin-execution/fetch/file
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { AbortError, FetchFailureError, type ModuleFetcher, type ModuleLocation } from '@sprig/plugin-contracts';

function errorCode(error: unknown): string | undefined {
  const code: unknown = error instanceof Error ? Reflect.get(error, 'code') : undefined;
  return typeof code === 'string' ? code : undefined;
}

/**
 * Reads module bytes from `file:` URLs.
 */
export class FileModuleFetcher implements ModuleFetcher {
  async fetch(location: ModuleLocation, signal?: AbortSignal): Promise<Uint8Array> {
    let path: string;
    try {
      path = fileURLToPath(location.url);
    } catch (error) {
      throw new FetchFailureError(location.url, 'not a file URL', { cause: error });
    }

    try {
      return new Uint8Array(await readFile(path, { signal }));
    } catch (error) {
      if (signal?.aborted) {
        throw new AbortError(`Reading ${path} aborted`);
      }
      const code = errorCode(error);
      const reason = code === 'ENOENT' ? 'file not found' : (code ?? (error instanceof Error ? error.message : String(error)));
      throw new FetchFailureError(location.url, reason, { cause: error });
    }
  }
}
