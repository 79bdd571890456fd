/**
 * @module @sprig/plugin-execution/fetch
 */

import { FetchFailureError, type ModuleFetcher, type ModuleLocation } from '@sprig/plugin-contracts';
import { FileModuleFetcher } from './file-fetcher.js';
import { HttpModuleFetcher, type HttpModuleFetcherOptions } from './http-fetcher.js';

export { FileModuleFetcher } from './file-fetcher.js';
export { HttpModuleFetcher, type HttpModuleFetcherOptions } from './http-fetcher.js';

/**
 * Create a fetcher that dispatches on the location's URL scheme.
 */
export function createModuleFetcher(options: HttpModuleFetcherOptions = {}): ModuleFetcher {
  const http = new HttpModuleFetcher(options);
  const file = new FileModuleFetcher();

  return {
    fetch(location: ModuleLocation, signal?: AbortSignal): Promise<Uint8Array> {
      let protocol: string;
      try {
        protocol = new URL(location.url).protocol;
      } catch (error) {
        return Promise.reject(new FetchFailureError(location.url, 'invalid URL', { cause: error }));
      }

      switch (protocol) {
        case 'file:':
          return file.fetch(location, signal);
        case 'http:':
        case 'https:':
          return http.fetch(location, signal);
        default:
          return Promise.reject(new FetchFailureError(location.url, `unsupported scheme ${protocol}`));
      }
    },
  };
}
