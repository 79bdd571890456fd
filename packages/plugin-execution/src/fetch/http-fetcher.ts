/**
 * @module @sprig/plugin-execution/fetch/http
 */

import { AbortError, FetchFailureError, type ModuleFetcher, type ModuleLocation } from '@sprig/plugin-contracts';

export interface HttpModuleFetcherOptions {
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  /** Extra request headers */
  headers?: Record<string, string>;
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fetches module bytes over `http:`/`https:`.
 */
export class HttpModuleFetcher implements ModuleFetcher {
  private readonly fetchImpl: typeof fetch;
  private readonly headers: Record<string, string>;

  constructor(options: HttpModuleFetcherOptions = {}) {
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.headers = { accept: 'application/wasm', ...options.headers };
  }

  async fetch(location: ModuleLocation, signal?: AbortSignal): Promise<Uint8Array> {
    let response: Response;
    try {
      response = await this.fetchImpl(location.url, { headers: this.headers, signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new AbortError(`Fetching ${location.url} aborted`);
      }
      throw new FetchFailureError(location.url, reasonOf(error), { cause: error });
    }

    if (!response.ok) {
      throw new FetchFailureError(location.url, `HTTP ${response.status} ${response.statusText}`.trim(), {
        status: response.status,
      });
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new FetchFailureError(location.url, `reading body failed: ${reasonOf(error)}`, {
        status: response.status,
        cause: error,
      });
    }
  }
}
