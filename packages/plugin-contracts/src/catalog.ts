/**
 * @module @sprig/plugin-contracts/catalog
 *
 * Boundary with the collaborators that locate and deliver module artifacts.
 * The host needs exactly two operations: resolve a language to a location,
 * and fetch the bytes behind a location.
 */

/**
 * Where a grammar module artifact lives.
 */
export interface ModuleLocation {
  /** Canonical language ID the artifact implements */
  languageId: string;
  /** Absolute URL (`https:`, `http:` or `file:`) */
  url: string;
  /** Capability interface version the artifact was built against, if declared */
  interfaceVersion?: string;
}

/**
 * Maps language IDs to artifact locations.
 */
export interface ModuleCatalog {
  /** Returns undefined when the catalog has no entry for the language */
  resolve(languageId: string): Promise<ModuleLocation | undefined>;
  /** Language IDs this catalog knows about */
  languages(): Promise<string[]>;
}

/**
 * Retrieves raw module bytes. Implementations throw FetchFailureError.
 */
export interface ModuleFetcher {
  fetch(location: ModuleLocation, signal?: AbortSignal): Promise<Uint8Array>;
}
