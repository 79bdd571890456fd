/**
 * @module @sprig/plugin-execution/__tests__/catalogs
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, FetchFailureError } from '@sprig/plugin-contracts';
import { CdnCatalog, DirectoryCatalog, ManifestCatalog } from '../catalog/index.js';

const MANIFEST = {
  interfaceVersion: '0.2.3',
  languages: [
    { id: 'c', file: 'c.wasm', aliases: ['h'] },
    { id: 'h', file: 'h.wasm' },
    { id: 'rust', file: 'grammars/rust.wasm', aliases: ['rs'], interfaceVersion: '0.2.0' },
  ],
};

describe('ManifestCatalog', () => {
  it('should resolve files against the manifest URL', async () => {
    const catalog = ManifestCatalog.parse(MANIFEST, 'https://grammars.test/v1/plugins.json');

    await expect(catalog.resolve('c')).resolves.toEqual({
      languageId: 'c',
      url: 'https://grammars.test/v1/c.wasm',
      interfaceVersion: '0.2.3',
    });
    await expect(catalog.resolve('rs')).resolves.toEqual({
      languageId: 'rust',
      url: 'https://grammars.test/v1/grammars/rust.wasm',
      interfaceVersion: '0.2.0',
    });
  });

  it('should not let an alias shadow a language ID', async () => {
    const catalog = ManifestCatalog.parse(MANIFEST, 'https://grammars.test/');

    await expect(catalog.resolve('h')).resolves.toMatchObject({ languageId: 'h' });
  });

  it('should return undefined for unlisted languages', async () => {
    const catalog = ManifestCatalog.parse(MANIFEST, 'https://grammars.test/');

    await expect(catalog.resolve('go')).resolves.toBeUndefined();
    await expect(catalog.languages()).resolves.toEqual(['c', 'h', 'rust']);
  });

  it('should reject an invalid manifest', () => {
    const parse = () => ManifestCatalog.parse({ languages: [{ id: 'c' }] }, 'https://grammars.test/');

    expect(parse).toThrow(ConfigError);
    expect(parse).toThrow('Invalid grammar manifest: languages.0.file: Required');
  });

  describe('fromUrl', () => {
    it('should fetch and parse the manifest', async () => {
      const requested: string[] = [];
      const fetchStub: typeof fetch = async (input: string | URL | Request) => {
        requested.push(String(input));
        return new Response(JSON.stringify(MANIFEST));
      };

      const catalog = await ManifestCatalog.fromUrl('https://grammars.test/v2/plugins.json', fetchStub);

      expect(requested).toEqual(['https://grammars.test/v2/plugins.json']);
      await expect(catalog.resolve('c')).resolves.toMatchObject({ url: 'https://grammars.test/v2/c.wasm' });
    });

    it('should fail on a non-ok response', async () => {
      const fetchStub: typeof fetch = async () => new Response('missing', { status: 404 });

      const error = await ManifestCatalog.fromUrl('https://grammars.test/plugins.json', fetchStub).catch(
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(FetchFailureError);
      expect(error).toMatchObject({
        status: 404,
        message: 'Failed to fetch grammar module from https://grammars.test/plugins.json: HTTP 404',
      });
    });
  });

  describe('fromFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'sprig-manifest-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should resolve files next to the manifest', async () => {
      const path = join(dir, 'plugins.json');
      await writeFile(path, JSON.stringify(MANIFEST));

      const catalog = await ManifestCatalog.fromFile(path);

      await expect(catalog.resolve('c')).resolves.toMatchObject({
        url: pathToFileURL(join(dir, 'c.wasm')).href,
      });
    });

    it('should reject malformed JSON', async () => {
      const path = join(dir, 'plugins.json');
      await writeFile(path, '{ "languages": [');

      await expect(ManifestCatalog.fromFile(path)).rejects.toThrow(ConfigError);
    });

    it('should reject a missing file', async () => {
      await expect(ManifestCatalog.fromFile(join(dir, 'absent.json'))).rejects.toThrow(FetchFailureError);
    });
  });
});

describe('DirectoryCatalog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sprig-grammars-'));
    await mkdir(join(dir, 'nested'));
    await writeFile(join(dir, 'rust.wasm'), 'rust');
    await writeFile(join(dir, 'nested', 'rust.wasm'), 'shadowed');
    await writeFile(join(dir, 'nested', 'go.wasm'), 'go');
    await writeFile(join(dir, 'README.md'), 'not a grammar');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should prefer the shallowest file for a language', async () => {
    const catalog = new DirectoryCatalog(dir);

    await expect(catalog.resolve('rust')).resolves.toEqual({
      languageId: 'rust',
      url: pathToFileURL(join(dir, 'rust.wasm')).href,
    });
    await expect(catalog.resolve('go')).resolves.toEqual({
      languageId: 'go',
      url: pathToFileURL(join(dir, 'nested', 'go.wasm')).href,
    });
    await expect(catalog.resolve('README')).resolves.toBeUndefined();
  });

  it('should scan once until refreshed', async () => {
    const catalog = new DirectoryCatalog(dir);
    await expect(catalog.languages()).resolves.toEqual(['go', 'rust']);

    await writeFile(join(dir, 'zig.wasm'), 'zig');
    await expect(catalog.languages()).resolves.toEqual(['go', 'rust']);

    catalog.refresh();
    await expect(catalog.languages()).resolves.toEqual(['go', 'rust', 'zig']);
  });
});

describe('CdnCatalog', () => {
  it('should build jsdelivr URLs for the latest version by default', async () => {
    const catalog = new CdnCatalog({ languages: ['rust'] });

    await expect(catalog.resolve('rust')).resolves.toEqual({
      languageId: 'rust',
      url: 'https://cdn.jsdelivr.net/npm/@sprig/grammar-rust/grammar.wasm',
    });
  });

  it('should pin a version on a named CDN', async () => {
    const catalog = new CdnCatalog({ languages: ['rust'], cdn: 'unpkg', version: '1.2.0' });

    await expect(catalog.resolve('rust')).resolves.toMatchObject({
      url: 'https://unpkg.com/@sprig/grammar-rust@1.2.0/grammar.wasm',
    });
  });

  it('should accept a custom base URL', async () => {
    const catalog = new CdnCatalog({ languages: ['go'], cdn: 'https://mirror.test/npm/', packagePrefix: 'grammar-' });

    await expect(catalog.resolve('go')).resolves.toMatchObject({
      url: 'https://mirror.test/npm/grammar-go/grammar.wasm',
    });
  });

  it('should only resolve listed languages', async () => {
    const catalog = new CdnCatalog({ languages: ['go'] });

    await expect(catalog.resolve('rust')).resolves.toBeUndefined();
    await expect(catalog.languages()).resolves.toEqual(['go']);
  });
});
