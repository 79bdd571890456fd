/**
 * @module @sprig/plugin-contracts/__tests__/capabilities
 */

import { describe, it, expect } from 'vitest';
import {
  INTERFACE_VERSION,
  GRAMMAR_TYPES_VERSION,
  parseImportName,
  versionedName,
  supportedInterfaceVersions,
} from '../capabilities.js';

describe('import naming', () => {
  it('splits versioned names', () => {
    expect(parseImportName('wasi:cli/exit@0.2.3')).toEqual({ interface: 'wasi:cli/exit', version: '0.2.3' });
  });

  it('leaves unversioned names alone', () => {
    expect(parseImportName('wasi:cli/exit')).toEqual({ interface: 'wasi:cli/exit' });
  });

  it('does not treat a leading @ as a version', () => {
    expect(parseImportName('@scope')).toEqual({ interface: '@scope' });
  });

  it('builds versioned names', () => {
    expect(versionedName('wasi:random/random', INTERFACE_VERSION)).toBe('wasi:random/random@0.2.3');
  });

  it('lists supported versions per interface', () => {
    expect(supportedInterfaceVersions('wasi:io/streams')).toEqual([INTERFACE_VERSION]);
    expect(supportedInterfaceVersions('sprig:grammar/types')).toEqual([GRAMMAR_TYPES_VERSION]);
    expect(supportedInterfaceVersions('wasi:sockets/tcp')).toEqual([]);
  });
});
