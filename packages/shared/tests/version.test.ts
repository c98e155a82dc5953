import { describe, it, expect } from 'vitest';
import { isValidPinnedVersion, isValidVersion } from '../src/index.js';

describe('versions', () => {
  it('accepts semantic versions only', () => {
    expect(isValidVersion('1.0.0')).toBe(true);
    expect(isValidVersion('2.1.0-beta.3')).toBe(true);
    expect(isValidVersion('1.0')).toBe(false);
    expect(isValidVersion('latest')).toBe(false);
    expect(isValidVersion('')).toBe(false);
  });

  it('treats an empty pinned version as unpinned', () => {
    expect(isValidPinnedVersion('')).toBe(true);
    expect(isValidPinnedVersion('1.2.3')).toBe(true);
    expect(isValidPinnedVersion('^1.2.3')).toBe(false);
  });

});
