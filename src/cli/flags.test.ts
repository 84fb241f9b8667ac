import { describe, it, expect } from 'vitest';
import { flagValue, parsePositiveIntFlag, parseConfigPath } from './flags.js';

describe('flagValue', () => {
  it('returns the value after the equals sign', () => {
    expect(flagValue(['recommend', '--source=ai'], 'source')).toBe('ai');
  });

  it('returns undefined when the flag is absent', () => {
    expect(flagValue(['--json'], 'source')).toBeUndefined();
  });
});

describe('parsePositiveIntFlag', () => {
  it('parses a positive integer', () => {
    expect(parsePositiveIntFlag(['--limit=5'], 'limit')).toBe(5);
  });

  it('returns undefined when absent', () => {
    expect(parsePositiveIntFlag([], 'limit')).toBeUndefined();
  });

  it.each(['0', '-2', '2.5', 'ten', ''])('rejects %j', (raw) => {
    expect(parsePositiveIntFlag([`--limit=${raw}`], 'limit')).toBeNull();
  });
});

describe('parseConfigPath', () => {
  it('defaults to the data directory config', () => {
    expect(parseConfigPath([])).toMatch(/^\.pkg-advisor[\\/]config\.json$/);
  });

  it('uses --config when given', () => {
    expect(parseConfigPath(['--config=custom.json'])).toBe('custom.json');
  });
});
