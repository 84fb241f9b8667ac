import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  readAdvisorConfig,
  validateAdvisorConfig,
  failureCooldownMs,
  AdvisorConfigError,
} from './reader.js';
import { AdvisorConfigSchema, DEFAULT_ADVISOR_CONFIG } from './schema.js';

describe('AdvisorConfigSchema', () => {
  it('fills every default from an empty object', () => {
    expect(AdvisorConfigSchema.parse({})).toEqual({
      fusion: { similarity_weight: 0.5, ai_weight: 0.6, limit: 10 },
      usage: { decay_days: 30, frequency_weight: 0.6, recency_weight: 0.4, frequency_saturation: 100 },
      similarity: { top_n: 20, dependency_boost: 0.25, context_boost: 0.15 },
      suggestions: { timeout_ms: 15000, max_suggestions: 10, model: 'claude-sonnet-4-20250514' },
      installs: { failure_cooldown_days: 7 },
      storage: { data_dir: '.pkg-advisor', catalog_file: 'catalog.json' },
    });
  });

  it('merges partial sections with defaults', () => {
    const config = AdvisorConfigSchema.parse({ fusion: { ai_weight: 0.9 } });
    expect(config.fusion).toEqual({ similarity_weight: 0.5, ai_weight: 0.9, limit: 10 });
  });
});

describe('validateAdvisorConfig', () => {
  it('reports the field path of invalid values', () => {
    const result = validateAdvisorConfig({ fusion: { limit: 0 } });
    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.field).toBe('fusion.limit');
      expect(result.errors[0]).toMatch(/^fusion\.limit: /);
    }
  });
});

describe('readAdvisorConfig', () => {
  const testDir = join(tmpdir(), `advisor-config-test-${Date.now()}`);
  const configPath = join(testDir, 'config.json');

  beforeEach(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('returns defaults when the file is missing', async () => {
    expect(await readAdvisorConfig(configPath)).toEqual(DEFAULT_ADVISOR_CONFIG);
  });

  it('reads and validates a partial config', async () => {
    await writeFile(configPath, JSON.stringify({ usage: { decay_days: 14 } }), 'utf-8');

    const config = await readAdvisorConfig(configPath);
    expect(config.usage.decay_days).toBe(14);
    expect(config.fusion.limit).toBe(10);
  });

  it('throws AdvisorConfigError for invalid JSON', async () => {
    await writeFile(configPath, '{ not json', 'utf-8');

    await expect(readAdvisorConfig(configPath)).rejects.toBeInstanceOf(AdvisorConfigError);
  });

  it('throws AdvisorConfigError naming the invalid field', async () => {
    await writeFile(configPath, JSON.stringify({ similarity: { top_n: -1 } }), 'utf-8');

    await expect(readAdvisorConfig(configPath)).rejects.toMatchObject({
      name: 'AdvisorConfigError',
      field: 'similarity.top_n',
    });
  });
});

describe('failureCooldownMs', () => {
  it('converts days to milliseconds', () => {
    expect(failureCooldownMs(DEFAULT_ADVISOR_CONFIG)).toBe(7 * 24 * 60 * 60 * 1000);
  });
});
