import { afterEach, describe, it, expect, vi } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../config';

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the defaults without overrides', () => {
    expect(loadConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it('reads BOM_EXTRACTOR_* variables', () => {
    const config = loadConfig(
      {},
      {
        BOM_EXTRACTOR_LEARNING_RATE: '0.1',
        BOM_EXTRACTOR_PAGE_TIMEOUT_MS: '500',
        BOM_EXTRACTOR_LEARNING_PATH: '/tmp/bom-learning',
      }
    );
    expect(config.learningRate).toBe(0.1);
    expect(config.pageTimeoutMs).toBe(500);
    expect(config.learningPath).toBe('/tmp/bom-learning');
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig({ minClusterSize: 4 }, { BOM_EXTRACTOR_MIN_CLUSTER_SIZE: '3' });
    expect(config.minClusterSize).toBe(4);
  });

  it('ignores unreadable numbers with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = loadConfig({}, { BOM_EXTRACTOR_PAGE_TIMEOUT_MS: 'abc' });

    expect(config.pageTimeoutMs).toBe(DEFAULT_CONFIG.pageTimeoutMs);
    expect(warn).toHaveBeenCalledWith(
      '[config] Ignoring BOM_EXTRACTOR_PAGE_TIMEOUT_MS=abc: expected a non-negative number'
    );
  });

  it('rejects a learning rate of 1 or more', () => {
    expect(() => loadConfig({ learningRate: 1 }, {})).toThrow('learningRate must be below 1, got 1');
  });
});
