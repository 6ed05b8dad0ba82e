import os from 'os';
import { ZodError } from 'zod';
import { describe, expect, it } from 'vitest';
import { DEFAULT_USER_AGENT, EngineConfigSchema, loadEngineConfig, newspaperTitleRegExp } from './config';

describe('loadEngineConfig', () => {
  it('fills in defaults', () => {
    const config = loadEngineConfig({}, {});

    expect(config).toMatchObject({
      fetchTimeoutMs: 20_000,
      transferTimeoutMs: 60_000,
      maxFeedBytes: 10 * 1024 * 1024,
      maxBookBytes: 50 * 1024 * 1024,
      transientRetries: 1,
      downloadConcurrency: 1,
      userAgent: DEFAULT_USER_AGENT,
      stagingDir: os.tmpdir(),
    });
  });

  it('reads OPDS_* environment variables', () => {
    const config = loadEngineConfig(
      {},
      { OPDS_FETCH_TIMEOUT_MS: '5000', OPDS_DOWNLOAD_CONCURRENCY: '2', OPDS_STAGING_DIR: '/srv/staging', OPDS_TRANSIENT_RETRIES: ' ' }
    );

    expect(config.fetchTimeoutMs).toBe(5000);
    expect(config.downloadConcurrency).toBe(2);
    expect(config.stagingDir).toBe('/srv/staging');
    expect(config.transientRetries).toBe(1);
  });

  it('lets explicit overrides win over the environment', () => {
    expect(loadEngineConfig({ fetchTimeoutMs: 8000 }, { OPDS_FETCH_TIMEOUT_MS: '5000' }).fetchTimeoutMs).toBe(8000);
  });

  it('rejects out-of-range and malformed values', () => {
    expect(() => loadEngineConfig({ downloadConcurrency: 4 }, {})).toThrow(ZodError);
    expect(() => loadEngineConfig({}, { OPDS_MAX_FEED_BYTES: 'lots' })).toThrow(ZodError);
    expect(() => loadEngineConfig({ newspaperTitlePattern: '[unclosed' }, {})).toThrow('Not a valid regular expression');
  });

  it('rejects unknown options', () => {
    expect(EngineConfigSchema.safeParse({ retries: 2 }).success).toBe(false);
  });
});

describe('newspaperTitleRegExp', () => {
  const pattern = newspaperTitleRegExp(loadEngineConfig({}, {}));

  it('recognizes dated news downloads and newspaper titles', () => {
    expect(pattern.test('The Daily Post [Tue, 05 Mar 2024]')).toBe(true);
    expect(pattern.test('Harbour Gazette')).toBe(true);
  });

  it('leaves ordinary titles alone', () => {
    expect(pattern.test('Harbour Lights')).toBe(false);
    expect(pattern.test('Notes [draft]')).toBe(false);
  });
});
