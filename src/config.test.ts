import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_REGION, resolveHelperConfig } from './config.js';

describe('resolveHelperConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should fall back to defaults', () => {
    const config = resolveHelperConfig({}, {});

    expect(config.defaultRegion).toBe(DEFAULT_REGION);
    expect(config.verbose).toBe(false);
    expect(config.credentials).toBeUndefined();
  });

  it('should read the region from the environment', () => {
    expect(resolveHelperConfig({}, { AWS_REGION: 'eu-west-1' }).defaultRegion).toBe('eu-west-1');
    expect(
      resolveHelperConfig({}, { AWS_REGION: 'eu-west-1', AWS_DEFAULT_REGION: 'eu-north-1' }).defaultRegion,
    ).toBe('eu-north-1');
  });

  it('should prefer explicit settings', () => {
    const credentials = { accessKeyId: 'test-key', secretAccessKey: 'test-secret' };
    const config = resolveHelperConfig(
      { defaultRegion: 'ap-south-1', credentials, verbose: true },
      { AWS_DEFAULT_REGION: 'eu-north-1' },
    );

    expect(config).toMatchObject({ defaultRegion: 'ap-south-1', credentials, verbose: true });
  });

  it('should prefix console output', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { logger } = resolveHelperConfig({}, {});

    logger.info('launching');
    logger.warn('slow down');

    expect(log).toHaveBeenCalledWith('[aws] launching');
    expect(warn).toHaveBeenCalledWith('[aws] slow down');
  });

  it('should keep an injected logger', () => {
    const logger = { info: vi.fn(), warn: vi.fn() };

    expect(resolveHelperConfig({ logger }, {}).logger).toBe(logger);
  });
});
