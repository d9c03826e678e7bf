import { loadConfig } from '../../src/config';
import { ConfigError } from '../../src/errors/config.error';

describe('loadConfig', () => {
    it('falls back to the defaults', () => {
        const config = loadConfig({});

        expect(config.checkInterval).toBe(300);
        expect(config.maxRuntime).toBe(0);
        expect(config.maxConsecutiveFailures).toBe(5);
        expect(config.retryBackoffMs).toBe(30000);
        expect(config.retryBackoffMaxMs).toBe(900000);
        expect(config.purgeOnComplete).toBe(false);
        expect(config.transmission.maxUploadRate).toBe(50);
        expect(config.onedrive.uploadFolder).toBe('/BTDownloads');
        expect(config.databaseUrl).toBeUndefined();
    });

    it('reads numbers and flags from the environment', () => {
        const config = loadConfig({
            CHECK_INTERVAL: ' 60 ',
            MAX_CONSECUTIVE_FAILURES: '2',
            MAX_DOWNLOAD_RATE: '',
            PURGE_ON_COMPLETE: 'yes',
        });

        expect(config.checkInterval).toBe(60);
        expect(config.maxConsecutiveFailures).toBe(2);
        expect(config.transmission.maxDownloadRate).toBe(0);
        expect(config.purgeOnComplete).toBe(true);
    });

    it('rejects values that are not whole numbers', () => {
        expect(() => loadConfig({ CHECK_INTERVAL: 'abc' }))
            .toThrow('CHECK_INTERVAL must be an integer >= 1, got "abc"');
        expect(() => loadConfig({ MAX_CONSECUTIVE_FAILURES: '3x' })).toThrow(ConfigError);
        expect(() => loadConfig({ RETRY_BACKOFF_MS: '1.5' })).toThrow(ConfigError);
    });

    it('rejects values below the minimum', () => {
        expect(() => loadConfig({ MAX_CONSECUTIVE_FAILURES: '0' }))
            .toThrow('MAX_CONSECUTIVE_FAILURES must be an integer >= 1, got "0"');
        expect(() => loadConfig({ MAX_RUNTIME: '-5' })).toThrow(ConfigError);
    });
});
