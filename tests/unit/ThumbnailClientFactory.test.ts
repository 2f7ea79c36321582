import { loadConfig } from '../../src/config';
import { createThumbnailClient } from '../../src/ThumbnailClientFactory';
import { ThumbnailClient } from '../../src/application/ThumbnailClient';
import { ConfigError } from '../../src/domain/errors/ThumbnailErrors';

describe('createThumbnailClient', () => {
    const baseEnv = { IDEOGRAM_API_KEY: 'test-ideogram-key', OUTPUT_DIR: './thumbnails' };

    test('should build a client from a valid configuration', () => {
        expect(createThumbnailClient(loadConfig(baseEnv))).toBeInstanceOf(ThumbnailClient);
    });

    test('should reject a zero request timeout', () => {
        const config = loadConfig({ ...baseEnv, IDEOGRAM_TIMEOUT_MS: '0' });

        expect(() => createThumbnailClient(config)).toThrow(ConfigError);
        expect(() => createThumbnailClient(config))
            .toThrow('Invalid configuration: IDEOGRAM_TIMEOUT_MS must be greater than 0');
    });

    test('should reject a negative batch delay', () => {
        const config = loadConfig({ ...baseEnv, THUMBNAIL_BATCH_DELAY_MS: '-5' });

        expect(() => createThumbnailClient(config))
            .toThrow('Invalid configuration: THUMBNAIL_BATCH_DELAY_MS must not be negative');
    });

    test('should list every problem at once', () => {
        const config = loadConfig({ ...baseEnv, IDEOGRAM_TIMEOUT_MS: '0', THUMBNAIL_BATCH_DELAY_MS: '-5' });

        expect(() => createThumbnailClient(config)).toThrow(
            'Invalid configuration: IDEOGRAM_TIMEOUT_MS must be greater than 0; THUMBNAIL_BATCH_DELAY_MS must not be negative'
        );
    });
});
