import { Config, validateConfig } from './config';
import { ConfigError } from './domain/errors/ThumbnailErrors';
import { ThumbnailClient } from './application/ThumbnailClient';
import { IdeogramImageClient } from './infrastructure/images/IdeogramImageClient';
import { LocalThumbnailStore } from './infrastructure/storage/LocalThumbnailStore';

/**
 * Wires a ThumbnailClient from an explicit configuration value.
 * Throws ConfigError listing every problem validateConfig reports.
 */
export function createThumbnailClient(config: Config): ThumbnailClient {
    const configErrors = validateConfig(config);
    if (configErrors.length > 0) {
        throw new ConfigError(`Invalid configuration: ${configErrors.join('; ')}`);
    }

    const imageClient = new IdeogramImageClient(
        config.ideogramApiKey,
        config.ideogramBaseUrl,
        config.requestTimeoutMs
    );
    const store = new LocalThumbnailStore(config.outputDir);

    return new ThumbnailClient(imageClient, store, { batchDelayMs: config.batchDelayMs });
}
