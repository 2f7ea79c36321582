import { IImageClient } from '../domain/ports/IImageClient';
import { IThumbnailStore } from '../domain/ports/IThumbnailStore';
import {
    GenerationOptionsInput,
    GenerationResult,
    failureResult,
    resolveGenerationOptions,
    successResult,
} from '../domain/entities/Thumbnail';
import { ConfigError, ValidationError, describeError } from '../domain/errors/ThumbnailErrors';
import { buildThumbnailPrompt, generateHookText } from '../domain/services/ThumbnailPrompt';
import { sanitizeFilename } from '../domain/services/FilenameSanitizer';

export interface ThumbnailClientOptions {
    /** Pause between batch items, in milliseconds (default: 0) */
    batchDelayMs?: number;
}

/**
 * ThumbnailClient turns course topics into thumbnail files.
 * Calls are sequential; nothing is retried.
 */
export class ThumbnailClient {
    private readonly batchDelayMs: number;

    constructor(
        private readonly imageClient: IImageClient,
        private readonly store: IThumbnailStore,
        options: ThumbnailClientOptions = {}
    ) {
        const batchDelayMs = options.batchDelayMs ?? 0;
        if (!Number.isFinite(batchDelayMs) || batchDelayMs < 0) {
            throw new ConfigError(`Batch delay must not be negative, got: ${batchDelayMs}`);
        }
        this.batchDelayMs = batchDelayMs;
    }

    /**
     * Generates one thumbnail and returns the path of the written file.
     *
     * @throws ValidationError for an empty topic or bad option values
     * @throws ApiError when the API call or image download fails
     * @throws IOError when the file cannot be written
     */
    async generateThumbnail(topic: string, options?: GenerationOptionsInput): Promise<string> {
        const trimmedTopic = topic.trim();
        if (!trimmedTopic) {
            throw new ValidationError('Topic must not be empty');
        }

        const resolved = resolveGenerationOptions(options);
        console.log(`[ThumbnailClient] Generating thumbnail for: ${trimmedTopic}`);

        const hookText = generateHookText(trimmedTopic);
        const prompt = buildThumbnailPrompt(trimmedTopic, hookText, resolved.style);

        const image = await this.imageClient.generateImage(prompt, resolved);
        const bytes = await this.imageClient.downloadImage(image.imageUrl);

        const filePath = await this.store.save(sanitizeFilename(trimmedTopic), bytes);
        console.log(`[ThumbnailClient] Thumbnail saved to: ${filePath}`);

        return filePath;
    }

    /**
     * Generates thumbnails for each topic in order. Every topic yields exactly
     * one result; a failure is recorded and the batch moves on.
     */
    async generateMultipleThumbnails(
        topics: readonly string[],
        options?: GenerationOptionsInput
    ): Promise<GenerationResult[]> {
        const results: GenerationResult[] = [];

        for (const [index, topic] of topics.entries()) {
            try {
                const filePath = await this.generateThumbnail(topic, options);
                results.push(successResult(topic, filePath));
            } catch (error) {
                const { kind, message } = describeError(error);
                console.error(`[ThumbnailClient] Failed to generate thumbnail for "${topic}": ${message}`);
                results.push(failureResult(topic, message, kind));
            }

            if (this.batchDelayMs > 0 && index < topics.length - 1) {
                await new Promise(resolve => setTimeout(resolve, this.batchDelayMs));
            }
        }

        return results;
    }
}
