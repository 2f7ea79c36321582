import axios from 'axios';
import { IImageClient, ImageGenerationResult } from '../../domain/ports/IImageClient';
import { GenerationOptions, ThumbnailQuality } from '../../domain/entities/Thumbnail';
import { ApiError, ConfigError } from '../../domain/errors/ThumbnailErrors';

export const IDEOGRAM_BASE_URL = 'https://api.ideogram.ai';

export type IdeogramRenderingSpeed = 'TURBO' | 'DEFAULT' | 'QUALITY';

const RENDERING_SPEED_BY_QUALITY: Record<ThumbnailQuality, IdeogramRenderingSpeed> = {
    low: 'TURBO',
    medium: 'DEFAULT',
    high: 'QUALITY',
};

/**
 * Request body for POST /v1/ideogram-v3/generate.
 */
export interface IdeogramGenerateRequest {
    prompt: string;
    aspect_ratio: string;
    rendering_speed: IdeogramRenderingSpeed;
    magic_prompt: 'AUTO' | 'ON' | 'OFF';
}

/**
 * Ideogram v3 image generation client.
 */
export class IdeogramImageClient implements IImageClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly timeout: number;

    constructor(
        apiKey: string,
        baseUrl: string = IDEOGRAM_BASE_URL,
        timeout: number = 30000
    ) {
        if (!apiKey || !apiKey.trim()) {
            throw new ConfigError('Ideogram API key is required (set IDEOGRAM_API_KEY)');
        }
        if (!Number.isFinite(timeout) || timeout <= 0) {
            throw new ConfigError(`Ideogram request timeout must be greater than 0, got: ${timeout}`);
        }
        this.apiKey = apiKey.trim();
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.timeout = timeout;
    }

    /**
     * Builds the JSON body sent to the generate endpoint.
     */
    buildRequest(prompt: string, options: GenerationOptions): IdeogramGenerateRequest {
        return {
            prompt,
            // Ideogram spells ratios as 16x9
            aspect_ratio: options.aspect_ratio.replace(':', 'x'),
            rendering_speed: RENDERING_SPEED_BY_QUALITY[options.quality],
            magic_prompt: 'OFF',
        };
    }

    async generateImage(prompt: string, options: GenerationOptions): Promise<ImageGenerationResult> {
        const body = this.buildRequest(prompt, options);

        console.log(`[Ideogram] Sending request (aspect ${body.aspect_ratio}, ${body.rendering_speed})...`);
        const startTime = Date.now();

        let responseData: unknown;
        try {
            const response = await axios.post<unknown>(`${this.baseUrl}/v1/ideogram-v3/generate`, body, {
                headers: {
                    'Api-Key': this.apiKey,
                    'Content-Type': 'application/json',
                },
                timeout: this.timeout,
            });
            responseData = response.data;
        } catch (error) {
            throw this.toApiError('Image generation', error);
        }

        const result = this.extractImage(responseData);
        const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
        const details = [result.resolution, result.seed !== undefined ? `seed ${result.seed}` : undefined]
            .filter((part): part is string => part !== undefined);
        console.log(`[Ideogram] Image generated in ${elapsed}s${details.length > 0 ? ` (${details.join(', ')})` : ''}`);

        return result;
    }

    async downloadImage(imageUrl: string): Promise<Buffer> {
        let data: unknown;
        try {
            const response = await axios.get<unknown>(imageUrl, {
                responseType: 'arraybuffer',
                timeout: this.timeout,
            });
            data = response.data;
        } catch (error) {
            throw this.toApiError('Image download', error);
        }

        let bytes: Buffer;
        if (Buffer.isBuffer(data)) {
            bytes = data;
        } else if (data instanceof ArrayBuffer) {
            bytes = Buffer.from(data);
        } else {
            throw new ApiError('Image download returned an unexpected payload');
        }

        if (bytes.length === 0) {
            throw new ApiError('No image data received from API (empty download)');
        }

        console.log(`[Ideogram] Downloaded ${bytes.length} bytes`);
        return bytes;
    }

    /**
     * Extracts the first image from a generate response:
     * { created, data: [{ url, resolution, seed, ... }] }
     */
    private extractImage(data: unknown): ImageGenerationResult {
        if (!isRecord(data)) {
            throw new ApiError('Malformed response from Ideogram API');
        }

        const images = data.data;
        if (!Array.isArray(images) || images.length === 0) {
            throw new ApiError('No image data received from API');
        }

        const first: unknown = images[0];
        if (!isRecord(first) || typeof first.url !== 'string' || !first.url) {
            throw new ApiError('No image data received from API (missing image URL)');
        }

        return {
            imageUrl: first.url,
            resolution: typeof first.resolution === 'string' ? first.resolution : undefined,
            seed: typeof first.seed === 'number' ? first.seed : undefined,
        };
    }

    private toApiError(operation: string, error: unknown): ApiError {
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            const message = extractErrorMessage(error.response?.data) || error.message;

            console.error(`[Ideogram] ${operation} failed (${status || error.code}):`, message);

            if (status === 401 || status === 403) {
                return new ApiError(`Ideogram API key was rejected (${status})`, status, error);
            }
            if (error.code === 'ECONNABORTED') {
                return new ApiError(`${operation} timed out after ${this.timeout}ms`, undefined, error);
            }
            return new ApiError(`${operation} failed (${status || error.code}): ${message}`, status, error);
        }

        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Ideogram] ${operation} failed:`, message);
        return new ApiError(`${operation} failed: ${message}`, undefined, error);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractErrorMessage(data: unknown): string | undefined {
    if (typeof data === 'string') {
        return data || undefined;
    }
    if (!isRecord(data)) {
        return undefined;
    }
    for (const key of ['error', 'message', 'detail']) {
        const value = data[key];
        if (typeof value === 'string' && value) {
            return value;
        }
    }
    return undefined;
}
