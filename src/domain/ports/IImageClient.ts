import { GenerationOptions } from '../entities/Thumbnail';

/**
 * ImageGenerationResult from an image generation request.
 */
export interface ImageGenerationResult {
    /** URL of the generated image (short-lived on most providers) */
    imageUrl: string;
    /** Resolution reported by the provider, e.g. "1312x736" */
    resolution?: string;
    /** Seed reported by the provider */
    seed?: number;
}

/**
 * IImageClient - Port for image generation services.
 * Implementations: IdeogramImageClient
 */
export interface IImageClient {
    /**
     * Generates an image from a text prompt.
     */
    generateImage(prompt: string, options: GenerationOptions): Promise<ImageGenerationResult>;

    /**
     * Fetches the bytes behind a generated image URL.
     */
    downloadImage(imageUrl: string): Promise<Buffer>;
}
