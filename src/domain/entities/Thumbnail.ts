import { ValidationError, ThumbnailErrorKind } from '../errors/ThumbnailErrors';

export type ThumbnailQuality = 'low' | 'medium' | 'high';

export const THUMBNAIL_QUALITIES: readonly ThumbnailQuality[] = ['low', 'medium', 'high'];

/**
 * Options applied to a single generation request.
 */
export interface GenerationOptions {
    /** Width:height, e.g. "16:9" (also accepts "16x9") */
    aspect_ratio: string;
    /** Visual style folded into the prompt */
    style: string;
    /** Rendering quality; trades speed for detail */
    quality: ThumbnailQuality;
}

export const DEFAULT_GENERATION_OPTIONS: Readonly<GenerationOptions> = Object.freeze({
    aspect_ratio: '16:9',
    style: 'cinematic',
    quality: 'medium',
});

/**
 * Caller-supplied options. Values are plain strings so they can come straight
 * from argv or the environment; resolveGenerationOptions validates them.
 */
export interface GenerationOptionsInput {
    aspect_ratio?: string;
    style?: string;
    quality?: string;
}

const RECOGNIZED_OPTION_KEYS: readonly string[] = Object.keys(DEFAULT_GENERATION_OPTIONS);

const ASPECT_RATIO_PATTERN = /^([1-9]\d*)\s*[:x]\s*([1-9]\d*)$/i;

function isThumbnailQuality(value: string): value is ThumbnailQuality {
    return THUMBNAIL_QUALITIES.some((quality) => quality === value);
}

/**
 * Merges caller options over the defaults.
 *
 * Unknown keys are ignored (and logged); recognized keys with unusable values
 * throw a ValidationError. Aspect ratios are normalized to "W:H".
 */
export function resolveGenerationOptions(options?: GenerationOptionsInput): GenerationOptions {
    if (!options) {
        return { ...DEFAULT_GENERATION_OPTIONS };
    }

    const unknownKeys = Object.keys(options).filter((key) => !RECOGNIZED_OPTION_KEYS.includes(key));
    if (unknownKeys.length > 0) {
        console.warn(`[ThumbnailOptions] Ignoring unknown options: ${unknownKeys.join(', ')}`);
    }

    const aspectRatio = (options.aspect_ratio ?? DEFAULT_GENERATION_OPTIONS.aspect_ratio).trim();
    const ratioMatch = ASPECT_RATIO_PATTERN.exec(aspectRatio);
    if (!ratioMatch) {
        throw new ValidationError(`Invalid aspect_ratio "${aspectRatio}" (expected e.g. 16:9)`);
    }

    const style = (options.style ?? DEFAULT_GENERATION_OPTIONS.style).trim();
    if (!style) {
        throw new ValidationError('style must not be empty');
    }

    const quality = (options.quality ?? DEFAULT_GENERATION_OPTIONS.quality).trim().toLowerCase();
    if (!isThumbnailQuality(quality)) {
        throw new ValidationError(`Invalid quality "${quality}" (expected one of ${THUMBNAIL_QUALITIES.join(', ')})`);
    }

    return {
        aspect_ratio: `${ratioMatch[1]}:${ratioMatch[2]}`,
        style,
        quality,
    };
}

export interface ThumbnailSuccess {
    readonly success: true;
    readonly topic: string;
    readonly filePath: string;
}

export interface ThumbnailFailure {
    readonly success: false;
    readonly topic: string;
    readonly error: string;
    readonly errorKind: ThumbnailErrorKind | 'unknown';
}

/**
 * Outcome of one batch item.
 */
export type GenerationResult = ThumbnailSuccess | ThumbnailFailure;

export function successResult(topic: string, filePath: string): GenerationResult {
    const result: ThumbnailSuccess = { success: true, topic, filePath };
    return Object.freeze(result);
}

export function failureResult(
    topic: string,
    error: string,
    errorKind: ThumbnailErrorKind | 'unknown'
): GenerationResult {
    const result: ThumbnailFailure = { success: false, topic, error, errorKind };
    return Object.freeze(result);
}
