/**
 * Error kinds surfaced by thumbnail generation.
 */
export type ThumbnailErrorKind = 'config' | 'api' | 'io' | 'validation';

/**
 * Base class for all thumbnail generation errors.
 */
export class ThumbnailError extends Error {
    constructor(
        public readonly kind: ThumbnailErrorKind,
        message: string,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'ThumbnailError';
    }
}

/**
 * Missing or invalid configuration. Raised before any request is made.
 */
export class ConfigError extends ThumbnailError {
    constructor(message: string) {
        super('config', message);
        this.name = 'ConfigError';
    }
}

/**
 * Remote API failure: network error, non-success status or an unusable payload.
 */
export class ApiError extends ThumbnailError {
    constructor(
        message: string,
        public readonly status?: number,
        cause?: unknown
    ) {
        super('api', message, cause);
        this.name = 'ApiError';
    }
}

/**
 * Output directory or file write failure.
 */
export class IOError extends ThumbnailError {
    constructor(
        message: string,
        public readonly path: string,
        cause?: unknown
    ) {
        super('io', message, cause);
        this.name = 'IOError';
    }
}

/**
 * Rejected caller input (empty topic, bad option value).
 */
export class ValidationError extends ThumbnailError {
    constructor(message: string) {
        super('validation', message);
        this.name = 'ValidationError';
    }
}

/**
 * Renders an error as `<kind>: <message>` for batch results and CLI output.
 */
export function describeError(error: unknown): { kind: ThumbnailErrorKind | 'unknown'; message: string } {
    if (error instanceof ThumbnailError) {
        return { kind: error.kind, message: `${error.kind}: ${error.message}` };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { kind: 'unknown', message: `unknown: ${message}` };
}
