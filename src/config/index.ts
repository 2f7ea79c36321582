import dotenv from 'dotenv';
import { ConfigError } from '../domain/errors/ThumbnailErrors';
import { DEFAULT_GENERATION_OPTIONS, GenerationOptionsInput } from '../domain/entities/Thumbnail';
import { IDEOGRAM_BASE_URL } from '../infrastructure/images/IdeogramImageClient';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Ideogram
    ideogramApiKey: string;
    ideogramBaseUrl: string;
    requestTimeoutMs: number;

    // Output
    outputDir: string;

    // Batch
    batchDelayMs: number;
    coursesFile: string;

    // Defaults applied by the CLI entry points
    generationDefaults: GenerationOptionsInput;
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
    let value = env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new ConfigError(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(env: Env, key: string, defaultValue?: number): number {
    const value = getEnvVar(env, key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new ConfigError(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

/**
 * Loads configuration from the given environment (process.env by default).
 * A missing or blank IDEOGRAM_API_KEY throws a ConfigError.
 */
export function loadConfig(env: Env = process.env): Config {
    const ideogramApiKey = getEnvVar(env, 'IDEOGRAM_API_KEY');
    if (!ideogramApiKey) {
        throw new ConfigError('IDEOGRAM_API_KEY is required. Please set it in your .env file.');
    }

    return {
        ideogramApiKey,
        ideogramBaseUrl: getEnvVar(env, 'IDEOGRAM_BASE_URL', IDEOGRAM_BASE_URL),
        requestTimeoutMs: getEnvVarNumber(env, 'IDEOGRAM_TIMEOUT_MS', 30000),

        outputDir: getEnvVar(env, 'OUTPUT_DIR', './thumbnails'),

        batchDelayMs: getEnvVarNumber(env, 'THUMBNAIL_BATCH_DELAY_MS', 1000),
        coursesFile: getEnvVar(env, 'COURSES_FILE', 'course.txt'),

        generationDefaults: {
            aspect_ratio: getEnvVar(env, 'THUMBNAIL_ASPECT_RATIO', DEFAULT_GENERATION_OPTIONS.aspect_ratio),
            style: getEnvVar(env, 'THUMBNAIL_STYLE', DEFAULT_GENERATION_OPTIONS.style),
            quality: getEnvVar(env, 'THUMBNAIL_QUALITY', DEFAULT_GENERATION_OPTIONS.quality),
        },
    };
}

/**
 * Returns a list of problems with an otherwise loaded configuration.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.ideogramApiKey) {
        errors.push('IDEOGRAM_API_KEY is required for image generation');
    }
    if (!config.outputDir) {
        errors.push('OUTPUT_DIR must not be empty');
    }
    if (config.requestTimeoutMs <= 0) {
        errors.push('IDEOGRAM_TIMEOUT_MS must be greater than 0');
    }
    if (config.batchDelayMs < 0) {
        errors.push('THUMBNAIL_BATCH_DELAY_MS must not be negative');
    }

    return errors;
}
