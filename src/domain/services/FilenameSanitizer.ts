export const MAX_FILENAME_LENGTH = 50;

const FALLBACK_FILENAME = 'thumbnail';

/**
 * Turns a topic into a filesystem-safe slug: lowercase ascii letters and
 * digits separated by single hyphens, at most MAX_FILENAME_LENGTH characters.
 *
 * sanitizeFilename(sanitizeFilename(x)) === sanitizeFilename(x)
 */
export function sanitizeFilename(topic: string): string {
    const slug = topic
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .substring(0, MAX_FILENAME_LENGTH)
        .replace(/-+$/, '');

    return slug || FALLBACK_FILENAME;
}
