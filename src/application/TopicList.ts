import fs from 'fs';
import { IOError } from '../domain/errors/ThumbnailErrors';

// "1. ", "2) ", "3: " or "12 " at the start of a line; "3D Modeling" is left alone
const LEADING_NUMBER = /^\d+(?:[.):]\s*|\s+)/;

/**
 * Parses a topic list: one topic per line, blank lines skipped,
 * leading numbering removed.
 */
export function parseTopicList(content: string): string[] {
    return content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .map((line) => line.replace(LEADING_NUMBER, '').trim())
        .filter((line) => line.length > 0);
}

export async function readTopicsFromFile(filePath: string): Promise<string[]> {
    let content: string;
    try {
        content = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new IOError(`Could not read topic file: ${message}`, filePath, error);
    }
    return parseTopicList(content);
}
