import fs from 'fs';
import path from 'path';
import { IThumbnailStore } from '../../domain/ports/IThumbnailStore';
import { ConfigError, IOError } from '../../domain/errors/ThumbnailErrors';

/**
 * Writes thumbnails as PNG files into a local output directory.
 */
export class LocalThumbnailStore implements IThumbnailStore {
    constructor(private readonly outputDir: string) {
        if (!outputDir || !outputDir.trim()) {
            throw new ConfigError('Output directory is required (set OUTPUT_DIR)');
        }
    }

    /**
     * Creates the output directory (and parents) if it is missing.
     */
    async ensureOutputDir(): Promise<void> {
        try {
            await fs.promises.mkdir(this.outputDir, { recursive: true });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new IOError(`Could not create output directory: ${message}`, this.outputDir, error);
        }
    }

    async save(baseName: string, bytes: Buffer): Promise<string> {
        await this.ensureOutputDir();

        const filePath = path.join(this.outputDir, `${baseName}.png`);
        try {
            await fs.promises.writeFile(filePath, bytes);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new IOError(`Could not write thumbnail: ${message}`, filePath, error);
        }

        console.log(`[ThumbnailStore] Saved ${bytes.length} bytes to ${filePath}`);
        return filePath;
    }
}
