/**
 * IThumbnailStore - Port for persisting generated thumbnails.
 * Implementations: LocalThumbnailStore
 */
export interface IThumbnailStore {
    /**
     * Writes image bytes under the given base name and returns the written path.
     * An existing file with the same name is overwritten.
     */
    save(baseName: string, bytes: Buffer): Promise<string>;
}
