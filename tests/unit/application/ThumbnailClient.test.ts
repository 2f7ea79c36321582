import { ThumbnailClient } from '../../../src/application/ThumbnailClient';
import { IImageClient } from '../../../src/domain/ports/IImageClient';
import { IThumbnailStore } from '../../../src/domain/ports/IThumbnailStore';
import { ApiError, ConfigError, IOError, ValidationError } from '../../../src/domain/errors/ThumbnailErrors';

describe('ThumbnailClient', () => {
    let mockImageClient: jest.Mocked<IImageClient>;
    let mockStore: jest.Mocked<IThumbnailStore>;
    let client: ThumbnailClient;

    beforeEach(() => {
        mockImageClient = {
            generateImage: jest.fn().mockResolvedValue({ imageUrl: 'https://ideogram.test/images/1.png' }),
            downloadImage: jest.fn().mockResolvedValue(Buffer.from('png-bytes')),
        };
        mockStore = {
            save: jest.fn().mockImplementation(async (baseName: string) => `thumbnails/${baseName}.png`),
        };
        client = new ThumbnailClient(mockImageClient, mockStore);

        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('constructor', () => {
        it('should reject a negative batch delay', () => {
            expect(() => new ThumbnailClient(mockImageClient, mockStore, { batchDelayMs: -5 }))
                .toThrow(ConfigError);
        });
    });

    describe('generateThumbnail', () => {
        it('should generate, download and save a thumbnail', async () => {
            const filePath = await client.generateThumbnail('Machine Learning Basics', {
                aspect_ratio: '16:9',
                style: 'cinematic',
            });

            expect(filePath).toBe('thumbnails/machine-learning-basics.png');
            expect(mockImageClient.generateImage).toHaveBeenCalledWith(
                expect.stringContaining('Render ONLY this text: "MASTER MACHINE LEARNING"'),
                { aspect_ratio: '16:9', style: 'cinematic', quality: 'medium' }
            );
            expect(mockImageClient.downloadImage).toHaveBeenCalledWith('https://ideogram.test/images/1.png');
            expect(mockStore.save).toHaveBeenCalledWith('machine-learning-basics', Buffer.from('png-bytes'));
        });

        it('should trim the topic before use', async () => {
            const filePath = await client.generateThumbnail('  Data Science  ');

            expect(filePath).toBe('thumbnails/data-science.png');
            expect(mockImageClient.generateImage).toHaveBeenCalledWith(
                expect.stringContaining('course thumbnail for "Data Science"'),
                expect.anything()
            );
        });

        it('should reject an empty topic before calling the API', async () => {
            await expect(client.generateThumbnail('   ')).rejects.toThrow(ValidationError);
            expect(mockImageClient.generateImage).not.toHaveBeenCalled();
        });

        it('should reject invalid options before calling the API', async () => {
            await expect(client.generateThumbnail('Data Science', { quality: 'ultra' }))
                .rejects.toThrow(ValidationError);
            expect(mockImageClient.generateImage).not.toHaveBeenCalled();
        });

        it('should propagate ApiError and write nothing', async () => {
            mockImageClient.generateImage.mockRejectedValueOnce(new ApiError('No image data received from API'));

            await expect(client.generateThumbnail('Data Science'))
                .rejects.toThrow('No image data received from API');
            expect(mockStore.save).not.toHaveBeenCalled();
        });

        it('should propagate IOError from the store', async () => {
            mockStore.save.mockRejectedValueOnce(new IOError('Could not write thumbnail: EACCES', 'thumbnails/x.png'));

            await expect(client.generateThumbnail('Data Science')).rejects.toThrow(IOError);
        });
    });

    describe('generateMultipleThumbnails', () => {
        it('should return one result per topic in input order', async () => {
            const results = await client.generateMultipleThumbnails(['Good Topic', '', 'Another Topic']);

            expect(results).toHaveLength(3);
            expect(results[0]).toEqual({
                success: true,
                topic: 'Good Topic',
                filePath: 'thumbnails/good-topic.png',
            });
            expect(results[1]).toEqual({
                success: false,
                topic: '',
                error: 'validation: Topic must not be empty',
                errorKind: 'validation',
            });
            expect(results[2]).toEqual({
                success: true,
                topic: 'Another Topic',
                filePath: 'thumbnails/another-topic.png',
            });
        });

        it('should keep going after an API failure', async () => {
            mockImageClient.generateImage
                .mockRejectedValueOnce(new ApiError('Ideogram API key was rejected (401)', 401))
                .mockResolvedValueOnce({ imageUrl: 'https://ideogram.test/images/2.png' });

            const results = await client.generateMultipleThumbnails(['First', 'Second']);

            expect(results.map(r => r.success)).toEqual([false, true]);
            expect(results[0]).toMatchObject({ errorKind: 'api', error: 'api: Ideogram API key was rejected (401)' });
            expect(mockImageClient.generateImage).toHaveBeenCalledTimes(2);
        });

        it('should record unexpected errors as unknown', async () => {
            mockImageClient.downloadImage.mockRejectedValueOnce(new TypeError('boom'));

            const results = await client.generateMultipleThumbnails(['Only Topic']);

            expect(results).toEqual([
                { success: false, topic: 'Only Topic', error: 'unknown: boom', errorKind: 'unknown' },
            ]);
        });

        it('should apply shared options to every topic', async () => {
            await client.generateMultipleThumbnails(['One', 'Two'], { style: 'flat', quality: 'low' });

            expect(mockImageClient.generateImage).toHaveBeenNthCalledWith(
                1,
                expect.any(String),
                { aspect_ratio: '16:9', style: 'flat', quality: 'low' }
            );
            expect(mockImageClient.generateImage).toHaveBeenNthCalledWith(
                2,
                expect.any(String),
                { aspect_ratio: '16:9', style: 'flat', quality: 'low' }
            );
        });

        it('should return an empty list for no topics', async () => {
            await expect(client.generateMultipleThumbnails([])).resolves.toEqual([]);
        });

        it('should pause between items but not after the last one', async () => {
            const setTimeoutSpy = jest.spyOn(global, 'setTimeout');
            const pausingClient = new ThumbnailClient(mockImageClient, mockStore, { batchDelayMs: 5 });

            await pausingClient.generateMultipleThumbnails(['One', 'Two', 'Three']);

            const pauses = setTimeoutSpy.mock.calls.filter(call => call[1] === 5);
            expect(pauses).toHaveLength(2);
        });
    });
});
