import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DetectionResult } from '../interfaces/detection-result.interface';
import { ArtifactRefs, ArtifactStoreService } from './artifact-store.service';

const stamp = new Date(2024, 0, 2, 3, 4, 5);

const resultFor = (refs: ArtifactRefs): DetectionResult => ({
    success: true,
    image_name: 'my cat.png',
    image_size: { width: 4, height: 3 },
    detections_count: 0,
    detections: [],
    result_image: refs.imageUrl,
    result_json: refs.jsonUrl,
    timestamp: '2024-01-02T03:04:05.000Z',
});

describe('ArtifactStoreService', () => {
    let store: ArtifactStoreService;
    let imageDir: string;
    let jsonDir: string;

    beforeEach(async () => {
        const root = await fs.mkdtemp(path.join(os.tmpdir(), 'artifacts-'));
        imageDir = path.join(root, 'results', 'image');
        jsonDir = path.join(root, 'results', 'json');
        store = new ArtifactStoreService(
            new ConfigService({ detection: { imageDir, jsonDir, publicPrefix: '/static/results' } }),
        );
        await store.onModuleInit();
    });

    it('names both artifacts after the upload and the second it was processed', async () => {
        const result = await store.persist('my cat.png', Buffer.from('jpeg-bytes'), resultFor, stamp);

        expect(result.result_image).toBe('/static/results/image/result_20240102_030405_my_cat.jpg');
        expect(result.result_json).toBe('/static/results/json/result_20240102_030405_my_cat.json');
        expect(await fs.readFile(path.join(imageDir, 'result_20240102_030405_my_cat.jpg'), 'utf8')).toBe('jpeg-bytes');
    });

    it('writes JSON that reads back equal to the returned result', async () => {
        const result = await store.persist('my cat.png', Buffer.from('jpeg-bytes'), resultFor, stamp);

        const stored: unknown = JSON.parse(
            await fs.readFile(path.join(jsonDir, 'result_20240102_030405_my_cat.json'), 'utf8'),
        );
        expect(stored).toEqual(result);
    });

    it('gives two requests in the same second distinct names', async () => {
        const [first, second] = await Promise.all([
            store.persist('my cat.png', Buffer.from('a'), resultFor, stamp),
            store.persist('my cat.png', Buffer.from('b'), resultFor, stamp),
        ]);

        expect(new Set([first.result_json, second.result_json]).size).toBe(2);
        expect((await fs.readdir(jsonDir)).sort()).toEqual([
            'result_20240102_030405_my_cat.json',
            'result_20240102_030405_my_cat_1.json',
        ]);
    });

    it('falls back to a generic name when nothing of the original survives', async () => {
        const result = await store.persist('你好', Buffer.from('a'), resultFor, stamp);

        expect(result.result_image).toBe('/static/results/image/result_20240102_030405_image.jpg');
    });

    it('leaves neither file behind when building the result fails', async () => {
        const failing = () => {
            throw new Error('cannot build');
        };

        await expect(store.persist('my cat.png', Buffer.from('a'), failing, stamp)).rejects.toThrow('cannot build');

        expect(await fs.readdir(imageDir)).toEqual([]);
        expect(await fs.readdir(jsonDir)).toEqual([]);
    });

    it('releases both claimed names when writing the image fails', async () => {
        const spy = jest.spyOn(fs, 'writeFile').mockRejectedValueOnce(new Error('disk full'));

        await expect(store.persist('my cat.png', Buffer.from('a'), resultFor, stamp)).rejects.toThrow('disk full');
        spy.mockRestore();

        expect(await fs.readdir(imageDir)).toEqual([]);
        expect(await fs.readdir(jsonDir)).toEqual([]);
    });

    it('finds stored artifacts by bare file name only', async () => {
        await store.persist('my cat.png', Buffer.from('a'), resultFor, stamp);

        expect(await store.find('result_20240102_030405_my_cat.jpg')).toBe(
            path.join(imageDir, 'result_20240102_030405_my_cat.jpg'),
        );
        expect(await store.find('result_20240102_030405_my_cat.json')).toBe(
            path.join(jsonDir, 'result_20240102_030405_my_cat.json'),
        );
        expect(await store.find('missing.jpg')).toBeNull();
        expect(await store.find('../image/result_20240102_030405_my_cat.jpg')).toBeNull();
    });
});
