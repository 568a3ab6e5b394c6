import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    claimUniqueStem,
    extensionOf,
    fileStamp,
    isPlainFileName,
    removeQuietly,
    secureFilename,
} from './file-naming.utils';

describe('file naming utils', () => {
    describe('secureFilename', () => {
        it('joins whitespace runs with underscores', () => {
            expect(secureFilename('my  holiday photo.JPG')).toBe('my_holiday_photo.JPG');
        });

        it('drops path components that would climb out of a directory', () => {
            expect(secureFilename('../../etc/passwd')).toBe('etc_passwd');
            expect(secureFilename('C:\\Users\\me\\cat.png')).toBe('C_Users_me_cat.png');
        });

        it('folds accents to ASCII and removes other characters', () => {
            expect(secureFilename('café menu.png')).toBe('cafe_menu.png');
            expect(secureFilename('a$b%c.jpg')).toBe('abc.jpg');
        });

        it('strips leading and trailing dots and underscores', () => {
            expect(secureFilename('._hidden.gif_')).toBe('hidden.gif');
        });
    });

    it('extensionOf lower-cases the text after the last dot', () => {
        expect(extensionOf('archive.tar.PNG')).toBe('png');
        expect(extensionOf('no-extension')).toBe('');
        expect(extensionOf('trailing.')).toBe('');
    });

    it('fileStamp has one-second granularity', () => {
        expect(fileStamp(new Date(2024, 0, 2, 3, 4, 5, 999))).toBe('20240102_030405');
    });

    it('isPlainFileName rejects anything that is not a bare name', () => {
        expect(isPlainFileName('result_20240102_030405_cat.jpg')).toBe(true);
        expect(isPlainFileName('../secret.json')).toBe(false);
        expect(isPlainFileName('..')).toBe(false);
        expect(isPlainFileName('')).toBe(false);
        expect(isPlainFileName('a\\b.jpg')).toBe(false);
    });

    describe('claimUniqueStem', () => {
        let imageDir: string;
        let jsonDir: string;

        beforeEach(async () => {
            const root = await fs.mkdtemp(path.join(os.tmpdir(), 'naming-'));
            imageDir = path.join(root, 'image');
            jsonDir = path.join(root, 'json');
            await fs.mkdir(imageDir);
            await fs.mkdir(jsonDir);
        });

        const targets = () => [
            { dir: imageDir, ext: '.jpg' },
            { dir: jsonDir, ext: '.json' },
        ];

        it('suffixes the stem when the same name is claimed twice', async () => {
            const first = await claimUniqueStem('result_20240102_030405_cat', targets());
            const second = await claimUniqueStem('result_20240102_030405_cat', targets());

            expect(first).toBe('result_20240102_030405_cat');
            expect(second).toBe('result_20240102_030405_cat_1');
            expect((await fs.readdir(imageDir)).sort()).toEqual([
                'result_20240102_030405_cat.jpg',
                'result_20240102_030405_cat_1.jpg',
            ]);
        });

        it('moves on when only one of the paired files is taken, releasing the other', async () => {
            await fs.writeFile(path.join(jsonDir, 'result_x.json'), '{}');

            const stem = await claimUniqueStem('result_x', targets());

            expect(stem).toBe('result_x_1');
            expect(await fs.readdir(imageDir)).toEqual(['result_x_1.jpg']);
        });

        it('takes the next suffix when the plain name already exists on disk', async () => {
            await fs.writeFile(path.join(imageDir, 'a.jpg'), 'existing');

            await expect(claimUniqueStem('a', [{ dir: imageDir, ext: '.jpg' }])).resolves.toBe('a_1');
            expect(await fs.readFile(path.join(imageDir, 'a.jpg'), 'utf8')).toBe('existing');
        });

        it('rethrows failures other than a taken name', async () => {
            const missingDir = path.join(imageDir, 'missing');

            await expect(claimUniqueStem('a', [{ dir: missingDir, ext: '.jpg' }])).rejects.toMatchObject({ code: 'ENOENT' });
        });

        it('hands out distinct stems to concurrent claims', async () => {
            const stems = await Promise.all([1, 2, 3, 4].map(() => claimUniqueStem('result_y', targets())));
            expect(new Set(stems).size).toBe(4);
        });
    });

    it('removeQuietly ignores files that are already gone', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'remove-'));
        const present = path.join(dir, 'present.txt');
        await fs.writeFile(present, 'x');

        await removeQuietly([present, path.join(dir, 'missing.txt')]);

        expect(await fs.readdir(dir)).toEqual([]);
    });
});
