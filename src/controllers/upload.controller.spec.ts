import { INestApplication } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { Test } from '@nestjs/testing';
import { AxiosError } from 'axios';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { of, throwError } from 'rxjs';
import request from 'supertest';
import { GatewayModule } from '../modules/gateway.module';
import { solidImage } from '../testing/fake-detector';
import { GATEWAY_SERVICE_NAME } from './upload.controller';

describe('UploadController', () => {
    const httpService = { post: jest.fn(), get: jest.fn() };
    let app: INestApplication;
    let uploadDir: string;
    let png: Buffer;

    const detectionResult = {
        success: true,
        image_name: 'cat.png',
        image_size: { width: 40, height: 30 },
        detections_count: 0,
        detections: [],
        result_image: '/static/results/image/result_20240102_030405_cat.jpg',
        result_json: '/static/results/json/result_20240102_030405_cat.json',
        timestamp: '2024-01-02T03:04:05.000Z',
    };

    beforeAll(async () => {
        uploadDir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'gateway-')), 'uploads');
        process.env.UPLOAD_DIR = uploadDir;
        process.env.DETECTION_SERVICE_URL = 'http://detector.test';
        png = await solidImage(40, 30);

        const moduleRef = await Test.createTestingModule({ imports: [GatewayModule] })
            .overrideProvider(HttpService)
            .useValue(httpService)
            .compile();

        app = moduleRef.createNestApplication();
        await app.init();
    });

    afterAll(async () => {
        await app.close();
        delete process.env.UPLOAD_DIR;
        delete process.env.DETECTION_SERVICE_URL;
    });

    beforeEach(async () => {
        jest.resetAllMocks();
        for (const name of await fs.readdir(uploadDir)) {
            await fs.rm(path.join(uploadDir, name), { force: true });
        }
    });

    it('forwards a valid upload and returns the detection result', async () => {
        httpService.post.mockReturnValue(of({ status: 200, data: detectionResult }));

        const res = await request(app.getHttpServer())
            .post('/upload')
            .attach('image', png, { filename: 'cat.png', contentType: 'image/png' })
            .expect(200);

        expect(res.body).toEqual(detectionResult);
        expect(httpService.post.mock.calls[0][0]).toBe('http://detector.test/detect');
        const staged = await fs.readdir(uploadDir);
        expect(staged).toHaveLength(1);
        expect(staged[0]).toMatch(/^\d{8}_\d{6}_cat\.png$/);
    });

    it('rejects a request without an image', async () => {
        const res = await request(app.getHttpServer()).post('/upload').expect(400);

        expect(res.body).toEqual({ success: false, error: 'No image file provided' });
        expect(httpService.post).not.toHaveBeenCalled();
    });

    it('rejects a disallowed extension without staging anything', async () => {
        const res = await request(app.getHttpServer())
            .post('/upload')
            .attach('image', Buffer.from('hello'), { filename: 'notes.txt', contentType: 'text/plain' })
            .expect(400);

        expect(res.body).toEqual({
            success: false,
            error: 'Invalid file type. Allowed: png, jpg, jpeg, gif, bmp, webp',
        });
        expect(await fs.readdir(uploadDir)).toEqual([]);
        expect(httpService.post).not.toHaveBeenCalled();
    });

    it('rejects a corrupt image and removes the staged copy', async () => {
        const res = await request(app.getHttpServer())
            .post('/upload')
            .attach('image', Buffer.from('not a png at all'), { filename: 'broken.png', contentType: 'image/png' })
            .expect(400);

        expect(res.body).toEqual({ success: false, error: 'Invalid image file' });
        expect(await fs.readdir(uploadDir)).toEqual([]);
        expect(httpService.post).not.toHaveBeenCalled();
    });

    it('answers 503 when the detection service is down', async () => {
        httpService.post.mockReturnValue(throwError(() => new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED')));

        const res = await request(app.getHttpServer())
            .post('/upload')
            .attach('image', png, { filename: 'cat.png', contentType: 'image/png' })
            .expect(503);

        expect(res.body).toEqual({
            success: false,
            error: 'Detection service unreachable. Please ensure it is running.',
        });
    });

    it('answers 504 when the detection service times out', async () => {
        httpService.post.mockReturnValue(
            throwError(() => new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED')),
        );

        const res = await request(app.getHttpServer())
            .post('/upload')
            .attach('image', png, { filename: 'cat.png', contentType: 'image/png' })
            .expect(504);

        expect(res.body).toEqual({ success: false, error: 'Detection service request timeout' });
    });

    it('passes on the status and detail of a detection service error', async () => {
        httpService.post.mockReturnValue(of({ status: 500, data: { detail: 'Detection failed: out of memory' } }));

        const res = await request(app.getHttpServer())
            .post('/upload')
            .attach('image', png, { filename: 'cat.png', contentType: 'image/png' })
            .expect(500);

        expect(res.body).toEqual({
            success: false,
            error: 'Detection service error: Detection failed: out of memory',
        });
    });

    it('GET /health embeds the detection service health', async () => {
        httpService.get.mockReturnValue(of({ status: 200, data: { status: 'healthy', model_loaded: true } }));

        const res = await request(app.getHttpServer()).get('/health').expect(200);

        expect(res.body).toMatchObject({
            status: 'healthy',
            service: GATEWAY_SERVICE_NAME,
            detection_service: { status: 'healthy', model_loaded: true },
        });
        expect(Number.isNaN(Date.parse(res.body.timestamp))).toBe(false);
    });

    it('serves staged uploads by name', async () => {
        httpService.post.mockReturnValue(of({ status: 200, data: detectionResult }));
        await request(app.getHttpServer())
            .post('/upload')
            .attach('image', png, { filename: 'cat.png', contentType: 'image/png' })
            .expect(200);
        const [stagedName] = await fs.readdir(uploadDir);

        await request(app.getHttpServer()).get(`/uploads/${stagedName}`).expect(200).expect('Content-Type', 'image/png');
        await request(app.getHttpServer()).get('/uploads/missing.png').expect(404);
    });
});
