// src/config/configuration.ts
import * as path from 'path';

const DEFAULT_ALLOWED_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif', 'bmp', 'webp'];

const toNumber = (value: string | undefined, fallback: number): number => {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
};

const toList = (value: string | undefined, fallback: string[]): string[] => {
    if (!value) return fallback;
    const items = value.split(',').map((item) => item.trim().toLowerCase()).filter(Boolean);
    return items.length > 0 ? items : fallback;
};

export default () => {
    const staticDir = path.resolve(process.env.STATIC_DIR || path.join(process.cwd(), 'static'));
    const resultsDir = path.join(staticDir, 'results');

    return {
        gateway: {
            port: toNumber(process.env.GATEWAY_PORT, 8000),
            detectionServiceUrl: (process.env.DETECTION_SERVICE_URL || 'http://127.0.0.1:8001').replace(/\/+$/, ''),
            requestTimeoutMs: 30_000,
            healthTimeoutMs: 5_000,
            uploadDir: path.resolve(process.env.UPLOAD_DIR || path.join(staticDir, 'uploads')),
            maxUploadBytes: toNumber(process.env.MAX_UPLOAD_BYTES, 16 * 1024 * 1024),
            allowedExtensions: toList(process.env.ALLOWED_EXTENSIONS, DEFAULT_ALLOWED_EXTENSIONS),
        },
        detection: {
            port: toNumber(process.env.DETECTION_PORT, 8001),
            staticDir,
            resultsDir,
            imageDir: path.join(resultsDir, 'image'),
            jsonDir: path.join(resultsDir, 'json'),
            publicPrefix: '/static/results',
            model: {
                id: process.env.MODEL_ID || 'yolov5n',
                dir: path.resolve(process.env.MODEL_DIR || path.join(process.cwd(), 'models')),
                confidenceThreshold: toNumber(process.env.MODEL_CONFIDENCE, 0.25),
                iouThreshold: toNumber(process.env.MODEL_IOU, 0.45),
                inputSize: toNumber(process.env.MODEL_INPUT_SIZE, 640),
            },
        },
        retention: {
            ttlHours: toNumber(process.env.ARTIFACT_TTL_HOURS, 0),
            sweepIntervalMinutes: toNumber(process.env.RETENTION_SWEEP_MINUTES, 60),
        },
    };
};
