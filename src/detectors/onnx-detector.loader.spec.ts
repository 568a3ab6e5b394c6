import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { OnnxDetectorLoader } from './onnx-detector.loader';

const options = { modelId: 'yolov5n', confidenceThreshold: 0.25, iouThreshold: 0.45, inputSize: 640 };

describe('OnnxDetectorLoader', () => {
    it('fails when the model file is missing', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'models-'));
        const loader = new OnnxDetectorLoader(new ConfigService({ detection: { model: { dir } } }));

        await expect(loader.load(options)).rejects.toThrow(`Model file not found: ${path.join(dir, 'yolov5n.onnx')}`);
    });

    it('fails when no class list is available', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'models-'));
        await fs.writeFile(path.join(dir, 'yolov5n.onnx'), 'not a model');
        const loader = new OnnxDetectorLoader(new ConfigService({ detection: { model: { dir } } }));

        await expect(loader.load(options)).rejects.toThrow(`No class names found for yolov5n in ${dir}`);
    });
});
