// src/detectors/onnx-detector.loader.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { DetectorLoader, DetectorOptions, ObjectDetector } from '../interfaces/detector.interface';
import { OnnxRuntime, YoloOnnxDetector } from './yolo-onnx.detector';

const FALLBACK_CLASS_FILE = 'coco.names';

/**
 * Loads `<modelDir>/<modelId>.onnx` with class names from `<modelId>.names`
 * beside it, or `coco.names` when the model has no list of its own.
 */
@Injectable()
export class OnnxDetectorLoader implements DetectorLoader {
    private readonly logger = new Logger(OnnxDetectorLoader.name);
    private readonly modelDir: string;

    constructor(private readonly configService: ConfigService) {
        this.modelDir = this.configService.getOrThrow<string>('detection.model.dir');
    }

    async load(options: DetectorOptions): Promise<ObjectDetector> {
        const modelPath = path.join(this.modelDir, `${options.modelId}.onnx`);
        const exists = await fs.access(modelPath).then(() => true, () => false);
        if (!exists) {
            throw new Error(`Model file not found: ${modelPath}`);
        }

        const classNames = await this.readClassNames(options.modelId);
        const ort: OnnxRuntime = await import('onnxruntime-web');
        ort.env.wasm.numThreads = 1;
        const session = await ort.InferenceSession.create(await fs.readFile(modelPath));

        this.logger.log(`Loaded ${modelPath} (${classNames.length} classes)`);
        this.logger.log(`Inputs: ${JSON.stringify(session.inputNames)}, outputs: ${JSON.stringify(session.outputNames)}`);

        return new YoloOnnxDetector(ort.Tensor, session, classNames, options);
    }

    private async readClassNames(modelId: string): Promise<string[]> {
        const candidates = [
            path.join(this.modelDir, `${modelId}.names`),
            path.join(this.modelDir, FALLBACK_CLASS_FILE),
        ];

        for (const file of candidates) {
            const content = await fs.readFile(file, 'utf8').catch(() => null);
            if (content === null) continue;
            const names = content.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
            if (names.length > 0) return names;
        }
        throw new Error(`No class names found for ${modelId} in ${this.modelDir}`);
    }
}
