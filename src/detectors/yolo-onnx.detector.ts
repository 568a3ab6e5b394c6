// src/detectors/yolo-onnx.detector.ts
import { Logger } from '@nestjs/common';
import sharp from 'sharp';
import type { InferenceSession, Tensor } from 'onnxruntime-web';
import {
    DecodedImage,
    DetectorOptions,
    ObjectDetector,
    RawDetection,
} from '../interfaces/detector.interface';
import {
    decodeYoloOutput,
    letterboxGeometry,
    nonMaxSuppression,
    toOriginalFrame,
    YoloOutput,
} from '../utils/yolo-postprocess';

export type OnnxRuntime = typeof import('onnxruntime-web');

/** The part of an ONNX Runtime session the detector drives. */
export type YoloSession = Pick<InferenceSession, 'inputNames' | 'outputNames' | 'run' | 'release'>;

const LETTERBOX_FILL = 114;
const MAX_DETECTIONS = 300;

/**
 * YOLO detector on an ONNX Runtime session. Expects a single image input of
 * shape `[1, 3, S, S]` with RGB values scaled to [0, 1].
 */
export class YoloOnnxDetector implements ObjectDetector {
    private readonly logger = new Logger(YoloOnnxDetector.name);

    constructor(
        private readonly TensorType: OnnxRuntime['Tensor'],
        private readonly session: YoloSession,
        private readonly classNames: string[],
        private readonly options: DetectorOptions,
    ) {}

    get name(): string {
        return this.options.modelId;
    }

    async detect(image: DecodedImage): Promise<RawDetection[]> {
        const size = this.options.inputSize;
        const geometry = letterboxGeometry(image.width, image.height, size);
        const input = await this.preprocess(image, size, geometry.newWidth, geometry.newHeight, geometry.padX, geometry.padY);

        const results = await this.session.run({ [this.session.inputNames[0]]: input });
        const output = this.pickDetectionOutput(results);

        const candidates = decodeYoloOutput(output, this.classNames.length, this.options.confidenceThreshold);
        const kept = nonMaxSuppression(candidates, this.options.iouThreshold, MAX_DETECTIONS);
        this.logger.debug(`Candidates: ${candidates.length}, after NMS: ${kept.length}`);

        return kept.map((candidate) => ({
            label: this.classNames[candidate.classId],
            score: candidate.score,
            box: toOriginalFrame(candidate, geometry, image.width, image.height),
        }));
    }

    async dispose(): Promise<void> {
        await this.session.release();
    }

    private async preprocess(
        image: DecodedImage,
        size: number,
        newWidth: number,
        newHeight: number,
        padX: number,
        padY: number,
    ): Promise<Tensor> {
        const resized = await sharp(image.data, {
            raw: { width: image.width, height: image.height, channels: image.channels },
        })
            .resize(newWidth, newHeight, { fit: 'fill' })
            .raw()
            .toBuffer();

        const canvas = Buffer.alloc(size * size * 3, LETTERBOX_FILL);
        for (let y = 0; y < newHeight; y++) {
            const srcStart = y * newWidth * 3;
            resized.copy(canvas, ((padY + y) * size + padX) * 3, srcStart, srcStart + newWidth * 3);
        }

        // HWC → CHW, [0..255] → [0..1]
        const area = size * size;
        const chw = new Float32Array(3 * area);
        for (let i = 0; i < area; i++) {
            chw[i] = canvas[i * 3] / 255;
            chw[area + i] = canvas[i * 3 + 1] / 255;
            chw[2 * area + i] = canvas[i * 3 + 2] / 255;
        }

        return new this.TensorType('float32', chw, [1, 3, size, size]);
    }

    private pickDetectionOutput(results: InferenceSession.OnnxValueMapType): YoloOutput {
        const numClasses = this.classNames.length;
        const outputs: YoloOutput[] = [];

        for (const name of this.session.outputNames) {
            const value = results[name];
            if (value && value.data instanceof Float32Array) {
                outputs.push({ data: value.data, dims: value.dims });
            }
        }

        const match = outputs.find(({ dims }) =>
            dims.length === 3 && dims[0] === 1 && [4 + numClasses, 5 + numClasses].some((c) => dims[1] === c || dims[2] === c));
        const output = match ?? outputs[0];
        if (!output) {
            throw new Error('Model produced no float32 output');
        }
        return output;
    }
}
