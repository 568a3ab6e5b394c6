// src/services/model.service.ts
import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ModelNotReadyException } from '../exceptions/pipeline.exceptions';
import {
    DETECTOR_LOADER,
    DecodedImage,
    DetectorLoader,
    DetectorOptions,
    ObjectDetector,
    RawDetection,
} from '../interfaces/detector.interface';

/**
 * Owns the process-wide detector. It is loaded once and never replaced; every
 * inference goes through a single-owner queue because the runtime session is
 * not assumed to be re-entrant.
 */
@Injectable()
export class ModelService implements OnModuleDestroy {
    private readonly logger = new Logger(ModelService.name);
    private readonly options: DetectorOptions;
    private detector: ObjectDetector | null = null;
    private loading: Promise<ObjectDetector> | null = null;
    private tail: Promise<unknown> = Promise.resolve();

    constructor(
        @Inject(DETECTOR_LOADER) private readonly loader: DetectorLoader,
        private readonly configService: ConfigService,
    ) {
        this.options = {
            modelId: this.configService.getOrThrow<string>('detection.model.id'),
            confidenceThreshold: this.configService.getOrThrow<number>('detection.model.confidenceThreshold'),
            iouThreshold: this.configService.getOrThrow<number>('detection.model.iouThreshold'),
            inputSize: this.configService.getOrThrow<number>('detection.model.inputSize'),
        };
    }

    get modelId(): string {
        return this.options.modelId;
    }

    get thresholds(): { confidence: number; iou: number } {
        return { confidence: this.options.confidenceThreshold, iou: this.options.iouThreshold };
    }

    isReady(): boolean {
        return this.detector !== null;
    }

    async load(): Promise<void> {
        if (this.loading) {
            throw new Error('Model has already been loaded');
        }
        this.logger.log(
            `Loading ${this.options.modelId} (conf=${this.options.confidenceThreshold}, iou=${this.options.iouThreshold})...`,
        );
        this.loading = this.loader.load(this.options);
        this.detector = await this.loading;
        this.logger.log('Model loaded successfully');
    }

    /** Rejects with ModelNotReadyException until load() has finished. */
    async detect(image: DecodedImage): Promise<RawDetection[]> {
        const detector = this.detector;
        if (!detector) {
            throw new ModelNotReadyException();
        }
        return this.exclusive(() => detector.detect(image));
    }

    async onModuleDestroy(): Promise<void> {
        const detector = this.detector;
        if (detector?.dispose) {
            await this.exclusive(() => detector.dispose?.() ?? Promise.resolve());
        }
    }

    private exclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.tail.then(task);
        // the caller gets the rejection through `run`; the queue only needs to settle
        this.tail = run.catch(() => undefined);
        return run;
    }
}
