// src/services/detection.service.ts
import { HttpException, Injectable, Logger } from '@nestjs/common';
import { buildDetectionOverlay } from '../utils/draw-detections';
import { toDetections } from '../utils/detection-parser';
import {
    describeError,
    ModelNotReadyException,
    PipelineInternalException,
    UploadValidationException,
} from '../exceptions/pipeline.exceptions';
import { DecodedImage } from '../interfaces/detector.interface';
import { DetectionRequest, DetectionResult } from '../interfaces/detection-result.interface';
import { ArtifactStoreService } from './artifact-store.service';
import { ImageProcessingService } from './image-processing.service';
import { ModelService } from './model.service';

@Injectable()
export class DetectionService {
    private readonly logger = new Logger(DetectionService.name);

    constructor(
        private readonly modelService: ModelService,
        private readonly imageProcessingService: ImageProcessingService,
        private readonly artifactStore: ArtifactStoreService,
    ) {}

    /**
     * decode → infer → parse → render → persist. Input problems are 400s, an
     * unloaded model is a 503, anything else is reported as a 500 carrying the cause.
     */
    async detect(request: DetectionRequest): Promise<DetectionResult> {
        if (!this.modelService.isReady()) {
            throw new ModelNotReadyException();
        }
        if (!request.contentType.startsWith('image/')) {
            throw new UploadValidationException('File must be an image');
        }

        this.logger.log(`Processing image: ${request.originalName}`);
        const image = await this.decode(request.buffer);

        try {
            const raw = await this.modelService.detect(image);
            const detections = toDetections(raw);
            this.logger.log(`Detected ${detections.length} objects`);

            const overlay = buildDetectionOverlay(image.width, image.height, detections);
            const annotated = await this.imageProcessingService.encodeJpeg(image, overlay);

            return await this.artifactStore.persist(request.originalName, annotated, (refs) => ({
                success: true,
                image_name: request.originalName,
                image_size: { width: image.width, height: image.height },
                detections_count: detections.length,
                detections,
                result_image: refs.imageUrl,
                result_json: refs.jsonUrl,
                timestamp: new Date().toISOString(),
            }));
        } catch (error) {
            if (error instanceof HttpException) throw error;
            this.logger.error(`Error during detection: ${describeError(error)}`, error instanceof Error ? error.stack : undefined);
            throw new PipelineInternalException(`Detection failed: ${describeError(error)}`, error);
        }
    }

    private async decode(buffer: Buffer): Promise<DecodedImage> {
        try {
            return await this.imageProcessingService.decode(buffer);
        } catch (error) {
            this.logger.warn(`Rejected undecodable image: ${describeError(error)}`);
            throw new UploadValidationException('Invalid image file');
        }
    }
}
