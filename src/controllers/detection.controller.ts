// src/controllers/detection.controller.ts
import {
    Controller,
    Get,
    HttpCode,
    HttpStatus,
    Logger,
    NotFoundException,
    Param,
    Post,
    Res,
    UploadedFile,
    UseInterceptors,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { DetectionResultDto, ErrorDetailDto } from '../dtos/detection-result.dto';
import { UploadValidationException } from '../exceptions/pipeline.exceptions';
import { DetectionResult } from '../interfaces/detection-result.interface';
import { ArtifactStoreService } from '../services/artifact-store.service';
import { DetectionService } from '../services/detection.service';
import { ModelService } from '../services/model.service';

export const DETECTION_SERVICE_NAME = 'AI Backend - Object Detection';
export const DETECTION_SERVICE_VERSION = '1.0.0';

@ApiTags('Detection')
@Controller()
export class DetectionController {
    private readonly logger = new Logger(DetectionController.name);

    constructor(
        private readonly detectionService: DetectionService,
        private readonly modelService: ModelService,
        private readonly artifactStore: ArtifactStoreService,
        private readonly configService: ConfigService,
    ) {}

    @Get()
    @ApiOperation({ summary: 'Liveness probe' })
    root() {
        return {
            status: 'healthy',
            service: DETECTION_SERVICE_NAME,
            model: this.modelService.modelId,
            version: DETECTION_SERVICE_VERSION,
        };
    }

    @Get('health')
    @ApiOperation({ summary: 'Readiness probe: reports whether the model is loaded' })
    health() {
        return {
            status: 'healthy',
            model_loaded: this.modelService.isReady(),
            thresholds: this.modelService.thresholds,
            results_dir: this.configService.getOrThrow<string>('detection.resultsDir'),
        };
    }

    @Post('detect')
    @HttpCode(HttpStatus.OK)
    @UseInterceptors(FileInterceptor('file'))
    @ApiOperation({ summary: 'Detect objects in an image and store the annotated result' })
    @ApiConsumes('multipart/form-data')
    @ApiBody({
        schema: {
            type: 'object',
            properties: { file: { type: 'string', format: 'binary' } },
            required: ['file'],
        },
    })
    @ApiResponse({ status: 200, type: DetectionResultDto })
    @ApiResponse({ status: 400, description: 'Not an image', type: ErrorDetailDto })
    @ApiResponse({ status: 503, description: 'Model not loaded', type: ErrorDetailDto })
    @ApiResponse({ status: 500, description: 'Detection failed', type: ErrorDetailDto })
    async detect(@UploadedFile() file?: Express.Multer.File): Promise<DetectionResult> {
        if (!file) {
            throw new UploadValidationException('No file provided');
        }
        return this.detectionService.detect({
            buffer: file.buffer,
            originalName: file.originalname,
            contentType: file.mimetype ?? '',
        });
    }

    @Get('results/:filename')
    @ApiOperation({ summary: 'Fetch a stored result image or JSON by file name' })
    @ApiParam({ name: 'filename' })
    @ApiResponse({ status: 404, description: 'Result not found', type: ErrorDetailDto })
    async getResult(@Param('filename') filename: string, @Res() res: Response): Promise<void> {
        const filePath = await this.artifactStore.find(filename);
        if (!filePath) {
            this.logger.warn(`Result not found: ${filename}`);
            throw new NotFoundException('Result not found');
        }
        res.sendFile(filePath);
    }
}
