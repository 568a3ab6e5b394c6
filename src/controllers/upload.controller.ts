// src/controllers/upload.controller.ts
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
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { DetectionResultDto, GatewayErrorDto } from '../dtos/detection-result.dto';
import { DetectionClientService, UpstreamBody } from '../services/detection-client.service';
import { UploadService } from '../services/upload.service';

export const GATEWAY_SERVICE_NAME = 'Ingestion Gateway';

@ApiTags('Upload')
@Controller()
export class UploadController {
    private readonly logger = new Logger(UploadController.name);

    constructor(
        private readonly uploadService: UploadService,
        private readonly detectionClient: DetectionClientService,
    ) {}

    @Post('upload')
    @HttpCode(HttpStatus.OK)
    @UseInterceptors(FileInterceptor('image'))
    @ApiOperation({ summary: 'Validate an uploaded image and run object detection on it' })
    @ApiConsumes('multipart/form-data')
    @ApiBody({
        schema: {
            type: 'object',
            properties: { image: { type: 'string', format: 'binary' } },
            required: ['image'],
        },
    })
    @ApiResponse({ status: 200, type: DetectionResultDto })
    @ApiResponse({ status: 400, description: 'Missing, disallowed or corrupt file', type: GatewayErrorDto })
    @ApiResponse({ status: 503, description: 'Detection service unreachable', type: GatewayErrorDto })
    @ApiResponse({ status: 504, description: 'Detection service timeout', type: GatewayErrorDto })
    async upload(@UploadedFile() file?: Express.Multer.File): Promise<UpstreamBody> {
        this.uploadService.validate(file);
        const staged = await this.uploadService.stage(file);
        return this.detectionClient.detect(staged);
    }

    @Get('health')
    @ApiOperation({ summary: 'Gateway health, including the detection service status' })
    async health() {
        return {
            status: 'healthy',
            service: GATEWAY_SERVICE_NAME,
            timestamp: new Date().toISOString(),
            detection_service: await this.detectionClient.health(),
        };
    }

    @Get('uploads/:filename')
    @ApiOperation({ summary: 'Fetch a staged upload by file name' })
    @ApiParam({ name: 'filename' })
    @ApiResponse({ status: 404, description: 'Upload not found', type: GatewayErrorDto })
    async uploadedFile(@Param('filename') filename: string, @Res() res: Response): Promise<void> {
        const filePath = await this.uploadService.find(filename);
        if (!filePath) {
            this.logger.warn(`Upload not found: ${filename}`);
            throw new NotFoundException('Upload not found');
        }
        res.sendFile(filePath);
    }
}
