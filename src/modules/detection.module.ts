// src/modules/detection.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { ScheduleModule } from '@nestjs/schedule';
import configuration from '../config/configuration';
import { validateEnvironment } from '../config/env.validation';
import { DetectionController } from '../controllers/detection.controller';
import { OnnxDetectorLoader } from '../detectors/onnx-detector.loader';
import { detailErrorBody, HttpErrorFilter } from '../filters/http-error.filter';
import { DETECTOR_LOADER } from '../interfaces/detector.interface';
import { ArtifactStoreService } from '../services/artifact-store.service';
import { DetectionService } from '../services/detection.service';
import { ImageProcessingService } from '../services/image-processing.service';
import { ModelService } from '../services/model.service';
import { RETENTION_TARGETS, RetentionService } from '../services/retention.service';

@Module({
    imports: [
        ConfigModule.forRoot({
            isGlobal: true,
            load: [configuration],
            validate: validateEnvironment,
        }),
        ScheduleModule.forRoot(),
    ],
    controllers: [DetectionController],
    providers: [
        { provide: DETECTOR_LOADER, useClass: OnnxDetectorLoader },
        { provide: APP_FILTER, useValue: new HttpErrorFilter(detailErrorBody) },
        {
            provide: RETENTION_TARGETS,
            useFactory: (configService: ConfigService) => [
                configService.getOrThrow<string>('detection.imageDir'),
                configService.getOrThrow<string>('detection.jsonDir'),
            ],
            inject: [ConfigService],
        },
        ModelService,
        ImageProcessingService,
        ArtifactStoreService,
        DetectionService,
        RetentionService,
    ],
})
export class DetectionModule {}
