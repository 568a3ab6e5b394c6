// src/modules/gateway.module.ts
import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { MulterModule } from '@nestjs/platform-express';
import { ScheduleModule } from '@nestjs/schedule';
import configuration from '../config/configuration';
import { validateEnvironment } from '../config/env.validation';
import { UploadController } from '../controllers/upload.controller';
import { gatewayErrorBody, HttpErrorFilter } from '../filters/http-error.filter';
import { DetectionClientService } from '../services/detection-client.service';
import { ImageProcessingService } from '../services/image-processing.service';
import { RETENTION_TARGETS, RetentionService } from '../services/retention.service';
import { UploadService } from '../services/upload.service';

@Module({
    imports: [
        ConfigModule.forRoot({
            isGlobal: true,
            load: [configuration],
            validate: validateEnvironment,
        }),
        HttpModule,
        MulterModule.registerAsync({
            useFactory: (configService: ConfigService) => ({
                limits: { fileSize: configService.getOrThrow<number>('gateway.maxUploadBytes'), files: 1 },
            }),
            inject: [ConfigService],
        }),
        ScheduleModule.forRoot(),
    ],
    controllers: [UploadController],
    providers: [
        {
            provide: APP_FILTER,
            useFactory: (uploadService: UploadService) => new HttpErrorFilter(gatewayErrorBody, uploadService.tooLargeMessage),
            inject: [UploadService],
        },
        {
            provide: RETENTION_TARGETS,
            useFactory: (configService: ConfigService) => [configService.getOrThrow<string>('gateway.uploadDir')],
            inject: [ConfigService],
        },
        ImageProcessingService,
        UploadService,
        DetectionClientService,
        RetentionService,
    ],
})
export class GatewayModule {}
