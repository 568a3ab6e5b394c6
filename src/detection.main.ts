import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { DetectionModule } from './modules/detection.module';
import { ModelService } from './services/model.service';

const logger = new Logger('DetectionBootstrap');

async function bootstrap() {
    const app = await NestFactory.create<NestExpressApplication>(DetectionModule);
    const configService = app.get(ConfigService);

    app.enableCors();
    app.enableShutdownHooks();
    app.useStaticAssets(configService.getOrThrow<string>('detection.staticDir'), { prefix: '/static' });

    const config = new DocumentBuilder()
        .setTitle('Object Detection Service')
        .setDescription('Runs the detector and stores annotated results')
        .setVersion('1.0')
        .build();
    SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, config));

    const port = configService.getOrThrow<number>('detection.port');
    await app.listen(port, '0.0.0.0');
    logger.log(`Detection service listening on ${port}`);

    // requests that arrive before this finishes get a 503
    await app.get(ModelService).load();
}

bootstrap().catch((error: unknown) => {
    logger.error(`Detection service failed to start: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined);
    process.exit(1);
});
