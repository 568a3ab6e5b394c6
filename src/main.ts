import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { GatewayModule } from './modules/gateway.module';

const logger = new Logger('GatewayBootstrap');

async function bootstrap() {
    const app = await NestFactory.create(GatewayModule);
    const configService = app.get(ConfigService);

    const config = new DocumentBuilder()
        .setTitle('Ingestion Gateway API')
        .setDescription('Validates uploaded images and relays them to the detection service')
        .setVersion('1.0')
        .build();
    SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, config));

    app.enableCors();
    app.enableShutdownHooks();

    const port = configService.getOrThrow<number>('gateway.port');
    await app.listen(port, '0.0.0.0');
    logger.log(`Gateway listening on ${port}, detection service at ${configService.getOrThrow<string>('gateway.detectionServiceUrl')}`);
}

bootstrap().catch((error: unknown) => {
    logger.error(`Gateway failed to start: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined);
    process.exit(1);
});
