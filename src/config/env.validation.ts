// src/config/env.validation.ts
import { plainToInstance } from 'class-transformer';
import { IsInt, IsNumber, IsOptional, IsString, IsUrl, Max, Min, validateSync } from 'class-validator';

export class EnvironmentVariables {
    @IsOptional()
    @IsInt()
    @Min(1)
    @Max(65535)
    GATEWAY_PORT?: number;

    @IsOptional()
    @IsInt()
    @Min(1)
    @Max(65535)
    DETECTION_PORT?: number;

    @IsOptional()
    @IsUrl({ require_tld: false, protocols: ['http', 'https'] })
    DETECTION_SERVICE_URL?: string;

    @IsOptional()
    @IsString()
    UPLOAD_DIR?: string;

    @IsOptional()
    @IsString()
    STATIC_DIR?: string;

    @IsOptional()
    @IsInt()
    @Min(1)
    MAX_UPLOAD_BYTES?: number;

    @IsOptional()
    @IsString()
    ALLOWED_EXTENSIONS?: string;

    @IsOptional()
    @IsString()
    MODEL_ID?: string;

    @IsOptional()
    @IsString()
    MODEL_DIR?: string;

    @IsOptional()
    @IsNumber()
    @Min(0)
    @Max(1)
    MODEL_CONFIDENCE?: number;

    @IsOptional()
    @IsNumber()
    @Min(0)
    @Max(1)
    MODEL_IOU?: number;

    @IsOptional()
    @IsInt()
    @Min(32)
    MODEL_INPUT_SIZE?: number;

    @IsOptional()
    @IsNumber()
    @Min(0)
    ARTIFACT_TTL_HOURS?: number;

    @IsOptional()
    @IsNumber()
    @Min(1)
    RETENTION_SWEEP_MINUTES?: number;
}

export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
    const validated = plainToInstance(EnvironmentVariables, config, {
        enableImplicitConversion: true,
    });
    const errors = validateSync(validated, { skipMissingProperties: false });

    if (errors.length > 0) {
        const details = errors
            .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${details}`);
    }
    return validated;
}
