// src/exceptions/pipeline.exceptions.ts
import {
    BadRequestException,
    GatewayTimeoutException,
    HttpException,
    InternalServerErrorException,
    ServiceUnavailableException,
} from '@nestjs/common';

/** Bad input detected locally: missing file, disallowed extension, corrupt image. */
export class UploadValidationException extends BadRequestException {}

export class ModelNotReadyException extends ServiceUnavailableException {
    constructor() {
        super('Model not loaded');
    }
}

export class UpstreamTimeoutException extends GatewayTimeoutException {
    constructor(cause?: unknown) {
        super('Detection service request timeout', { cause });
    }
}

export class UpstreamUnavailableException extends ServiceUnavailableException {
    constructor(cause?: unknown) {
        super('Detection service unreachable. Please ensure it is running.', { cause });
    }
}

/** Non-2xx answer from the detection service, re-emitted with the same status. */
export class UpstreamErrorException extends HttpException {
    constructor(status: number, detail: string) {
        super(`Detection service error: ${detail}`, status);
    }
}

export class PipelineInternalException extends InternalServerErrorException {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
    }
}

export const describeError = (error: unknown): string =>
    typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string'
        ? error.message
        : String(error);
