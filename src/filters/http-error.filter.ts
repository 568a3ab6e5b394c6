// src/filters/http-error.filter.ts
import {
    ArgumentsHost,
    Catch,
    ExceptionFilter,
    HttpException,
    HttpStatus,
    Logger,
    PayloadTooLargeException,
} from '@nestjs/common';
import { Response } from 'express';

export type ErrorBodyFactory = (message: string) => Record<string, unknown>;

export const gatewayErrorBody: ErrorBodyFactory = (message) => ({ success: false, error: message });
export const detailErrorBody: ErrorBodyFactory = (message) => ({ detail: message });

const messageOf = (exception: HttpException): string => {
    const response = exception.getResponse();
    if (typeof response === 'string') return response;
    const message = 'message' in response ? response.message : undefined;
    if (Array.isArray(message)) return message.join(', ');
    if (typeof message === 'string') return message;
    return exception.message;
};

/**
 * Renders every error of an app in one body shape. Multer's size rejection
 * becomes a 400 so that an oversize upload is treated like any other invalid file.
 */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
    private readonly logger = new Logger(HttpErrorFilter.name);

    constructor(
        private readonly toBody: ErrorBodyFactory,
        private readonly tooLargeMessage?: string,
    ) {}

    catch(exception: unknown, host: ArgumentsHost) {
        const res = host.switchToHttp().getResponse<Response>();

        if (exception instanceof PayloadTooLargeException && this.tooLargeMessage) {
            res.status(HttpStatus.BAD_REQUEST).json(this.toBody(this.tooLargeMessage));
            return;
        }

        if (exception instanceof HttpException) {
            const status = exception.getStatus();
            if (status >= 500) {
                const cause = exception.cause instanceof Error ? exception.cause.stack : undefined;
                this.logger.error(`${status} ${exception.message}`, cause ?? exception.stack);
            }
            res.status(status).json(this.toBody(messageOf(exception)));
            return;
        }

        const error = exception instanceof Error ? exception : new Error(String(exception));
        this.logger.error(`Unhandled error: ${error.message}`, error.stack);
        res.status(HttpStatus.INTERNAL_SERVER_ERROR).json(this.toBody(`Internal server error: ${error.message}`));
    }
}
