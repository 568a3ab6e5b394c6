// src/services/detection-client.service.ts
import { HttpException, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { isAxiosError } from 'axios';
import FormData from 'form-data';
import { promises as fs } from 'fs';
import { lastValueFrom } from 'rxjs';
import {
    describeError,
    PipelineInternalException,
    UpstreamErrorException,
    UpstreamTimeoutException,
    UpstreamUnavailableException,
} from '../exceptions/pipeline.exceptions';
import { StagedUpload } from './upload.service';

export type UpstreamBody = Record<string, unknown>;

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN', 'ECONNRESET']);

const isRecord = (value: unknown): value is UpstreamBody =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/** Maps a failed round trip to the gateway's error taxonomy. */
export function classifyTransportError(error: unknown): HttpException {
    if (error instanceof HttpException) return error;
    if (isAxiosError(error) && error.code) {
        if (TIMEOUT_CODES.has(error.code)) return new UpstreamTimeoutException(error);
        if (UNREACHABLE_CODES.has(error.code)) return new UpstreamUnavailableException(error);
    }
    return new PipelineInternalException(`Error communicating with detection service: ${describeError(error)}`, error);
}

/** `detail` of a `{detail}` error body, else the body as text. */
export function upstreamErrorDetail(data: unknown): string {
    if (isRecord(data) && typeof data.detail === 'string') return data.detail;
    if (typeof data === 'string') return data;
    if (Buffer.isBuffer(data)) return data.toString('utf8');
    return JSON.stringify(data) ?? '';
}

/**
 * Fills in `success`, `image_name` and `detections_count` when the detection
 * service left them out; values it did send are never replaced.
 */
export function withResultDefaults(body: UpstreamBody, fileName: string): UpstreamBody {
    const detections = Array.isArray(body.detections) ? body.detections : [];
    return {
        ...body,
        success: 'success' in body ? body.success : true,
        image_name: 'image_name' in body ? body.image_name : fileName,
        detections_count: 'detections_count' in body ? body.detections_count : detections.length,
    };
}

@Injectable()
export class DetectionClientService {
    private readonly logger = new Logger(DetectionClientService.name);
    readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly healthTimeoutMs: number;

    constructor(
        private readonly httpService: HttpService,
        private readonly configService: ConfigService,
    ) {
        this.baseUrl = this.configService.getOrThrow<string>('gateway.detectionServiceUrl');
        this.timeoutMs = this.configService.getOrThrow<number>('gateway.requestTimeoutMs');
        this.healthTimeoutMs = this.configService.getOrThrow<number>('gateway.healthTimeoutMs');
    }

    /** One attempt, bounded by the request timeout; never retried. */
    async detect(upload: StagedUpload): Promise<UpstreamBody> {
        const url = `${this.baseUrl}/detect`;
        let status: number;
        let data: unknown;

        try {
            const form = new FormData();
            form.append('file', await fs.readFile(upload.path), {
                filename: upload.fileName,
                contentType: upload.contentType,
            });

            this.logger.log(`Sending to detection service: ${url}`);
            const response = await lastValueFrom(
                this.httpService.post<unknown>(url, form, {
                    headers: form.getHeaders(),
                    timeout: this.timeoutMs,
                    maxBodyLength: Infinity,
                    validateStatus: () => true,
                }),
            );
            status = response.status;
            data = response.data;
        } catch (error) {
            const mapped = classifyTransportError(error);
            this.logger.error(`Detection service call failed (${mapped.getStatus()}): ${describeError(error)}`);
            throw mapped;
        }

        if (status < 200 || status >= 300) {
            const detail = upstreamErrorDetail(data);
            this.logger.error(`Detection service error: ${status} - ${detail}`);
            throw new UpstreamErrorException(status, detail);
        }
        if (!isRecord(data)) {
            throw new PipelineInternalException('Detection service returned a malformed response');
        }

        const result = withResultDefaults(data, upload.fileName);
        this.logger.log(`Detection successful: ${String(result.detections_count)} objects found`);
        return result;
    }

    async health(): Promise<UpstreamBody> {
        try {
            const response = await lastValueFrom(
                this.httpService.get<unknown>(`${this.baseUrl}/health`, {
                    timeout: this.healthTimeoutMs,
                    validateStatus: () => true,
                }),
            );
            if (response.status === 200 && isRecord(response.data)) {
                return response.data;
            }
            return { status: 'unreachable' };
        } catch (error) {
            this.logger.error(`Detection service health check failed: ${describeError(error)}`);
            return { status: 'unreachable', error: describeError(error) };
        }
    }
}
