// src/services/upload.service.ts
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { describeError, UploadValidationException } from '../exceptions/pipeline.exceptions';
import {
    claimUniqueStem,
    extensionOf,
    fileStamp,
    isPlainFileName,
    removeQuietly,
    secureFilename,
} from '../utils/file-naming.utils';
import { ImageInfo, ImageProcessingService } from './image-processing.service';

export interface StagedUpload {
    /** Absolute path of the staged copy. */
    path: string;
    stagedName: string;
    /** Sanitized client file name, used when forwarding. */
    fileName: string;
    contentType: string;
    info: ImageInfo;
}

const KIB = 1024;
const MIB = 1024 * KIB;

/** Whole megabytes when the limit is at least 1 MiB, else kilobytes rounded up. */
export function formatByteLimit(bytes: number): string {
    if (bytes >= MIB) return `${Math.floor(bytes / MIB)}MB`;
    return `${Math.max(1, Math.ceil(bytes / KIB))}KB`;
}

@Injectable()
export class UploadService implements OnModuleInit {
    private readonly logger = new Logger(UploadService.name);
    readonly uploadDir: string;
    readonly maxUploadBytes: number;
    readonly allowedExtensions: string[];

    constructor(
        private readonly configService: ConfigService,
        private readonly imageProcessingService: ImageProcessingService,
    ) {
        this.uploadDir = this.configService.getOrThrow<string>('gateway.uploadDir');
        this.maxUploadBytes = this.configService.getOrThrow<number>('gateway.maxUploadBytes');
        this.allowedExtensions = this.configService.getOrThrow<string[]>('gateway.allowedExtensions');
    }

    async onModuleInit(): Promise<void> {
        await fs.mkdir(this.uploadDir, { recursive: true });
    }

    get tooLargeMessage(): string {
        return `File too large. Maximum size is ${formatByteLimit(this.maxUploadBytes)}`;
    }

    /** Checks run before anything touches the disk. */
    validate(file: Express.Multer.File | undefined): asserts file is Express.Multer.File {
        if (!file) {
            this.logger.warn('No image file in request');
            throw new UploadValidationException('No image file provided');
        }
        if (!file.originalname) {
            this.logger.warn('Empty filename');
            throw new UploadValidationException('No file selected');
        }
        if (!this.allowedExtensions.includes(extensionOf(file.originalname))) {
            this.logger.warn(`Invalid file type: ${file.originalname}`);
            throw new UploadValidationException(`Invalid file type. Allowed: ${this.allowedExtensions.join(', ')}`);
        }
        if (file.size > this.maxUploadBytes) {
            this.logger.warn(`File too large: ${file.originalname} (${file.size} bytes)`);
            throw new UploadValidationException(this.tooLargeMessage);
        }
    }

    /**
     * Writes the upload to `<yyyyMMdd_HHmmss>_<basename>.<ext>` and decodes it.
     * A file that does not decode is removed again.
     */
    async stage(file: Express.Multer.File, now: Date = new Date()): Promise<StagedUpload> {
        const ext = extensionOf(file.originalname);
        const safeName = secureFilename(file.originalname);
        const baseName = path.parse(safeName).name || 'upload';
        const fileName = extensionOf(safeName) === ext ? safeName : `${baseName}.${ext}`;

        const stem = await claimUniqueStem(`${fileStamp(now)}_${baseName}`, [{ dir: this.uploadDir, ext: `.${ext}` }]);
        const stagedName = `${stem}.${ext}`;
        const stagedPath = path.join(this.uploadDir, stagedName);

        try {
            await fs.writeFile(stagedPath, file.buffer);
        } catch (error) {
            await removeQuietly([stagedPath]);
            throw error;
        }
        this.logger.log(`File saved: ${stagedPath}`);

        let info: ImageInfo;
        try {
            info = await this.imageProcessingService.inspect(await fs.readFile(stagedPath));
        } catch (error) {
            await removeQuietly([stagedPath]);
            this.logger.warn(`Invalid image file ${stagedName}: ${describeError(error)}`);
            throw new UploadValidationException('Invalid image file');
        }
        this.logger.log(`Image validated: ${info.format}, ${info.width}x${info.height}`);

        const contentType = file.mimetype?.startsWith('image/')
            ? file.mimetype
            : this.imageProcessingService.mimeTypeFor(info.format);

        return { path: stagedPath, stagedName, fileName, contentType, info };
    }

    async find(fileName: string): Promise<string | null> {
        if (!isPlainFileName(fileName)) return null;
        const filePath = path.join(this.uploadDir, fileName);
        const stat = await fs.stat(filePath).catch(() => null);
        return stat?.isFile() ? filePath : null;
    }
}
