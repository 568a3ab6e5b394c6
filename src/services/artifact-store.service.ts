// src/services/artifact-store.service.ts
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { DetectionResult } from '../interfaces/detection-result.interface';
import { claimUniqueStem, fileStamp, isPlainFileName, removeQuietly, secureFilename } from '../utils/file-naming.utils';

export interface ArtifactRefs {
    imageName: string;
    jsonName: string;
    imageUrl: string;
    jsonUrl: string;
}

/**
 * Write-once store for the annotated image and JSON of each request, exposed
 * under `<publicPrefix>/image/<name>` and `<publicPrefix>/json/<name>`.
 */
@Injectable()
export class ArtifactStoreService implements OnModuleInit {
    private readonly logger = new Logger(ArtifactStoreService.name);
    readonly imageDir: string;
    readonly jsonDir: string;
    private readonly publicPrefix: string;

    constructor(private readonly configService: ConfigService) {
        this.imageDir = this.configService.getOrThrow<string>('detection.imageDir');
        this.jsonDir = this.configService.getOrThrow<string>('detection.jsonDir');
        this.publicPrefix = this.configService.getOrThrow<string>('detection.publicPrefix');
    }

    async onModuleInit(): Promise<void> {
        await fs.mkdir(this.imageDir, { recursive: true });
        await fs.mkdir(this.jsonDir, { recursive: true });
    }

    /**
     * Persists both artifacts under one stem, `result_<yyyyMMdd_HHmmss>_<basename>`,
     * suffixed when that stem is taken. Either both files end up on disk or neither.
     */
    async persist(
        originalName: string,
        annotatedJpeg: Buffer,
        build: (refs: ArtifactRefs) => DetectionResult,
        now: Date = new Date(),
    ): Promise<DetectionResult> {
        const baseName = path.parse(secureFilename(originalName)).name || 'image';
        const stem = await claimUniqueStem(`result_${fileStamp(now)}_${baseName}`, [
            { dir: this.imageDir, ext: '.jpg' },
            { dir: this.jsonDir, ext: '.json' },
        ]);

        const refs: ArtifactRefs = {
            imageName: `${stem}.jpg`,
            jsonName: `${stem}.json`,
            imageUrl: `${this.publicPrefix}/image/${stem}.jpg`,
            jsonUrl: `${this.publicPrefix}/json/${stem}.json`,
        };
        const imagePath = path.join(this.imageDir, refs.imageName);
        const jsonPath = path.join(this.jsonDir, refs.jsonName);

        try {
            await fs.writeFile(imagePath, annotatedJpeg);
            const result = build(refs);
            await fs.writeFile(jsonPath, JSON.stringify(result, null, 4));
            this.logger.log(`Result image saved: ${imagePath}`);
            this.logger.log(`JSON result saved: ${jsonPath}`);
            return result;
        } catch (error) {
            await removeQuietly([imagePath, jsonPath]);
            throw error;
        }
    }

    /** Absolute path of a stored artifact, looked up in the image then the JSON directory. */
    async find(fileName: string): Promise<string | null> {
        if (!isPlainFileName(fileName)) return null;

        for (const dir of [this.imageDir, this.jsonDir]) {
            const filePath = path.join(dir, fileName);
            const stat = await fs.stat(filePath).catch(() => null);
            if (stat?.isFile()) return filePath;
        }
        return null;
    }
}
