// src/services/retention.service.ts
import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { promises as fs } from 'fs';
import * as path from 'path';
import { describeError } from '../exceptions/pipeline.exceptions';

export const RETENTION_TARGETS = Symbol('RETENTION_TARGETS');

const SWEEP_INTERVAL_NAME = 'artifact-retention';

/**
 * Deletes files older than `retention.ttlHours` from the directories the
 * owning module registers. A TTL of 0 leaves everything in place.
 */
@Injectable()
export class RetentionService implements OnApplicationBootstrap {
    private readonly logger = new Logger(RetentionService.name);
    private readonly ttlMs: number;
    private readonly sweepIntervalMs: number;

    constructor(
        @Inject(RETENTION_TARGETS) private readonly directories: string[],
        private readonly configService: ConfigService,
        private readonly schedulerRegistry: SchedulerRegistry,
    ) {
        this.ttlMs = this.configService.getOrThrow<number>('retention.ttlHours') * 60 * 60 * 1000;
        this.sweepIntervalMs = this.configService.getOrThrow<number>('retention.sweepIntervalMinutes') * 60 * 1000;
    }

    get enabled(): boolean {
        return this.ttlMs > 0;
    }

    onApplicationBootstrap() {
        if (!this.enabled) {
            this.logger.log('Artifact retention disabled');
            return;
        }
        const interval = setInterval(() => {
            this.prune().catch((error) => this.logger.error(`Retention sweep failed: ${describeError(error)}`));
        }, this.sweepIntervalMs);
        interval.unref();
        this.schedulerRegistry.addInterval(SWEEP_INTERVAL_NAME, interval);
        this.logger.log(`Pruning files older than ${this.ttlMs / 3_600_000}h every ${this.sweepIntervalMs / 60_000}min`);
    }

    /** Returns the paths it removed. */
    async prune(now: number = Date.now()): Promise<string[]> {
        if (!this.enabled) return [];

        const removed: string[] = [];
        for (const dir of this.directories) {
            const entries = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
            for (const entry of entries) {
                if (!entry.isFile()) continue;
                const filePath = path.join(dir, entry.name);
                const stat = await fs.stat(filePath);
                if (now - stat.mtimeMs > this.ttlMs) {
                    await fs.rm(filePath, { force: true });
                    removed.push(filePath);
                }
            }
        }

        if (removed.length > 0) {
            this.logger.log(`Removed ${removed.length} expired files`);
        }
        return removed;
    }
}
