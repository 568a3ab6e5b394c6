// src/services/image-processing.service.ts
import { Injectable } from '@nestjs/common';
import sharp from 'sharp';
import Jimp from 'jimp';
import { DecodedImage } from '../interfaces/detector.interface';

export interface ImageInfo {
    format: string;
    width: number;
    height: number;
}

const MIME_BY_FORMAT: Record<string, string> = {
    jpeg: 'image/jpeg',
    png: 'image/png',
    gif: 'image/gif',
    webp: 'image/webp',
    bmp: 'image/bmp',
    tiff: 'image/tiff',
};

const isBmp = (buffer: Buffer): boolean => buffer.length > 2 && buffer[0] === 0x42 && buffer[1] === 0x4d;

@Injectable()
export class ImageProcessingService {
    /**
     * Decodes the full pixel data, so truncated or corrupt files fail here even
     * when their header looks fine.
     */
    async inspect(buffer: Buffer): Promise<ImageInfo> {
        const { width, height, format } = await this.decode(buffer);
        return { width, height, format };
    }

    /**
     * Decodes to 3-channel RGB without resizing or rotating, so coordinates found
     * on the result are valid against the uploaded image. Animated images yield
     * their first frame.
     */
    async decode(buffer: Buffer): Promise<DecodedImage> {
        if (isBmp(buffer)) {
            return this.decodeBmp(buffer);
        }

        const image = sharp(buffer);
        const meta = await image.metadata();
        const { data, info } = await image
            .toColourspace('srgb')
            .raw()
            .toBuffer({ resolveWithObject: true });

        if (!info.width || !info.height) {
            throw new Error(`Invalid image dimensions: ${info.width}x${info.height}`);
        }

        return {
            data: this.toRgb(data, info.width * info.height, info.channels),
            width: info.width,
            height: info.height,
            channels: 3,
            format: meta.format ?? 'unknown',
        };
    }

    async encodeJpeg(image: DecodedImage, overlaySvg?: string): Promise<Buffer> {
        let pipeline = sharp(image.data, {
            raw: { width: image.width, height: image.height, channels: image.channels },
        });
        if (overlaySvg) {
            pipeline = pipeline.composite([{ input: Buffer.from(overlaySvg), left: 0, top: 0 }]);
        }
        return pipeline.jpeg({ quality: 90 }).toBuffer();
    }

    mimeTypeFor(format: string): string {
        return MIME_BY_FORMAT[format] ?? 'application/octet-stream';
    }

    private async decodeBmp(buffer: Buffer): Promise<DecodedImage> {
        const image = await Jimp.read(buffer);
        const { data, width, height } = image.bitmap;
        if (!width || !height) {
            throw new Error(`Invalid image dimensions: ${width}x${height}`);
        }
        return { data: this.toRgb(data, width * height, 4), width, height, channels: 3, format: 'bmp' };
    }

    private toRgb(data: Buffer, pixels: number, channels: number): Buffer {
        if (channels === 3) return data;

        const rgb = Buffer.alloc(pixels * 3);
        for (let i = 0; i < pixels; i++) {
            if (channels < 3) {
                const grey = data[i * channels];
                rgb[i * 3] = grey;
                rgb[i * 3 + 1] = grey;
                rgb[i * 3 + 2] = grey;
            } else {
                data.copy(rgb, i * 3, i * channels, i * channels + 3);
            }
        }
        return rgb;
    }
}
