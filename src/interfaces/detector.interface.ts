// src/interfaces/detector.interface.ts

/** Tightly packed 8-bit RGB pixels, row-major, in the frame of the uploaded image. */
export interface DecodedImage {
    data: Buffer;
    width: number;
    height: number;
    channels: 3;
    format: string;
}

export interface BoxCorners {
    x1: number;
    y1: number;
    x2: number;
    y2: number;
}

/** One object as the detector reports it, before rounding. */
export interface RawDetection {
    label: string;
    score: number;
    box: BoxCorners;
}

export interface DetectorOptions {
    modelId: string;
    confidenceThreshold: number;
    iouThreshold: number;
    inputSize: number;
}

export interface ObjectDetector {
    readonly name: string;
    detect(image: DecodedImage): Promise<RawDetection[]>;
    dispose?(): Promise<void>;
}

/** Source of a pretrained detector; where the weights come from is up to the implementation. */
export interface DetectorLoader {
    load(options: DetectorOptions): Promise<ObjectDetector>;
}

export const DETECTOR_LOADER = Symbol('DETECTOR_LOADER');
