// src/utils/yolo-postprocess.ts
import { BoxCorners } from '../interfaces/detector.interface';

export interface YoloOutput {
    data: Float32Array;
    dims: readonly number[];
}

/** A box in letterboxed input space, centre format. */
export interface YoloCandidate {
    cx: number;
    cy: number;
    w: number;
    h: number;
    classId: number;
    score: number;
}

export interface LetterboxGeometry {
    scale: number;
    newWidth: number;
    newHeight: number;
    padX: number;
    padY: number;
}

export function letterboxGeometry(width: number, height: number, inputSize: number): LetterboxGeometry {
    const scale = Math.min(inputSize / width, inputSize / height);
    const newWidth = Math.max(1, Math.round(width * scale));
    const newHeight = Math.max(1, Math.round(height * scale));
    return {
        scale,
        newWidth,
        newHeight,
        padX: Math.floor((inputSize - newWidth) / 2),
        padY: Math.floor((inputSize - newHeight) / 2),
    };
}

/**
 * Reads the three YOLO head layouts:
 *  - `[1, 4+nc, N]` anchor-free, channel first
 *  - `[1, N, 4+nc]` anchor-free, channel last
 *  - `[1, N, 5+nc]` with objectness, score = objectness * class score
 */
export function decodeYoloOutput(output: YoloOutput, numClasses: number, confidenceThreshold: number): YoloCandidate[] {
    const { data, dims } = output;
    if (dims.length !== 3 || dims[0] !== 1) {
        throw new Error(`Unexpected output shape: ${dims.join('x')}`);
    }

    let channelFirst: boolean;
    let hasObjectness: boolean;
    let count: number;
    let stride: number;

    if (dims[1] === 4 + numClasses) {
        channelFirst = true; hasObjectness = false; count = dims[2]; stride = dims[1];
    } else if (dims[2] === 4 + numClasses) {
        channelFirst = false; hasObjectness = false; count = dims[1]; stride = dims[2];
    } else if (dims[2] === 5 + numClasses) {
        channelFirst = false; hasObjectness = true; count = dims[1]; stride = dims[2];
    } else {
        throw new Error(`Output shape ${dims.join('x')} does not match ${numClasses} classes`);
    }

    const at = (i: number, c: number) => (channelFirst ? data[c * count + i] : data[i * stride + c]);
    const classOffset = hasObjectness ? 5 : 4;
    const candidates: YoloCandidate[] = [];

    for (let i = 0; i < count; i++) {
        const objectness = hasObjectness ? at(i, 4) : 1;
        if (objectness <= confidenceThreshold) continue;

        let bestScore = -Infinity;
        let bestClass = -1;
        for (let c = 0; c < numClasses; c++) {
            const s = at(i, classOffset + c);
            if (s > bestScore) { bestScore = s; bestClass = c; }
        }

        const score = bestScore * objectness;
        const w = at(i, 2);
        const h = at(i, 3);
        if (score <= confidenceThreshold || w <= 0 || h <= 0) continue;

        candidates.push({ cx: at(i, 0), cy: at(i, 1), w, h, classId: bestClass, score });
    }

    return candidates;
}

export function intersectionOverUnion(a: YoloCandidate, b: YoloCandidate): number {
    const ix = Math.max(0, Math.min(a.cx + a.w / 2, b.cx + b.w / 2) - Math.max(a.cx - a.w / 2, b.cx - b.w / 2));
    const iy = Math.max(0, Math.min(a.cy + a.h / 2, b.cy + b.h / 2) - Math.max(a.cy - a.h / 2, b.cy - b.h / 2));
    const intersection = ix * iy;
    const union = a.w * a.h + b.w * b.h - intersection;
    return union > 0 ? intersection / union : 0;
}

/**
 * Greedy per-class suppression. The result is ordered by descending score,
 * which is the order detections are reported in.
 */
export function nonMaxSuppression(candidates: YoloCandidate[], iouThreshold: number, maxDetections: number): YoloCandidate[] {
    const remaining = [...candidates].sort((a, b) => b.score - a.score);
    const selected: YoloCandidate[] = [];

    while (remaining.length > 0 && selected.length < maxDetections) {
        const current = remaining.shift();
        if (!current) break;
        selected.push(current);

        for (let i = remaining.length - 1; i >= 0; i--) {
            const other = remaining[i];
            if (other.classId === current.classId && intersectionOverUnion(current, other) > iouThreshold) {
                remaining.splice(i, 1);
            }
        }
    }

    return selected;
}

/** Undoes the letterbox and clamps to the original frame. */
export function toOriginalFrame(c: YoloCandidate, g: LetterboxGeometry, width: number, height: number): BoxCorners {
    const clamp = (v: number, max: number) => Math.max(0, Math.min(max, v));
    return {
        x1: clamp((c.cx - c.w / 2 - g.padX) / g.scale, width),
        y1: clamp((c.cy - c.h / 2 - g.padY) / g.scale, height),
        x2: clamp((c.cx + c.w / 2 - g.padX) / g.scale, width),
        y2: clamp((c.cy + c.h / 2 - g.padY) / g.scale, height),
    };
}
