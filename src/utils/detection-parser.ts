// src/utils/detection-parser.ts
import { RawDetection } from '../interfaces/detector.interface';
import { Detection } from '../interfaces/detection-result.interface';

export function roundTo(value: number, digits: number): number {
    const factor = 10 ** digits;
    const rounded = Math.round(value * factor) / factor;
    // avoid serializing -0
    return rounded === 0 ? 0 : rounded;
}

/**
 * Maps detector output to the public schema. Order is kept as the detector
 * produced it; object ids are 1-based positions in that order.
 */
export function toDetections(raw: RawDetection[]): Detection[] {
    return raw.map((det, index) => {
        const box = {
            x_min: roundTo(Math.min(det.box.x1, det.box.x2), 2),
            y_min: roundTo(Math.min(det.box.y1, det.box.y2), 2),
            x_max: roundTo(Math.max(det.box.x1, det.box.x2), 2),
            y_max: roundTo(Math.max(det.box.y1, det.box.y2), 2),
        };

        return {
            object_id: index + 1,
            class: det.label,
            confidence: roundTo(det.score, 4),
            bounding_box: box,
            // midpoint of the rounded box as reported
            center: {
                x: roundTo((box.x_min + box.x_max) / 2, 2),
                y: roundTo((box.y_min + box.y_max) / 2, 2),
            },
        };
    });
}
