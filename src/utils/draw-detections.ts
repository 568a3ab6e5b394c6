// src/utils/draw-detections.ts
import { Detection } from '../interfaces/detection-result.interface';

const escapeXml = (s: string) =>
    s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

/** Deterministic per-label colour: string hash → hue, fixed saturation and lightness. */
export function colorFor(label: string, palette?: Record<string, string>): string {
    const fixed = palette?.[label];
    if (fixed) return fixed;

    let hash = 0;
    for (let i = 0; i < label.length; i++) hash = (hash * 31 + label.charCodeAt(i)) | 0;
    const h = Math.abs(hash) % 360, s = 70, l = 50;
    const a = (s / 100) * Math.min(l / 100, 1 - l / 100);
    const f = (n: number) => {
        const k = (n + h / 30) % 12;
        const c = l / 100 - a * Math.max(-1, Math.min(k - 3, Math.min(9 - k, 1)));
        return Math.round(255 * c);
    };
    return `#${[f(0), f(8), f(4)].map((v) => v.toString(16).padStart(2, '0')).join('')}`;
}

/**
 * Builds an SVG overlay of the image's size with one outlined box and one
 * `label (0.87)` tag per detection. Boxes that collapse after clamping to the
 * frame are skipped.
 */
export function buildDetectionOverlay(
    width: number,
    height: number,
    detections: Detection[],
    palette?: Record<string, string>,
): string {
    const strokeWidth = Math.max(2, Math.floor(Math.min(width, height) * 0.003));
    const fontSize = Math.max(12, Math.floor(Math.min(width, height) * 0.025));
    const padX = Math.max(4, Math.floor(fontSize * 0.4));
    const padY = Math.max(2, Math.floor(fontSize * 0.25));

    let svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">` +
        `<style>.lbl{font-family:DejaVu Sans,Helvetica,Arial,sans-serif;font-size:${fontSize}px;font-weight:600;}</style>`;

    for (const det of detections) {
        const { x_min, y_min, x_max, y_max } = det.bounding_box;
        const x1 = Math.max(0, Math.min(width, Math.round(x_min)));
        const y1 = Math.max(0, Math.min(height, Math.round(y_min)));
        const x2 = Math.max(0, Math.min(width, Math.round(x_max)));
        const y2 = Math.max(0, Math.min(height, Math.round(y_max)));
        if (x2 <= x1 || y2 <= y1) continue;

        const col = colorFor(det.class, palette);
        const text = `${det.class} (${det.confidence.toFixed(2)})`;
        const bgW = Math.ceil(text.length * fontSize * 0.6) + padX * 2;
        const bgH = fontSize + padY * 2;
        // tag sits above the box, or inside it when the box touches the top edge
        const bgY = y1 - bgH >= 0 ? y1 - bgH : y1;

        svg += `<rect x="${x1}" y="${y1}" width="${x2 - x1}" height="${y2 - y1}" fill="none" stroke="${col}" stroke-width="${strokeWidth}"/>` +
            `<rect x="${x1}" y="${bgY}" width="${Math.min(bgW, width - x1)}" height="${bgH}" fill="${col}" opacity="0.85"/>` +
            `<text x="${x1 + padX}" y="${bgY + padY + Math.floor(fontSize * 0.85)}" class="lbl" fill="#fff">${escapeXml(text)}</text>`;
    }

    return `${svg}</svg>`;
}
