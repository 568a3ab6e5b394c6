// src/interfaces/detection-result.interface.ts

export interface BoundingBox {
    x_min: number;
    y_min: number;
    x_max: number;
    y_max: number;
}

export interface Detection {
    object_id: number;
    class: string;
    confidence: number;
    bounding_box: BoundingBox;
    center: { x: number; y: number };
}

export interface DetectionResult {
    success: boolean;
    image_name: string;
    image_size: { width: number; height: number };
    detections_count: number;
    detections: Detection[];
    result_image: string;
    result_json: string;
    timestamp: string;
}

/** An incoming upload as multer hands it over. */
export interface DetectionRequest {
    buffer: Buffer;
    originalName: string;
    contentType: string;
}
