// src/dtos/detection-result.dto.ts
import { ApiProperty } from '@nestjs/swagger';
import { BoundingBox, Detection, DetectionResult } from '../interfaces/detection-result.interface';

export class BoundingBoxDto implements BoundingBox {
    @ApiProperty({ example: 12.5 })
    x_min!: number;

    @ApiProperty({ example: 40 })
    y_min!: number;

    @ApiProperty({ example: 220.75 })
    x_max!: number;

    @ApiProperty({ example: 310.2 })
    y_max!: number;
}

export class PointDto {
    @ApiProperty()
    x!: number;

    @ApiProperty()
    y!: number;
}

export class DetectionDto implements Detection {
    @ApiProperty({ description: '1-based position in model output order', example: 1 })
    object_id!: number;

    @ApiProperty({ description: 'Class label', example: 'person' })
    class!: string;

    @ApiProperty({ description: 'Confidence, 4 decimals', example: 0.8731 })
    confidence!: number;

    @ApiProperty({ type: BoundingBoxDto })
    bounding_box!: BoundingBoxDto;

    @ApiProperty({ type: PointDto, description: 'Midpoint of the bounding box' })
    center!: PointDto;
}

export class ImageSizeDto {
    @ApiProperty()
    width!: number;

    @ApiProperty()
    height!: number;
}

export class DetectionResultDto implements DetectionResult {
    @ApiProperty()
    success!: boolean;

    @ApiProperty({ example: 'street.jpg' })
    image_name!: string;

    @ApiProperty({ type: ImageSizeDto })
    image_size!: ImageSizeDto;

    @ApiProperty()
    detections_count!: number;

    @ApiProperty({ type: [DetectionDto] })
    detections!: DetectionDto[];

    @ApiProperty({ example: '/static/results/image/result_20240101_120000_street.jpg' })
    result_image!: string;

    @ApiProperty({ example: '/static/results/json/result_20240101_120000_street.json' })
    result_json!: string;

    @ApiProperty({ description: 'ISO-8601' })
    timestamp!: string;
}

export class ErrorDetailDto {
    @ApiProperty({ example: 'File must be an image' })
    detail!: string;
}

export class GatewayErrorDto {
    @ApiProperty({ example: false })
    success!: boolean;

    @ApiProperty({ example: 'Invalid file type. Allowed: png, jpg, jpeg, gif, bmp, webp' })
    error!: string;
}
