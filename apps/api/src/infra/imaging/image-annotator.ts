import sharp from 'sharp';
import path from 'path';
import type { Annotation } from '../../domain/analysis/schemas';
import type { Logger } from '../../shared/logger';
import { escapeXml, toTitleCase } from '../../shared/text';
import { annotatedImageName } from '../storage/file-naming';

/**
 * Box colours by confidence tier. The parser only emits 0.9 or 0.7, so `low`
 * is never selected today.
 */
export const CONFIDENCE_COLORS = {
    high: '#ff0000',
    medium: '#ffa500',
    low: '#ffff00',
} as const;

const HIGH_CONFIDENCE_THRESHOLD = 0.8;
const BORDER_PASSES = 4;
const BORDER_WIDTH = 2;
const LABEL_OFFSET = 25;
const FONT_SIZE = 16;
// Baseline offset inside the label tag; leaves room for descenders
const LABEL_BASELINE = FONT_SIZE - 2;

export function colorForConfidence(confidence: number): string {
    return confidence >= HIGH_CONFIDENCE_THRESHOLD ? CONFIDENCE_COLORS.high : CONFIDENCE_COLORS.medium;
}

export function formatAnnotationLabel(annotation: Annotation): string {
    return `${toTitleCase(annotation.label)} (${Math.round(annotation.confidence * 100)}%)`;
}

function toPixels(annotation: Annotation, width: number, height: number) {
    const [x1, y1, x2, y2] = annotation.bbox;
    return {
        x1: Math.trunc(x1 * width),
        y1: Math.trunc(y1 * height),
        x2: Math.trunc(x2 * width),
        y2: Math.trunc(y2 * height),
    };
}

/**
 * SVG overlay with a thick border (concentric strokes) and a filled label tag
 * sitting just above each box.
 */
export function buildAnnotationSvg(width: number, height: number, annotations: Annotation[]): string {
    const elements = annotations.map((annotation) => {
        const { x1, y1, x2, y2 } = toPixels(annotation, width, height);
        const color = colorForConfidence(annotation.confidence);
        const label = formatAnnotationLabel(annotation);

        const borders = Array.from({ length: BORDER_PASSES }, (_, i) =>
            `<rect x="${x1 - i}" y="${y1 - i}" width="${x2 - x1 + 2 * i}" height="${y2 - y1 + 2 * i}" fill="none" stroke="${color}" stroke-width="${BORDER_WIDTH}" />`
        );

        const textY = y1 - LABEL_OFFSET;
        const textWidth = Math.ceil(label.length * FONT_SIZE * 0.6);
        const textHeight = FONT_SIZE + 3;

        return [
            ...borders,
            `<rect x="${x1}" y="${textY}" width="${textWidth}" height="${textHeight}" fill="${color}" />`,
            `<text x="${x1}" y="${textY + LABEL_BASELINE}" font-size="${FONT_SIZE}" font-weight="bold" font-family="DejaVu Sans, sans-serif" fill="#ffffff">${escapeXml(label)}</text>`,
        ].join('\n  ');
    });

    return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
  ${elements.join('\n  ')}
</svg>`;
}

export class ImageAnnotator {
    constructor(
        private readonly outputDir: string,
        private readonly logger?: Logger
    ) { }

    /**
     * Draws the annotations onto a JPEG copy of the image. On any failure the
     * original path is returned so later steps still get a usable image.
     */
    async annotate(imagePath: string, annotations: Annotation[]): Promise<string> {
        try {
            const metadata = await sharp(imagePath).metadata();
            if (!metadata.width || !metadata.height) {
                throw new Error('Unable to read image dimensions.');
            }

            const overlay = Buffer.from(buildAnnotationSvg(metadata.width, metadata.height, annotations));
            const outputPath = path.join(this.outputDir, annotatedImageName());

            await sharp(imagePath)
                .removeAlpha()
                .toColourspace('srgb')
                .composite([{ input: overlay, top: 0, left: 0 }])
                .jpeg({ quality: 95 })
                .toFile(outputPath);

            return outputPath;
        } catch (error) {
            this.logger?.error({ err: error, imagePath }, '[ImageAnnotator] Annotation failed, keeping original image');
            return imagePath;
        }
    }
}
