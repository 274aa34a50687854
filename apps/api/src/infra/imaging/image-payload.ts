import { readFile } from 'fs/promises';

export type ImageMimeType = 'image/jpeg' | 'image/png' | 'image/webp';

export interface ImagePayload {
    data: Buffer;
    mimeType: ImageMimeType;
}

/**
 * Sniffs the container format from its magic bytes.
 */
export function detectImageMimeType(buffer: Buffer): ImageMimeType | null {
    // JPEG: FF D8 FF
    if (buffer[0] === 0xFF && buffer[1] === 0xD8 && buffer[2] === 0xFF) return 'image/jpeg';
    // PNG: 89 50 4E 47
    if (buffer[0] === 0x89 && buffer[1] === 0x50 && buffer[2] === 0x4E && buffer[3] === 0x47) return 'image/png';
    // WebP: RIFF .... WEBP
    if (buffer[0] === 0x52 && buffer[1] === 0x49 && buffer[2] === 0x46 && buffer[3] === 0x46 &&
        buffer[8] === 0x57 && buffer[9] === 0x45 && buffer[10] === 0x42 && buffer[11] === 0x50) return 'image/webp';

    return null;
}

/**
 * Reads an image from disk for a model request. Unknown formats are sent as JPEG.
 */
export async function loadImagePayload(imagePath: string): Promise<ImagePayload> {
    const data = await readFile(imagePath);
    return { data, mimeType: detectImageMimeType(data) ?? 'image/jpeg' };
}
