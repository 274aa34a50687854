export interface VisionRequest {
    imageBytes: Buffer;
    mimeType: string;
    prompt: string;
    maxOutputTokens: number;
    temperature?: number;
}

/**
 * A vision-capable language model. Takes one image plus an instruction and
 * returns the reply as free text; callers must not assume any structure.
 */
export interface VisionModel {
    generate(request: VisionRequest): Promise<string>;
}
