import type { GenerationConfig } from '@google/generative-ai';
import type { VisionModel, VisionRequest } from '../../../domain/ai/interfaces';
import { AiError, AiErrorCode } from '../../../domain/ai/schemas';
import type { Logger } from '../../../shared/logger';
import { createGeminiClient } from './client';

export interface GeminiVisionModelOptions {
    apiKey: string;
    modelName: string;
    logger?: Logger;
}

function readStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('status' in error && typeof error.status === 'number') return error.status;
    return undefined;
}

function isNetworkError(error: unknown): boolean {
    return error instanceof TypeError && /fetch failed|network/i.test(error.message);
}

/**
 * Sends one image plus an instruction to Gemini and returns the reply text.
 * Single attempt: failures surface to the caller as AiError.
 */
export class GeminiVisionModel implements VisionModel {
    constructor(private readonly options: GeminiVisionModelOptions) { }

    async generate(request: VisionRequest): Promise<string> {
        const { apiKey, modelName, logger } = this.options;
        const { imageBytes, mimeType, prompt, maxOutputTokens, temperature } = request;

        if (!apiKey) {
            throw new AiError(AiErrorCode.PROVIDER_AUTH_ERROR, 'GEMINI_API_KEY is not configured');
        }

        const genAI = createGeminiClient(apiKey);
        const model = genAI.getGenerativeModel({ model: modelName });

        const generationConfig: GenerationConfig = { maxOutputTokens };
        if (temperature !== undefined) {
            generationConfig.temperature = temperature;
        }

        logger?.debug({ model: modelName, maxOutputTokens, temperature }, '[LLM Vision] Sending request');

        let responseText: string;
        try {
            const result = await model.generateContent({
                contents: [{
                    role: 'user',
                    parts: [
                        {
                            inlineData: {
                                mimeType,
                                data: imageBytes.toString('base64'),
                            },
                        },
                        { text: prompt },
                    ],
                }],
                generationConfig,
            });

            responseText = result.response.text();
        } catch (error) {
            const status = readStatus(error);
            const message = error instanceof Error ? error.message : 'Unknown Vision error';

            if (status === 401 || status === 403) {
                throw new AiError(AiErrorCode.PROVIDER_AUTH_ERROR, 'Invalid API Key', error);
            }
            if (status === 429) {
                throw new AiError(AiErrorCode.PROVIDER_RATE_LIMIT, message, error);
            }
            if (isNetworkError(error)) {
                throw new AiError(AiErrorCode.PROVIDER_NETWORK_ERROR, message, error);
            }
            throw new AiError(AiErrorCode.INTERNAL_ERROR, message, error);
        }

        logger?.debug({ chars: responseText.length }, '[LLM Vision] Received response');
        return responseText;
    }
}
