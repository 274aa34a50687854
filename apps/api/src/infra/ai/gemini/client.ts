import { GoogleGenerativeAI } from '@google/generative-ai';

/**
 * Creates a Gemini client session with the provided API key.
 */
export function createGeminiClient(apiKey: string) {
    return new GoogleGenerativeAI(apiKey);
}
