import type { VisionModel } from '../domain/ai/interfaces';
import type { Domain } from '../domain/analysis/domain';
import type { PipelineConfig } from '../domain/config.schema';
import { ANALYSIS_PROMPTS } from '../infra/ai/prompts/analysis-v1';
import { loadImagePayload } from '../infra/imaging/image-payload';
import type { Logger } from '../shared/logger';

export class AnalysisRequester {
    constructor(
        private readonly model: VisionModel,
        private readonly config: PipelineConfig['analysis'],
        private readonly logger?: Logger
    ) { }

    async requestAnalysis(imagePath: string, domain: Domain): Promise<string> {
        this.logger?.debug({ domain, imagePath }, '[AnalysisRequester] Starting analysis');

        try {
            const { data, mimeType } = await loadImagePayload(imagePath);
            const analysis = await this.model.generate({
                imageBytes: data,
                mimeType,
                prompt: ANALYSIS_PROMPTS[domain],
                maxOutputTokens: this.config.maxOutputTokens,
                temperature: this.config.temperature,
            });

            this.logger?.debug({ domain, chars: analysis.length }, '[AnalysisRequester] Received analysis');
            return analysis;
        } catch (error) {
            this.logger?.error({ err: error, domain }, '[AnalysisRequester] Analysis request failed');
            throw error;
        }
    }
}
