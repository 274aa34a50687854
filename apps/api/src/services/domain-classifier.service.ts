import type { VisionModel } from '../domain/ai/interfaces';
import { DEFAULT_DOMAIN, Domain, resolveDomain } from '../domain/analysis/domain';
import type { PipelineConfig } from '../domain/config.schema';
import { CLASSIFY_PROMPT } from '../infra/ai/prompts/classify-v1';
import { loadImagePayload } from '../infra/imaging/image-payload';
import type { Logger } from '../shared/logger';

export class DomainClassifier {
    constructor(
        private readonly model: VisionModel,
        private readonly config: PipelineConfig['classification'],
        private readonly logger?: Logger
    ) { }

    /**
     * Picks the analysis domain for an image. Never rejects: any failure
     * resolves to the default domain.
     */
    async classify(imagePath: string): Promise<Domain> {
        try {
            const { data, mimeType } = await loadImagePayload(imagePath);
            const reply = await this.model.generate({
                imageBytes: data,
                mimeType,
                prompt: CLASSIFY_PROMPT,
                maxOutputTokens: this.config.maxOutputTokens,
                temperature: this.config.temperature,
            });

            this.logger?.debug({ reply }, '[DomainClassifier] Raw classifier reply');

            const domain = resolveDomain(reply);
            this.logger?.debug({ domain }, '[DomainClassifier] Resolved domain');
            return domain;
        } catch (error) {
            this.logger?.error({ err: error }, '[DomainClassifier] Classification failed, using default domain');
            return DEFAULT_DOMAIN;
        }
    }
}
