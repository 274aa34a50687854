import { PipelineConfig, PipelineConfigSchema } from '../domain/config.schema';
import type { Env } from './env';

type PipelineEnv = Pick<
    Env,
    'CLASSIFY_MAX_TOKENS' | 'ANALYSIS_MAX_TOKENS' | 'ANALYSIS_TEMPERATURE' | 'TEMP_DIR' | 'REPORTS_DIR'
>;

/**
 * Maps validated environment values onto the pipeline configuration that every
 * component receives at construction.
 */
export function buildPipelineConfig(source: PipelineEnv): PipelineConfig {
    return PipelineConfigSchema.parse({
        classification: {
            maxOutputTokens: source.CLASSIFY_MAX_TOKENS,
        },
        analysis: {
            maxOutputTokens: source.ANALYSIS_MAX_TOKENS,
            temperature: source.ANALYSIS_TEMPERATURE,
        },
        storage: {
            tempDir: source.TEMP_DIR,
            reportsDir: source.REPORTS_DIR,
        },
    });
}
