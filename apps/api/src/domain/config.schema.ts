import { z } from 'zod';

export const PipelineConfigSchema = z.object({
    classification: z.object({
        maxOutputTokens: z.number().int().min(1).max(1000).default(50),
        temperature: z.number().min(0).max(2).default(0),
    }).default({}),
    analysis: z.object({
        maxOutputTokens: z.number().int().min(1).max(8192).default(1500),
        // Left unset so the provider's own default sampling applies
        temperature: z.number().min(0).max(2).optional(),
    }).default({}),
    storage: z.object({
        tempDir: z.string().min(1).default('temp'),
        reportsDir: z.string().min(1).default('reports'),
    }).default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = PipelineConfigSchema.parse({});
