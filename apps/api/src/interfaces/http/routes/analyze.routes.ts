import { FastifyInstance } from 'fastify';
import { AnalyzeController } from '../controllers/analyze.controller';
import { createAnalysisPipeline, ModelSettings } from '../../../services/create-analysis-pipeline';
import type { PipelineConfig } from '../../../domain/config.schema';

export interface AnalyzeRoutesOptions {
    config: PipelineConfig;
    model: ModelSettings;
}

export async function analyzeRoutes(server: FastifyInstance, opts: AnalyzeRoutesOptions) {
    // Composition Root for analysis (manual DI)
    const pipeline = createAnalysisPipeline(opts.config, opts.model, server.log);
    const controller = new AnalyzeController(pipeline);

    server.post('/', (req, res) => controller.analyze(req, res));
}
