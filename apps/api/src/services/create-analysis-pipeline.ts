import type { PipelineConfig } from '../domain/config.schema';
import { GeminiVisionModel } from '../infra/ai/gemini/gemini-vision.service';
import { ImageAnnotator } from '../infra/imaging/image-annotator';
import { PdfReportBuilder } from '../infra/reporting/pdf-report.builder';
import type { Logger } from '../shared/logger';
import { AnalysisPipeline } from './analysis-pipeline.service';
import { AnalysisRequester } from './analysis-requester.service';
import { DomainClassifier } from './domain-classifier.service';

export interface ModelSettings {
    apiKey: string;
    modelName: string;
}

/**
 * Wires the production pipeline: one Gemini model shared by classification
 * and analysis, file outputs under the configured directories.
 */
export function createAnalysisPipeline(
    config: PipelineConfig,
    model: ModelSettings,
    logger?: Logger
): AnalysisPipeline {
    const vision = new GeminiVisionModel({ ...model, logger });

    return new AnalysisPipeline({
        classifier: new DomainClassifier(vision, config.classification, logger),
        requester: new AnalysisRequester(vision, config.analysis, logger),
        annotator: new ImageAnnotator(config.storage.tempDir, logger),
        reportBuilder: new PdfReportBuilder(config.storage.reportsDir, logger),
    }, config.storage, logger);
}
