import { mkdir, rm, writeFile } from 'fs/promises';
import path from 'path';
import { parseAnalysisResponse } from '../domain/analysis/response-parser';
import type { AnalyzeResult, ParsedAnalysis } from '../domain/analysis/schemas';
import type { PipelineConfig } from '../domain/config.schema';
import type { ImageAnnotator } from '../infra/imaging/image-annotator';
import type { PdfReportBuilder } from '../infra/reporting/pdf-report.builder';
import { tempImageName } from '../infra/storage/file-naming';
import type { Logger } from '../shared/logger';
import type { AnalysisRequester } from './analysis-requester.service';
import type { DomainClassifier } from './domain-classifier.service';

export interface PipelineComponents {
    classifier: Pick<DomainClassifier, 'classify'>;
    requester: Pick<AnalysisRequester, 'requestAnalysis'>;
    annotator: Pick<ImageAnnotator, 'annotate'>;
    reportBuilder: Pick<PdfReportBuilder, 'build'>;
    parse?: (responseText: string, logger?: Logger) => ParsedAnalysis;
}

/**
 * Runs one upload through classify → analyze → parse → annotate → report.
 * Temp files created along the way are removed on every exit path; the report
 * is kept for download.
 */
export class AnalysisPipeline {
    private readonly parse: (responseText: string, logger?: Logger) => ParsedAnalysis;

    constructor(
        private readonly components: PipelineComponents,
        private readonly storage: PipelineConfig['storage'],
        private readonly logger?: Logger
    ) {
        this.parse = components.parse ?? parseAnalysisResponse;
    }

    async run(imageBytes: Buffer): Promise<AnalyzeResult> {
        const { classifier, requester, annotator, reportBuilder } = this.components;
        const { tempDir, reportsDir } = this.storage;
        const tempFiles: string[] = [];

        this.logger?.info({ bytes: imageBytes.length }, '[AnalysisPipeline] Starting analysis request');

        try {
            await mkdir(tempDir, { recursive: true });
            await mkdir(reportsDir, { recursive: true });

            const imagePath = path.join(tempDir, tempImageName());
            await writeFile(imagePath, imageBytes);
            tempFiles.push(imagePath);

            const domain = await classifier.classify(imagePath);
            this.logger?.info({ domain }, '[AnalysisPipeline] Classified');

            const analysis = await requester.requestAnalysis(imagePath, domain);

            const { annotations, sections, warnings } = this.parse(analysis, this.logger);
            if (warnings.length > 0) {
                this.logger?.warn({ warnings }, '[AnalysisPipeline] Response parsed with warnings');
            }
            this.logger?.debug(
                { annotations: annotations.length, sections: Object.keys(sections) },
                '[AnalysisPipeline] Parsed analysis'
            );

            const annotatedPath = await annotator.annotate(imagePath, annotations);
            if (annotatedPath !== imagePath) {
                tempFiles.push(annotatedPath);
            }

            const reportName = await reportBuilder.build({
                analysis,
                sections,
                domain,
                imagePath,
                annotations,
                annotatedPath,
            });

            this.logger?.info({ domain, report: reportName }, '[AnalysisPipeline] Completed');

            return {
                domain,
                analysis,
                analysis_sections: sections,
                annotations,
                report_url: `/reports/${reportName}`,
            };
        } finally {
            await this.cleanup(tempFiles);
        }
    }

    private async cleanup(files: string[]): Promise<void> {
        for (const file of files) {
            try {
                await rm(file, { force: true });
            } catch (error) {
                this.logger?.warn({ err: error, file }, '[AnalysisPipeline] Error cleaning up temp file');
            }
        }
    }
}
