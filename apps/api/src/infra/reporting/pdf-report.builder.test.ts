import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';
import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import os from 'os';
import path from 'path';
import { PdfReportBuilder, sectionTitle } from './pdf-report.builder';
import { Domain } from '../../domain/analysis/domain';

async function loadReport(dir: string, filename: string) {
    return PDFDocument.load(await readFile(path.join(dir, filename)));
}

describe('sectionTitle', () => {
    it('should turn section keys into headings', () => {
        expect(sectionTitle('technical_assessment')).toBe('Technical Assessment');
        expect(sectionTitle('context')).toBe('Context');
    });
});

describe('PdfReportBuilder', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'report-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should write a single-page report named after the domain when no sections were parsed', async () => {
        const builder = new PdfReportBuilder(dir);

        const filename = await builder.build({
            analysis: 'Unstructured reply',
            sections: {},
            domain: Domain.PSYCHOLOGY,
            imagePath: path.join(dir, 'missing.jpg'),
            annotations: [],
            annotatedPath: path.join(dir, 'missing-annotated.jpg'),
        });

        expect(filename).toMatch(/^report_psychology_\d{8}_\d{6}\.pdf$/);
        const pdf = await loadReport(dir, filename);
        expect(pdf.getPageCount()).toBe(1);
        expect(pdf.getTitle()).toBe('Domain-Specific Image Analysis Report - Psychology');
        expect(pdf.getSubject()).toBe('psychology image analysis');
    });

    it('should paginate once the text passes the bottom margin', async () => {
        const builder = new PdfReportBuilder(dir);
        const longSection = Array.from({ length: 60 }, (_, i) => `- observation ${i + 1}`).join('\n');

        const filename = await builder.build({
            analysis: longSection,
            sections: { additional_observations: `7. ADDITIONAL OBSERVATIONS\n${longSection}` },
            domain: Domain.UNDERSEA,
            imagePath: path.join(dir, 'missing.jpg'),
            annotations: [],
        });

        // 61 lines from y=660 at 15pt each; the 39th line starts page two
        const pdf = await loadReport(dir, filename);
        expect(pdf.getPageCount()).toBe(2);
    });

    it('should embed the original and annotated images when both exist', async () => {
        const original = path.join(dir, 'temp.jpg');
        const annotated = path.join(dir, 'annotated.png');
        await sharp({ create: { width: 64, height: 48, channels: 3, background: '#204060' } }).jpeg().toFile(original);
        await sharp({ create: { width: 64, height: 48, channels: 3, background: '#ff0000' } }).png().toFile(annotated);

        const builder = new PdfReportBuilder(dir);
        const withImages = await builder.build({
            analysis: 'text',
            sections: { context: '3. MEDICAL CONTEXT\n- X-ray of the left hand' },
            domain: Domain.HEALTHCARE,
            imagePath: original,
            annotations: [{ label: 'fracture', confidence: 0.9, bbox: [0.3, 0.3, 0.7, 0.7] }],
            annotatedPath: annotated,
        });

        const pdf = await loadReport(dir, withImages);
        expect(pdf.getPageCount()).toBe(1);
        expect(pdf.getKeywords()).toBe('fracture');
        expect((await stat(path.join(dir, withImages))).size).toBeGreaterThan(1000);
    });

    it('should render characters the standard font cannot encode', async () => {
        const builder = new PdfReportBuilder(dir);

        const filename = await builder.build({
            analysis: 'text',
            sections: { detailed_description: '2. DETAILED DESCRIPTION\n- Depth ≈ 30m 🐟 near the wreck' },
            domain: Domain.UNDERSEA,
            imagePath: path.join(dir, 'missing.jpg'),
            annotations: [],
        });

        await expect(loadReport(dir, filename)).resolves.toBeInstanceOf(PDFDocument);
    });

    it('should propagate write failures', async () => {
        const builder = new PdfReportBuilder(path.join(dir, 'does-not-exist'));

        await expect(builder.build({
            analysis: 'text',
            sections: {},
            domain: Domain.EDUCATION,
            imagePath: path.join(dir, 'missing.jpg'),
            annotations: [],
        })).rejects.toThrow(/ENOENT/);
    });
});
