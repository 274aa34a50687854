import { PDFDocument, PDFFont, PDFPage, PageSizes, StandardFonts } from 'pdf-lib';
import sharp from 'sharp';
import { format } from 'date-fns';
import { access, writeFile } from 'fs/promises';
import path from 'path';
import type { Domain } from '../../domain/analysis/domain';
import type { AnalysisSections, Annotation } from '../../domain/analysis/schemas';
import type { Logger } from '../../shared/logger';
import { toTitleCase, wrapText } from '../../shared/text';
import { reportFileName } from '../storage/file-naming';

export interface ReportInput {
    /** Raw model reply; attached to the PDF as-is, not laid out. */
    analysis: string;
    sections: AnalysisSections;
    domain: Domain;
    imagePath: string;
    /** Already drawn into the annotated image; only listed in the metadata. */
    annotations: Annotation[];
    annotatedPath?: string;
}

export const REPORT_LAYOUT = {
    margin: 100,
    top: 750,
    bottom: 100,
    lineHeight: 15,
    wrapColumns: 70,
    bulletIndent: 20,
    image: { width: 220, height: 160, gap: 30 },
} as const;

interface ReportFonts {
    regular: PDFFont;
    bold: PDFFont;
}

/**
 * Top-down cursor over a growing list of A4 pages, with the current font kept
 * across calls the way a drawing canvas would.
 */
class ReportCanvas {
    private page: PDFPage;
    private font: PDFFont;
    private size = 10;
    y: number = REPORT_LAYOUT.top;

    constructor(private readonly doc: PDFDocument, private readonly fonts: ReportFonts) {
        this.page = doc.addPage(PageSizes.A4);
        this.font = fonts.regular;
    }

    setFont(font: PDFFont, size: number) {
        this.font = font;
        this.size = size;
    }

    /** Starts a new page when the cursor has passed the bottom margin. */
    breakIfNeeded() {
        if (this.y < REPORT_LAYOUT.bottom) {
            this.page = this.doc.addPage(PageSizes.A4);
            this.y = REPORT_LAYOUT.top;
            this.setFont(this.fonts.regular, 10);
        }
    }

    drawString(x: number, y: number, text: string) {
        this.page.drawText(encodable(this.font, text), { x, y, size: this.size, font: this.font });
    }

    async drawJpeg(jpeg: Buffer, x: number, y: number, width: number, height: number) {
        const image = await this.doc.embedJpg(jpeg);
        this.page.drawImage(image, { x, y, width, height });
    }
}

/**
 * Standard PDF fonts only cover WinAnsi; anything outside it becomes '?'.
 */
function encodable(font: PDFFont, text: string): string {
    const supported = new Set(font.getCharacterSet());
    return Array.from(text, char => {
        const codePoint = char.codePointAt(0);
        return codePoint !== undefined && supported.has(codePoint) ? char : '?';
    }).join('');
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await access(filePath);
        return true;
    } catch {
        return false;
    }
}

export function sectionTitle(key: string): string {
    return toTitleCase(key.replace(/_/g, ' '));
}

export class PdfReportBuilder {
    constructor(
        private readonly reportsDir: string,
        private readonly logger?: Logger
    ) { }

    /**
     * Renders the report and returns its file name inside the reports directory.
     */
    async build(input: ReportInput): Promise<string> {
        const { analysis, sections, domain, imagePath, annotations, annotatedPath } = input;
        const { margin, lineHeight, wrapColumns, bulletIndent, image } = REPORT_LAYOUT;
        const now = new Date();
        const filename = reportFileName(domain, now);
        const title = `Domain-Specific Image Analysis Report - ${toTitleCase(domain)}`;

        const doc = await PDFDocument.create();
        doc.setTitle(title);
        doc.setSubject(`${domain} image analysis`);
        doc.setKeywords(annotations.map(annotation => annotation.label));
        doc.setCreationDate(now);
        await doc.attach(Buffer.from(analysis, 'utf8'), 'analysis.txt', {
            mimeType: 'text/plain',
            description: 'Raw model response',
            creationDate: now,
        });

        const fonts: ReportFonts = {
            regular: await doc.embedFont(StandardFonts.Helvetica),
            bold: await doc.embedFont(StandardFonts.HelveticaBold),
        };
        const canvas = new ReportCanvas(doc, fonts);

        canvas.setFont(fonts.bold, 16);
        canvas.drawString(margin, canvas.y, title);
        canvas.y -= 30;

        canvas.setFont(fonts.regular, 10);
        canvas.drawString(margin, canvas.y, `Generated on: ${format(now, 'yyyy-MM-dd HH:mm:ss')}`);
        canvas.y -= 40;

        if (annotatedPath && await fileExists(imagePath) && await fileExists(annotatedPath)) {
            const top = canvas.y - image.height;
            const secondX = margin + image.width + image.gap;

            await canvas.drawJpeg(await sharp(imagePath).jpeg().toBuffer(), margin, top, image.width, image.height);
            canvas.drawString(margin, top - 20, 'Original Image');

            await canvas.drawJpeg(await sharp(annotatedPath).jpeg().toBuffer(), secondX, top, image.width, image.height);
            canvas.drawString(secondX, top - 20, 'Annotated Image');

            canvas.y -= image.height + 40;
        }

        for (const [key, content] of Object.entries(sections)) {
            if (content === undefined) continue;

            canvas.breakIfNeeded();

            canvas.setFont(fonts.bold, 12);
            canvas.drawString(margin, canvas.y, sectionTitle(key));
            canvas.y -= 20;

            canvas.setFont(fonts.regular, 10);

            for (const rawLine of content.split('\n')) {
                const line = rawLine.trim();
                if (!line) continue;

                for (const wrapped of wrapText(line, wrapColumns)) {
                    canvas.breakIfNeeded();
                    const x = wrapped.startsWith('-') ? margin + bulletIndent : margin;
                    canvas.drawString(x, canvas.y, wrapped);
                    canvas.y -= lineHeight;
                }
            }

            canvas.y -= 20;
        }

        const bytes = await doc.save();
        await writeFile(path.join(this.reportsDir, filename), bytes);

        this.logger?.info({ filename, pages: doc.getPageCount() }, '[PdfReportBuilder] Report written');
        return filename;
    }
}
