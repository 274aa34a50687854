import type { Logger } from '../../shared/logger';
import type { Annotation, AnalysisSections, BBox, ParsedAnalysis, SectionKey } from './schemas';

const OBJECT_IDENTIFICATION_HEADER = '1. OBJECT IDENTIFICATION';

/**
 * Blocks are tested against these in order; the first header found in a block
 * decides its section. Block 6 (ANNOTATIONS) has no entry and is dropped.
 */
const SECTION_HEADERS: ReadonlyArray<{ key: SectionKey; headers: readonly string[] }> = [
    { key: 'detailed_description', headers: ['2. DETAILED DESCRIPTION'] },
    {
        key: 'context',
        headers: [
            '3. ENVIRONMENTAL CONTEXT',
            '3. MEDICAL CONTEXT',
            '3. PSYCHOLOGICAL CONTEXT',
            '3. EDUCATIONAL CONTEXT',
        ],
    },
    { key: 'technical_assessment', headers: ['4. TECHNICAL ASSESSMENT'] },
    {
        key: 'considerations',
        headers: [
            '5. SAFETY CONSIDERATIONS',
            '5. CLINICAL CONSIDERATIONS',
            '5. BEHAVIORAL CONSIDERATIONS',
            '5. PEDAGOGICAL CONSIDERATIONS',
        ],
    },
    { key: 'additional_observations', headers: ['7. ADDITIONAL OBSERVATIONS'] },
];

export const CENTER_BBOX: BBox = [0.3, 0.3, 0.7, 0.7];

/**
 * Checked in this order, first substring hit wins. The `center` entry shadows
 * `bottom-center`, which therefore always resolves to the center box.
 */
export const LOCATION_BBOXES: ReadonlyArray<readonly [phrase: string, bbox: BBox]> = [
    ['top-center', [0.3, 0.1, 0.7, 0.4]],
    ['top-left', [0.1, 0.1, 0.4, 0.4]],
    ['top-right', [0.6, 0.1, 0.9, 0.4]],
    ['center-left', [0.1, 0.3, 0.4, 0.7]],
    ['center-right', [0.6, 0.3, 0.9, 0.7]],
    ['center', CENTER_BBOX],
    ['bottom-left', [0.1, 0.6, 0.4, 0.9]],
    ['bottom-right', [0.6, 0.6, 0.9, 0.9]],
    ['bottom-center', [0.3, 0.6, 0.7, 0.9]],
];

export const HIGH_CONFIDENCE = 0.9;
export const DEFAULT_CONFIDENCE = 0.7;

function locateBBox(item: string): BBox {
    const match = LOCATION_BBOXES.find(([phrase]) => item.includes(phrase));
    return match ? match[1] : CENTER_BBOX;
}

function extractLabel(item: string): string {
    return item.split(',')[0].trim().split('(')[0].trim();
}

/**
 * Turns one bulleted object line into an annotation. The box comes from the
 * location phrase only; the model is never asked for real coordinates.
 */
export function parseObjectItem(fragment: string): Annotation {
    const item = fragment.trim().toLowerCase();

    return {
        label: extractLabel(item),
        confidence: item.includes('high confidence') ? HIGH_CONFIDENCE : DEFAULT_CONFIDENCE,
        bbox: locateBBox(item),
    };
}

function matchSection(block: string): SectionKey | undefined {
    return SECTION_HEADERS.find(({ headers }) => headers.some(header => block.includes(header)))?.key;
}

/**
 * Best-effort scan of a free-text analysis reply. Never throws: a failure part
 * way through keeps whatever was collected and reports it in `warnings`.
 */
export function parseAnalysisResponse(responseText: string, logger?: Logger): ParsedAnalysis {
    const annotations: Annotation[] = [];
    const sections: AnalysisSections = {};
    const warnings: string[] = [];

    try {
        for (const block of responseText.split('\n\n')) {
            if (block.includes(OBJECT_IDENTIFICATION_HEADER)) {
                for (const fragment of block.split('\n-').slice(1)) {
                    if (!fragment.trim()) continue;
                    annotations.push(parseObjectItem(fragment));
                }
                continue;
            }

            const key = matchSection(block);
            if (key) {
                sections[key] = block;
            }
        }
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        warnings.push(`Response parsing stopped early: ${message}`);
        logger?.error({ err: error }, '[ResponseParser] Failed to parse analysis response');
    }

    return { annotations, sections, warnings };
}
