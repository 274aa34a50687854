import { Domain } from './domain';

/** Normalized `[x1, y1, x2, y2]`, each in image-fraction units. */
export type BBox = readonly [number, number, number, number];

export interface Annotation {
    label: string;
    confidence: number;
    bbox: BBox;
}

export type SectionKey =
    | 'detailed_description'
    | 'context'
    | 'technical_assessment'
    | 'considerations'
    | 'additional_observations';

/** Keys appear in the order their blocks were found; absent sections have no key. */
export type AnalysisSections = Partial<Record<SectionKey, string>>;

export interface ParsedAnalysis {
    annotations: Annotation[];
    sections: AnalysisSections;
    warnings: string[];
}

export interface AnalyzeResult {
    domain: Domain;
    analysis: string;
    analysis_sections: AnalysisSections;
    annotations: Annotation[];
    report_url: string;
}
