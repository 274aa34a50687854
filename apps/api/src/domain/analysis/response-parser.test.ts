import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    CENTER_BBOX,
    LOCATION_BBOXES,
    parseAnalysisResponse,
    parseObjectItem,
} from './response-parser';

const SAMPLE_RESPONSE = [
    'Here is my analysis of the image.',
    [
        '1. OBJECT IDENTIFICATION',
        '- Submarine hull, top-left, high confidence',
        '- School of fish (mackerel), bottom-right, medium confidence',
        '- Anchor chain',
    ].join('\n'),
    '2. DETAILED DESCRIPTION\n- The hull is heavily corroded',
    '3. ENVIRONMENTAL CONTEXT\n- Murky water, low visibility',
    '4. TECHNICAL ASSESSMENT\n- Likely a diesel-electric design',
    '5. SAFETY CONSIDERATIONS\n- Entanglement risk near the chain',
    '6. ANNOTATIONS\n[Object1]: submarine, high, top-left',
    '7. ADDITIONAL OBSERVATIONS\n- Marine growth suggests decades underwater',
].join('\n\n');

describe('parseAnalysisResponse', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should extract one annotation per bulleted object line', () => {
        const { annotations, warnings } = parseAnalysisResponse(SAMPLE_RESPONSE);

        expect(warnings).toEqual([]);
        expect(annotations).toEqual([
            { label: 'submarine hull', confidence: 0.9, bbox: [0.1, 0.1, 0.4, 0.4] },
            { label: 'school of fish', confidence: 0.7, bbox: [0.6, 0.6, 0.9, 0.9] },
            { label: 'anchor chain', confidence: 0.7, bbox: CENTER_BBOX },
        ]);
    });

    it('should capture recognised sections in the order they appear and skip the annotations block', () => {
        const { sections } = parseAnalysisResponse(SAMPLE_RESPONSE);

        expect(Object.keys(sections)).toEqual([
            'detailed_description',
            'context',
            'technical_assessment',
            'considerations',
            'additional_observations',
        ]);
        expect(sections.context).toBe('3. ENVIRONMENTAL CONTEXT\n- Murky water, low visibility');
        expect(Object.values(sections).some(text => text?.includes('6. ANNOTATIONS'))).toBe(false);
    });

    it.each([
        '3. MEDICAL CONTEXT',
        '3. PSYCHOLOGICAL CONTEXT',
        '3. EDUCATIONAL CONTEXT',
    ])('should file %s under context', (header) => {
        const { sections } = parseAnalysisResponse(`${header}\n- details`);

        expect(sections).toEqual({ context: `${header}\n- details` });
    });

    it.each([
        '5. CLINICAL CONSIDERATIONS',
        '5. BEHAVIORAL CONSIDERATIONS',
        '5. PEDAGOGICAL CONSIDERATIONS',
    ])('should file %s under considerations', (header) => {
        const { sections } = parseAnalysisResponse(`${header}\n- details`);

        expect(sections).toEqual({ considerations: `${header}\n- details` });
    });

    it('should return nothing for text without recognisable headers', () => {
        const result = parseAnalysisResponse('The image shows a reef.\n\nIt is colourful.');

        expect(result).toEqual({ annotations: [], sections: {}, warnings: [] });
    });

    it('should keep the later block when a section header repeats', () => {
        const { sections } = parseAnalysisResponse(
            '2. DETAILED DESCRIPTION\nfirst\n\n4. TECHNICAL ASSESSMENT\nx\n\n2. DETAILED DESCRIPTION\nsecond'
        );

        expect(sections).toEqual({
            detailed_description: '2. DETAILED DESCRIPTION\nsecond',
            technical_assessment: '4. TECHNICAL ASSESSMENT\nx',
        });
        expect(Object.keys(sections)).toEqual(['detailed_description', 'technical_assessment']);
    });

    it('should ignore blank bullet fragments', () => {
        const { annotations } = parseAnalysisResponse('1. OBJECT IDENTIFICATION\n-   \n- Crab, bottom-left');

        expect(annotations).toEqual([{ label: 'crab', confidence: 0.7, bbox: [0.1, 0.6, 0.4, 0.9] }]);
    });

    it('should return partial results and a warning when a failure interrupts parsing', () => {
        const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        const realToLowerCase = String.prototype.toLowerCase;
        let calls = 0;
        vi.spyOn(String.prototype, 'toLowerCase').mockImplementation(function (this: string) {
            calls += 1;
            if (calls === 2) throw new Error('boom');
            return realToLowerCase.call(this);
        });

        const result = parseAnalysisResponse(
            '2. DETAILED DESCRIPTION\n- kept\n\n1. OBJECT IDENTIFICATION\n- Shark, top-right\n- Ray, center',
            logger
        );
        vi.restoreAllMocks();

        expect(result.annotations).toEqual([{ label: 'shark', confidence: 0.7, bbox: [0.6, 0.1, 0.9, 0.4] }]);
        expect(result.sections).toEqual({ detailed_description: '2. DETAILED DESCRIPTION\n- kept' });
        expect(result.warnings).toEqual(['Response parsing stopped early: boom']);
        expect(logger.error).toHaveBeenCalledTimes(1);
    });
});

describe('parseObjectItem', () => {
    it('should cut the label at the first comma and then the first parenthesis', () => {
        expect(parseObjectItem(' Foo Bar, extra text (parenthetical)').label).toBe('foo bar');
        expect(parseObjectItem('Sea Turtle (green) near the reef').label).toBe('sea turtle');
    });

    it.each([
        'Diver, center, High Confidence',
        'high confidence: a buoy, top-left',
        'Wreck (high confidence, low visibility), bottom-right',
    ])('should give 0.9 to %j', (item) => {
        expect(parseObjectItem(item).confidence).toBe(0.9);
    });

    it.each([
        'Diver, center, medium confidence',
        'Diver, center, confidence: high',
        'Diver, center',
    ])('should give 0.7 to %j', (item) => {
        expect(parseObjectItem(item).confidence).toBe(0.7);
    });

    it.each(
        LOCATION_BBOXES
            .filter(([phrase]) => phrase !== 'bottom-center')
            .map(([phrase, bbox]) => ({ phrase, bbox }))
    )('should map $phrase to its fixed rectangle', ({ phrase, bbox }) => {
        expect(parseObjectItem(`Object, located ${phrase}`).bbox).toEqual(bbox);
    });

    it('should resolve bottom-center to the center rectangle because center is checked first', () => {
        expect(parseObjectItem('Seabed debris, bottom-center').bbox).toEqual(CENTER_BBOX);
    });

    it('should prefer top-center over the corner phrases when both appear', () => {
        expect(parseObjectItem('Jellyfish, top-center drifting to top-left').bbox).toEqual([0.3, 0.1, 0.7, 0.4]);
    });

    it('should default to the center rectangle without a location phrase', () => {
        expect(parseObjectItem('Kelp forest, high confidence').bbox).toEqual(CENTER_BBOX);
    });

    it('should only ever produce one of the nine fixed rectangles', () => {
        const known = LOCATION_BBOXES.map(([, bbox]) => bbox);
        for (const item of ['a, top-left', 'b, somewhere', 'c, bottom-center', 'd, center-right', 'e, left side']) {
            expect(known).toContainEqual(parseObjectItem(item).bbox);
        }
    });
});
