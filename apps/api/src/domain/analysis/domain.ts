export enum Domain {
    HEALTHCARE = 'healthcare',
    PSYCHOLOGY = 'psychology',
    EDUCATION = 'education',
    UNDERSEA = 'undersea',
}

export const DOMAINS: readonly Domain[] = Object.values(Domain);

export const DEFAULT_DOMAIN = Domain.UNDERSEA;

/**
 * Single-word answers the classifier accepts in place of a canonical label.
 */
export const DOMAIN_SYNONYMS: Readonly<Record<string, Domain>> = {
    medical: Domain.HEALTHCARE,
    health: Domain.HEALTHCARE,
    clinical: Domain.HEALTHCARE,
    psychological: Domain.PSYCHOLOGY,
    behavioral: Domain.PSYCHOLOGY,
    educational: Domain.EDUCATION,
    academic: Domain.EDUCATION,
    learning: Domain.EDUCATION,
    underwater: Domain.UNDERSEA,
    marine: Domain.UNDERSEA,
    aquatic: Domain.UNDERSEA,
};

export function isDomain(value: string): value is Domain {
    return DOMAINS.some((domain) => domain === value);
}

/**
 * Resolves a raw classifier reply to a domain: first token, lowercased, with
 * surrounding punctuation removed, then exact label, then synonym, then default.
 */
export function resolveDomain(reply: string): Domain {
    const token = reply.trim().toLowerCase().split(/\s+/)[0] ?? '';
    const cleaned = token.replace(/^[.:!?]+|[.:!?]+$/g, '');

    if (!cleaned) return DEFAULT_DOMAIN;
    if (isDomain(cleaned)) return cleaned;

    return Object.prototype.hasOwnProperty.call(DOMAIN_SYNONYMS, cleaned)
        ? DOMAIN_SYNONYMS[cleaned]
        : DEFAULT_DOMAIN;
}
