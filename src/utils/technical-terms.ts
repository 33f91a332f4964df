import vocabulary from '../data/technical-terms.json';

/** Every known term, grouped categories flattened in file order. */
export const TECHNICAL_VOCABULARY: readonly string[] = [
    ...vocabulary.algorithmic,
    ...vocabulary.architecture,
    ...vocabulary.infrastructure
];

/**
 * Known terms that occur as substrings of the lowercased text, in
 * vocabulary order, without duplicates.
 */
export function extractTechnicalTerms(text: string): string[] {
    const normalized = text.toLowerCase();
    if (!normalized.trim()) {
        return [];
    }
    return [...new Set(TECHNICAL_VOCABULARY.filter(term => normalized.includes(term)))];
}
