import type { NormalizedTitleKey } from '../types/index.js';

/**
 * Punctuation that carries no identity for a title. Hyphens are kept so that
 * "self-help" and "self help" stay distinguishable.
 */
const TITLE_PUNCTUATION = /[.,;:!?"'`“”‘’()[\]{}]/g;

/**
 * Canonical lookup key for a title:
 * - Unicode NFKC
 * - Lowercase
 * - Punctuation replaced by spaces (this also drops a trailing period)
 * - Whitespace collapsed and trimmed
 *
 * Idempotent: normalizeTitle(normalizeTitle(x)) === normalizeTitle(x).
 */
export function normalizeTitle(title: string): NormalizedTitleKey {
    return title
        .normalize('NFKC')
        .toLowerCase()
        .replace(TITLE_PUNCTUATION, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Collapse runs of whitespace (including line breaks) into single spaces.
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}
