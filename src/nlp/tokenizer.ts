import { DEFAULT_MIN_TOKEN_LENGTH } from '../types/index.js';
import { normalizeTitle } from './normalize.js';
import { STOPWORDS } from './stopwords.js';

export interface TokenizerOptions {
    stopwords?: ReadonlySet<string>;
    minTokenLength?: number;
}

/**
 * Extract the significant keywords of a title.
 * - Normalize (lowercase, punctuation stripped)
 * - Split on whitespace
 * - Remove stopwords
 * - Remove tokens shorter than `minTokenLength`
 * - Duplicates collapse (set)
 *
 * An empty set means token similarity is undefined for this title.
 */
export function significantTokens(title: string, options: TokenizerOptions = {}): Set<string> {
    const { stopwords = STOPWORDS, minTokenLength = DEFAULT_MIN_TOKEN_LENGTH } = options;
    const tokens = new Set<string>();
    if (!title) return tokens;

    for (const token of normalizeTitle(title).split(' ')) {
        if (token.length >= minTokenLength && !stopwords.has(token)) {
            tokens.add(token);
        }
    }

    return tokens;
}
