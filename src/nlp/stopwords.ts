import { readFileSync } from 'node:fs';

const STOPWORDS_PATH = new URL('../../data/stopwords.json', import.meta.url);

function loadStopwords(): ReadonlySet<string> {
    const parsed: unknown = JSON.parse(readFileSync(STOPWORDS_PATH, 'utf-8'));
    if (!Array.isArray(parsed) || !parsed.every((word) => typeof word === 'string')) {
        throw new Error(`Stopword list must be a JSON array of strings: ${STOPWORDS_PATH.pathname}`);
    }
    return new Set(parsed.map((word: string) => word.toLowerCase()));
}

/**
 * Academic stopword list: articles, prepositions, conjunctions, auxiliaries
 * and generic filler such as "study", "analysis", "review".
 * Loaded once from data/stopwords.json. No stemming.
 */
export const STOPWORDS: ReadonlySet<string> = loadStopwords();

/**
 * Build a stopword set from a user-supplied list, lowercased.
 */
export function toStopwordSet(words: readonly string[] | undefined): ReadonlySet<string> {
    if (!words) return STOPWORDS;
    return new Set(words.map((word) => word.toLowerCase()));
}
