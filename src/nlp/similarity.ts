import { DEFAULT_SEQUENCE_WEIGHT, DEFAULT_TOKEN_WEIGHT, type NormalizedTitleKey } from '../types/index.js';
import { normalizeTitle } from './normalize.js';
import { significantTokens, type TokenizerOptions } from './tokenizer.js';

/**
 * Blend weights for title similarity (must sum to 1.0).
 * Whole-string shape is favoured over bag-of-words overlap.
 */
export interface SimilarityWeights {
    sequence: number;
    token: number;
}

export const DEFAULT_SIMILARITY_WEIGHTS: Readonly<SimilarityWeights> = {
    sequence: DEFAULT_SEQUENCE_WEIGHT,
    token: DEFAULT_TOKEN_WEIGHT,
};

const WORD_BITS = 32;

/**
 * Per-character position bitsets of a pattern string, 32 positions per word.
 */
type MatchMasks = Map<number, Uint32Array>;

function buildMatchMasks(pattern: string): MatchMasks {
    const words = Math.ceil(pattern.length / WORD_BITS);
    const masks: MatchMasks = new Map();

    for (let i = 0; i < pattern.length; i++) {
        const code = pattern.charCodeAt(i);
        let mask = masks.get(code);
        if (!mask) {
            mask = new Uint32Array(words);
            masks.set(code, mask);
        }
        const word = Math.floor(i / WORD_BITS);
        mask[word] = ((mask[word] ?? 0) | (1 << (i % WORD_BITS))) >>> 0;
    }

    return masks;
}

function popcount(x: number): number {
    let v = x >>> 0;
    v = v - ((v >>> 1) & 0x55555555);
    v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
    return (((v + (v >>> 4)) & 0x0f0f0f0f) * 0x01010101) >>> 24;
}

/**
 * Bit-parallel LCS length (Hyyrö): one pass over `text`, ceil(m/32) word
 * operations per character, where m is the pattern length.
 */
function lcsWithMasks(masks: MatchMasks, patternLength: number, text: string): number {
    if (patternLength === 0 || text.length === 0) return 0;

    const words = Math.ceil(patternLength / WORD_BITS);
    const v = new Uint32Array(words).fill(0xffffffff);

    for (let j = 0; j < text.length; j++) {
        const match = masks.get(text.charCodeAt(j));
        if (!match) continue;

        let carry = 0;
        for (let w = 0; w < words; w++) {
            const vw = v[w] ?? 0;
            const mw = match[w] ?? 0;
            const u = (vw & mw) >>> 0;
            const sum = vw + u + carry;
            carry = sum > 0xffffffff ? 1 : 0;
            v[w] = ((sum >>> 0) | (vw & ~mw)) >>> 0;
        }
    }

    let lcs = 0;
    for (let w = 0; w < words; w++) {
        const bits = Math.min(WORD_BITS, patternLength - w * WORD_BITS);
        const live = bits === WORD_BITS ? 0xffffffff : (1 << bits) - 1;
        lcs += bits - popcount((v[w] ?? 0) & live);
    }
    return lcs;
}

/**
 * Length of the longest common subsequence of two strings (UTF-16 units).
 */
export function longestCommonSubsequence(a: string, b: string): number {
    return lcsWithMasks(buildMatchMasks(a), a.length, b);
}

/**
 * Character-level sequence similarity: 2 * LCS / (|a| + |b|).
 * Symmetric, 1.0 for identical strings, 0.0 for disjoint or empty ones.
 */
export function sequenceSimilarity(a: string, b: string): number {
    if (a.length === 0 || b.length === 0) return 0;
    if (a === b) return 1;
    return (2 * longestCommonSubsequence(a, b)) / (a.length + b.length);
}

/**
 * Jaccard overlap of two token sets. 0.0 when both are empty.
 */
export function tokenOverlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    if (a.size === 0 && b.size === 0) return 0;

    const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
    let intersection = 0;
    for (const token of smaller) {
        if (larger.has(token)) intersection++;
    }

    return intersection / (a.size + b.size - intersection);
}

/**
 * Everything the scorer needs about one title, computed once.
 */
export interface TitleProfile {
    readonly title: string;
    readonly key: NormalizedTitleKey;
    readonly tokens: ReadonlySet<string>;
    readonly masks: MatchMasks;
}

export interface TitleScorerOptions extends TokenizerOptions {
    weights?: SimilarityWeights;
}

/**
 * Blended title similarity:
 *
 *   weights.sequence * sequenceSimilarity(normalized a, normalized b)
 *     + weights.token * tokenOverlap(significant tokens a, significant tokens b)
 *
 * When either title has no significant tokens the token term is undefined
 * and the score is the sequence similarity alone. Equal non-empty keys
 * always score exactly 1.0.
 */
export class TitleScorer {
    private readonly weights: SimilarityWeights;
    private readonly tokenizerOptions: TokenizerOptions;

    constructor(options: TitleScorerOptions = {}) {
        const { weights = DEFAULT_SIMILARITY_WEIGHTS, ...tokenizerOptions } = options;
        this.weights = { ...weights };
        this.tokenizerOptions = tokenizerOptions;
    }

    profile(title: string): TitleProfile {
        const key = normalizeTitle(title);
        return {
            title,
            key,
            tokens: significantTokens(title, this.tokenizerOptions),
            masks: buildMatchMasks(key),
        };
    }

    score(a: TitleProfile, b: TitleProfile): number {
        if (a.key.length === 0 || b.key.length === 0) return 0;
        if (a.key === b.key) return 1;

        const sequence = (2 * lcsWithMasks(a.masks, a.key.length, b.key)) / (a.key.length + b.key.length);

        if (a.tokens.size === 0 || b.tokens.size === 0) {
            return sequence;
        }

        return this.weights.sequence * sequence + this.weights.token * tokenOverlap(a.tokens, b.tokens);
    }

    scoreTitles(a: string, b: string): number {
        return this.score(this.profile(a), this.profile(b));
    }
}

/**
 * Score two raw titles with the default (or given) weights and tokenizer.
 */
export function scoreTitles(a: string, b: string, options: TitleScorerOptions = {}): number {
    return new TitleScorer(options).scoreTitles(a, b);
}
