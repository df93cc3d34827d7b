import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, MatchStatus } from '../types/index.js';

describe('Types', () => {
    describe('MatchStatus', () => {
        it('should have exactly 4 statuses', () => {
            expect(Object.values(MatchStatus)).toHaveLength(4);
        });

        it('should use the labels written to the match_type column', () => {
            expect(Object.values(MatchStatus).sort()).toEqual(['Exact', 'Existing', 'Fuzzy', 'None']);
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should have a fuzzy threshold of 0.7', () => {
            expect(DEFAULT_CONFIG.matching.threshold).toBe(0.7);
        });

        it('should weight sequence 0.6 and tokens 0.4', () => {
            expect(DEFAULT_CONFIG.matching.sequenceWeight).toBe(0.6);
            expect(DEFAULT_CONFIG.matching.tokenWeight).toBe(0.4);
        });

        it('should ignore tokens shorter than 3 characters', () => {
            expect(DEFAULT_CONFIG.tokens.minTokenLength).toBe(3);
        });

        it('should truncate fields at 10000 characters', () => {
            expect(DEFAULT_CONFIG.parser.maxFieldLength).toBe(10_000);
        });

        it('should accept record numbers up to 50 past the last one', () => {
            expect(DEFAULT_CONFIG.parser.maxSequenceGap).toBe(50);
        });

        it('should read Title, Abstract and DOI columns', () => {
            expect(DEFAULT_CONFIG.titleColumn).toBe('Title');
            expect(DEFAULT_CONFIG.abstractColumn).toBe('Abstract');
            expect(DEFAULT_CONFIG.doiColumn).toBe('DOI');
        });

        it('should have no review store by default', () => {
            expect(DEFAULT_CONFIG.db).toBeUndefined();
        });
    });
});
