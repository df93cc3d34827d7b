import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { mergeConfig, parseConfigOverrides, resolveConfig, validateConfig } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from '../types/index.js';

describe('Config', () => {
    describe('mergeConfig', () => {
        it('should keep base values for undefined overrides', () => {
            const merged = mergeConfig(DEFAULT_CONFIG, { outDir: 'results', matching: { threshold: undefined } });
            expect(merged.outDir).toBe('results');
            expect(merged.matching.threshold).toBe(0.7);
        });

        it('should merge nested sections field by field', () => {
            const merged = mergeConfig(DEFAULT_CONFIG, { matching: { sequenceWeight: 0.5, tokenWeight: 0.5 } });
            expect(merged.matching).toEqual({ threshold: 0.7, sequenceWeight: 0.5, tokenWeight: 0.5 });
        });

        it('should return the base for no overrides', () => {
            expect(mergeConfig(DEFAULT_CONFIG, null)).toBe(DEFAULT_CONFIG);
        });
    });

    describe('validateConfig', () => {
        it('should accept the defaults', () => {
            expect(validateConfig(DEFAULT_CONFIG)).toBe(DEFAULT_CONFIG);
        });

        it('should reject a threshold outside [0, 1]', () => {
            const config = mergeConfig(DEFAULT_CONFIG, { matching: { threshold: 1.5 } });
            expect(() => validateConfig(config)).toThrow('matching.threshold: must be between 0 and 1, got 1.5');
        });

        it('should reject weights that do not sum to 1', () => {
            const config = mergeConfig(DEFAULT_CONFIG, { matching: { sequenceWeight: 0.6, tokenWeight: 0.6 } });
            expect(() => validateConfig(config)).toThrow(ConfigError);
        });

        it('should reject a sequence gap below 1', () => {
            const config = mergeConfig(DEFAULT_CONFIG, { parser: { maxSequenceGap: 0 } });
            expect(() => validateConfig(config)).toThrow('parser.maxSequenceGap: must be a positive integer, got 0');
        });

        it('should reject a non-integer token length', () => {
            const config = mergeConfig(DEFAULT_CONFIG, { tokens: { minTokenLength: 2.5 } });
            expect(() => validateConfig(config)).toThrow('tokens.minTokenLength');
        });
    });

    describe('parseConfigOverrides', () => {
        it('should read typed values', () => {
            const overrides = parseConfigOverrides(
                { db: 'runs.db', jsonLogs: true, tokens: { stopwords: ['the'] }, parser: { maxSequenceGap: 5 }, unknownKey: 1 },
                'test'
            );
            expect(overrides.parser?.maxSequenceGap).toBe(5);
            expect(overrides.db).toBe('runs.db');
            expect(overrides.jsonLogs).toBe(true);
            expect(overrides.tokens?.stopwords).toEqual(['the']);
        });

        it('should reject values of the wrong type', () => {
            expect(() => parseConfigOverrides({ matching: { threshold: 'high' } }, 'test')).toThrow('matching.threshold: must be a number');
            expect(() => parseConfigOverrides({ logLevel: 'verbose' }, 'test')).toThrow(ConfigError);
            expect(() => parseConfigOverrides({ tokens: { stopwords: [1] } }, 'test')).toThrow('tokens.stopwords');
        });
    });

    describe('resolveConfig', () => {
        let tmpDir: string;

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'abstractlink-config-'));
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        });

        it('should use defaults without a config file', async () => {
            const config = await resolveConfig({}, tmpDir);
            expect(config).toEqual(DEFAULT_CONFIG);
        });

        it('should let CLI flags override the config file', async () => {
            fs.writeFileSync(
                path.join(tmpDir, 'abstractlink.config.json'),
                JSON.stringify({ outDir: 'from-file', matching: { threshold: 0.8 } })
            );

            const config = await resolveConfig({ outDir: 'from-cli' }, tmpDir);
            expect(config.outDir).toBe('from-cli');
            expect(config.matching.threshold).toBe(0.8);
        });

        it('should reject an invalid config file', async () => {
            fs.writeFileSync(path.join(tmpDir, 'abstractlink.config.json'), JSON.stringify({ matching: { threshold: 2 } }));
            await expect(resolveConfig({}, tmpDir)).rejects.toThrow(ConfigError);
        });
    });
});
