import { DEFAULT_MAX_FIELD_LENGTH, DEFAULT_MAX_SEQUENCE_GAP } from '../types/index.js';
import type { ParseStats, ParseWarning, RawAbstractRecord, RecordField, RejectedMarkerReason } from '../types/index.js';
import { collapseWhitespace } from '../nlp/normalize.js';
import { ParseError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import {
    endsInDoiContext,
    findDoi,
    isAbstractHeading,
    isAffiliationLine,
    isAuthorInformationLine,
    isAuthorLine,
    isBlank,
    isCitationLine,
    isResidue,
    isTrailerLine,
} from './line-classifier.js';

export const TRUNCATION_MARKER = '... [TRUNCATED]';

/** `12. Title text`, or a bare `12.`, at the very start of a line */
const RECORD_MARKER = /^(\d{1,6})\.(?:[ \t]+(.*))?$/;

export interface ParseOptions {
    maxFieldLength?: number;
    maxSequenceGap?: number;
}

export interface ParsedCorpus {
    records: RawAbstractRecord[];
    stats: ParseStats;
}

interface RecordSpan {
    sequenceIndex: number;
    /** Marker line with the `12. ` prefix removed (unless it was bare), then the record's other lines */
    lines: string[];
}

// ─── Encoding ────────────────────────────────────────────

function locate(text: string, index: number): { line: number; column: number; byteOffset: number } {
    const before = text.slice(0, index);
    const lineStart = before.lastIndexOf('\n') + 1;
    return {
        line: before.split('\n').length,
        column: index - lineStart + 1,
        byteOffset: Buffer.byteLength(before, 'utf8'),
    };
}

/**
 * Reject text that is not readable: a NUL character means binary content.
 */
function assertReadable(text: string): void {
    const index = text.indexOf('\u0000');
    if (index === -1) return;

    const { line, column, byteOffset } = locate(text, index);
    throw new ParseError('Corpus is not readable text: NUL character', byteOffset, line, column);
}

/**
 * U+FFFD left by an earlier lossy decode damages one record, not the file.
 */
function findReplacementCharacters(lines: readonly string[], warnings: ParseWarning[]): void {
    lines.forEach((line, i) => {
        for (let column = line.indexOf('\uFFFD'); column !== -1; column = line.indexOf('\uFFFD', column + 1)) {
            warnings.push({ kind: 'replacement-character', line: i + 1, column: column + 1 });
        }
    });
}

/**
 * Offset of the first byte that does not start a valid UTF-8 sequence, or -1.
 */
function firstInvalidUtf8Offset(bytes: Uint8Array): number {
    let i = 0;
    while (i < bytes.length) {
        const lead = bytes[i] ?? 0;
        let trailing: number;
        let secondMin = 0x80;
        let secondMax = 0xbf;

        if (lead < 0x80) {
            i++;
            continue;
        } else if (lead >= 0xc2 && lead <= 0xdf) {
            trailing = 1;
        } else if (lead >= 0xe0 && lead <= 0xef) {
            trailing = 2;
            if (lead === 0xe0) secondMin = 0xa0;
            if (lead === 0xed) secondMax = 0x9f;
        } else if (lead >= 0xf0 && lead <= 0xf4) {
            trailing = 3;
            if (lead === 0xf0) secondMin = 0x90;
            if (lead === 0xf4) secondMax = 0x8f;
        } else {
            return i;
        }

        if (i + trailing >= bytes.length) return i;

        const second = bytes[i + 1] ?? 0;
        if (second < secondMin || second > secondMax) return i;
        for (let k = 2; k <= trailing; k++) {
            if (((bytes[i + k] ?? 0) & 0xc0) !== 0x80) return i;
        }

        i += trailing + 1;
    }
    return -1;
}

/**
 * Strict UTF-8 decode of a corpus file (a leading BOM is dropped).
 * Throws ParseError with the byte offset and line of the first invalid byte.
 */
export function decodeCorpus(bytes: Uint8Array): string {
    const invalid = firstInvalidUtf8Offset(bytes);
    if (invalid !== -1) {
        let line = 1;
        let lineStart = 0;
        for (let i = 0; i < invalid; i++) {
            if (bytes[i] === 0x0a) {
                line++;
                lineStart = i + 1;
            }
        }
        throw new ParseError('Corpus is not valid UTF-8', invalid, line, invalid - lineStart + 1);
    }

    return new TextDecoder('utf-8').decode(bytes);
}

// ─── Record boundaries ───────────────────────────────────

/**
 * Split the corpus into numbered record spans.
 *
 * A numbered line opens a record unless:
 * - the previous line ends in a dangling DOI prefix (`doi-context`)
 * - its number is not greater than the last accepted number (`out-of-sequence`)
 * - it jumps more than `maxSequenceGap` past the last accepted number (`sequence-gap`)
 *
 * Gaps within the limit are accepted anywhere. Rejected numbers stay in the
 * current record's text and are reported. Text before the first record is ignored.
 */
function splitRecords(lines: readonly string[], maxSequenceGap: number, warnings: ParseWarning[]): RecordSpan[] {
    const spans: RecordSpan[] = [];
    let current: RecordSpan | null = null;
    let lastIndex = 0;

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i] ?? '';
        const marker = RECORD_MARKER.exec(line);

        if (marker?.[1]) {
            const number = parseInt(marker[1], 10);
            const previous = i > 0 ? lines[i - 1] ?? '' : '';

            let rejected: RejectedMarkerReason | null = null;
            if (endsInDoiContext(previous)) {
                rejected = 'doi-context';
            } else if (number <= lastIndex) {
                rejected = 'out-of-sequence';
            } else if (spans.length > 0 && number - lastIndex > maxSequenceGap) {
                rejected = 'sequence-gap';
            }

            if (rejected === null) {
                const titleText = (marker[2] ?? '').trim();
                current = { sequenceIndex: number, lines: titleText.length > 0 ? [titleText] : [] };
                spans.push(current);
                lastIndex = number;
                continue;
            }

            warnings.push({ kind: 'rejected-marker', line: i + 1, marker: number, reason: rejected });
        }

        current?.lines.push(line);
    }

    return spans;
}

// ─── Field extraction ────────────────────────────────────

interface ExtractedFields {
    title: string;
    author_block: string | null;
    doi: string | null;
    citation: string | null;
    abstract_body: string;
}

function joinLines(lines: readonly string[]): string {
    return collapseWhitespace(lines.join(' '));
}

/**
 * Assign every line of a record to exactly one field. Title breaks are
 * checked in fixed priority: author list, blank line, `Abstract` heading.
 */
function extractFields(span: RecordSpan): ExtractedFields {
    const lines = [...span.lines];
    const consumed = new Set<number>();

    const doiCut = findDoi(lines);
    if (doiCut) {
        lines[doiCut.line] = doiCut.remainder;
        if (isResidue(doiCut.remainder)) consumed.add(doiCut.line);
        if (doiCut.continuationLine !== null) {
            lines[doiCut.continuationLine] = doiCut.continuationRemainder;
            if (isResidue(doiCut.continuationRemainder)) consumed.add(doiCut.continuationLine);
        }
    }

    let cursor = 0;
    const lineAt = (index: number): string => (lines[index] ?? '').trim();
    const skipBlank = (): void => {
        while (cursor < lines.length && (consumed.has(cursor) || isBlank(lineAt(cursor)))) cursor++;
    };

    // A bare `12.` marker puts the record's first line further down
    skipBlank();

    // Citation (PubMed exports): first line plus its continuation up to a blank line
    const citationLines: string[] = [];
    if (cursor < lines.length && isCitationLine(lineAt(cursor))) {
        while (cursor < lines.length && (consumed.has(cursor) || !isBlank(lineAt(cursor)))) {
            if (!consumed.has(cursor)) citationLines.push(lineAt(cursor));
            cursor++;
        }
        skipBlank();
    }

    // Title
    const titleLines: string[] = [];
    while (cursor < lines.length) {
        if (consumed.has(cursor)) {
            cursor++;
            continue;
        }
        const line = lineAt(cursor);
        if (titleLines.length > 0 && isAuthorLine(line)) break;
        if (isBlank(line)) break;
        if (isAbstractHeading(line)) break;
        if (isAuthorInformationLine(line) || isAffiliationLine(line) || isTrailerLine(line)) break;
        titleLines.push(line);
        cursor++;
    }

    // Authors and affiliations
    const authorLines: string[] = [];
    skipBlank();
    while (cursor < lines.length && !consumed.has(cursor) && isAuthorLine(lineAt(cursor))) {
        authorLines.push(lineAt(cursor));
        cursor++;
    }
    skipBlank();
    if (cursor < lines.length && (isAuthorInformationLine(lineAt(cursor)) || isAffiliationLine(lineAt(cursor)))) {
        while (cursor < lines.length && (consumed.has(cursor) || !isBlank(lineAt(cursor)))) {
            if (!consumed.has(cursor)) authorLines.push(lineAt(cursor));
            cursor++;
        }
    }

    // Abstract body up to the trailer
    const bodyLines: string[] = [];
    for (; cursor < lines.length; cursor++) {
        if (consumed.has(cursor)) continue;
        const line = lineAt(cursor);
        if (isTrailerLine(line)) break;
        if (isBlank(line) || isAbstractHeading(line)) continue;
        bodyLines.push(line);
    }

    let title = joinLines(titleLines);
    if (title.endsWith('.')) title = title.slice(0, -1).trimEnd();

    return {
        title,
        author_block: authorLines.length > 0 ? joinLines(authorLines) : null,
        doi: doiCut?.doi ?? null,
        citation: citationLines.length > 0 ? joinLines(citationLines) : null,
        abstract_body: joinLines(bodyLines),
    };
}

function truncateFields(
    fields: ExtractedFields,
    sequenceIndex: number,
    maxFieldLength: number,
    warnings: ParseWarning[]
): ExtractedFields {
    const truncate = (field: RecordField, value: string): string => {
        if (value.length <= maxFieldLength) return value;
        warnings.push({ kind: 'truncated-field', sequence_index: sequenceIndex, field, original_length: value.length });
        return value.slice(0, maxFieldLength) + TRUNCATION_MARKER;
    };
    const truncateNullable = (field: RecordField, value: string | null): string | null =>
        value === null ? null : truncate(field, value);

    return {
        title: truncate('title', fields.title),
        author_block: truncateNullable('author_block', fields.author_block),
        doi: truncateNullable('doi', fields.doi),
        citation: truncateNullable('citation', fields.citation),
        abstract_body: truncate('abstract_body', fields.abstract_body),
    };
}

// ─── Entry point ─────────────────────────────────────────

/**
 * Parse a plain-text corpus of numbered abstract entries.
 *
 * Best-effort: malformed records are skipped or emitted with empty fields and
 * counted, never thrown. Only binary (NUL) content raises ParseError.
 * Deterministic: the same text always yields the same records.
 */
export function parseCorpus(text: string, options: ParseOptions = {}): ParsedCorpus {
    const { maxFieldLength = DEFAULT_MAX_FIELD_LENGTH, maxSequenceGap = DEFAULT_MAX_SEQUENCE_GAP } = options;
    const logger = getLogger();

    assertReadable(text);

    const warnings: ParseWarning[] = [];
    const lines = text.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').split('\n');
    findReplacementCharacters(lines, warnings);
    const spans = splitRecords(lines, maxSequenceGap, warnings);

    const records: RawAbstractRecord[] = [];
    let noiseDiscarded = 0;

    for (const span of spans) {
        const fields = truncateFields(extractFields(span), span.sequenceIndex, maxFieldLength, warnings);
        const hasTitle = fields.title.length > 0;
        const hasBody = fields.abstract_body.length > 0;

        if (!hasTitle && !hasBody) {
            noiseDiscarded++;
            continue;
        }

        if (!hasTitle || !hasBody) {
            warnings.push({
                kind: 'malformed-record',
                sequence_index: span.sequenceIndex,
                missing: hasTitle ? ['abstract_body'] : ['title'],
                dropped: !hasBody,
            });
            logger.debug({ sequenceIndex: span.sequenceIndex, hasTitle, hasBody }, 'Malformed corpus record');
            if (!hasBody) continue;
        }

        records.push(Object.freeze({ sequence_index: span.sequenceIndex, ...fields }));
    }

    const stats: ParseStats = {
        markersAccepted: spans.length,
        recordsParsed: records.length,
        noiseDiscarded,
        malformedRecords: warnings.filter((w) => w.kind === 'malformed-record').length,
        truncatedFields: warnings.filter((w) => w.kind === 'truncated-field').length,
        rejectedMarkers: warnings.filter((w) => w.kind === 'rejected-marker').length,
        replacementCharacters: warnings.filter((w) => w.kind === 'replacement-character').length,
        warnings,
    };

    logger.info(
        {
            records: stats.recordsParsed,
            malformed: stats.malformedRecords,
            truncated: stats.truncatedFields,
            rejectedMarkers: stats.rejectedMarkers,
            replacementCharacters: stats.replacementCharacters,
        },
        'Corpus parsed'
    );

    return { records, stats };
}
