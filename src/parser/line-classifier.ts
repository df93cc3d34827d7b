/**
 * Line-level heuristics used by the corpus parser to decide which field a
 * physical line of a record belongs to.
 */

/** DOI with an optional `doi:` or `doi.org/` prefix. Group 1 is the bare DOI. */
const DOI_PATTERN = /(?:(?:https?:\/\/)?(?:dx\.)?doi\.org\/|doi:\s*)?(10\.\d{4,9}\/\S+)/i;

/** DOI prefix left dangling at the end of a line (the DOI wraps onto the next line). */
const DOI_CONTEXT_AT_END = /(?:doi\.org\/|doi:\s*)(?:10\.\d*\/?)?$/i;

/** A DOI whose last character shows the identifier continues on the next line. */
const DOI_WRAPPED_END = /[/_-]$/;

const AFFILIATION_REF = /\(\d+(?:\s*,\s*\d+)*\)/g;
const NAME_SEPARATOR = /\s*(?:,|;|&|\band\b)\s*/;
const SURNAME_INITIALS = /^[A-Z][\p{L}'’-]+(?: [A-Z][\p{L}'’-]+)* [A-Z]{1,3}$/u;
const INITIALS_SURNAME = /^(?:[A-Z]\.\s?){1,3}[A-Z][\p{L}'’-]+$/u;
const FULL_NAME = /^[A-Z][\p{L}'’-]+(?: (?:[A-Z]\.|[A-Z][\p{L}'’-]+)){1,3}$/u;

const CITATION_LINE = /^[A-Z][A-Za-z&.,'()\- ]{1,120}?\.\s+(?:19|20)\d{2}(?:[\s;.:]|$)/;
const TRAILER_LINE = /^(?:©|\(c\)\s|copyright\b|pmid:|pmcid:|conflict of interest|doi:)/i;

export interface DoiCut {
    doi: string;
    /** Line holding the start of the DOI */
    line: number;
    /** Text left on that line once the DOI and its prefix are removed */
    remainder: string;
    /** Line whose first token continued the DOI, if it wrapped */
    continuationLine: number | null;
    continuationRemainder: string;
}

function splitFirstToken(line: string): { token: string; rest: string } | null {
    const match = /^\s*(\S+)(.*)$/.exec(line);
    if (!match?.[1]) return null;
    return { token: match[1], rest: match[2] ?? '' };
}

function cleanDoi(raw: string): string {
    return raw.replace(/[.,;)\]]+$/, '');
}

/**
 * Find the first DOI in a record, scanning every line. A DOI broken across a
 * line break (ending in `/`, `-`, `_`, or a bare `doi.org/` prefix at the end
 * of a line) is joined with the first token of the next line.
 */
export function findDoi(lines: readonly string[]): DoiCut | null {
    for (let i = 0; i < lines.length; i++) {
        const line = lines[i] ?? '';
        const next = i + 1 < lines.length ? splitFirstToken(lines[i + 1] ?? '') : null;
        const match = DOI_PATTERN.exec(line);

        if (match?.[1]) {
            const end = match.index + match[0].length;
            const atLineEnd = line.slice(end).trim() === '';
            const remainder = line.slice(0, match.index) + line.slice(end);

            if (atLineEnd && next && DOI_WRAPPED_END.test(match[1])) {
                return {
                    doi: cleanDoi(match[1] + next.token),
                    line: i,
                    remainder,
                    continuationLine: i + 1,
                    continuationRemainder: next.rest,
                };
            }

            return { doi: cleanDoi(match[1]), line: i, remainder, continuationLine: null, continuationRemainder: '' };
        }

        const trimmed = line.trimEnd();
        if (next && DOI_CONTEXT_AT_END.test(trimmed)) {
            const joined = DOI_PATTERN.exec(trimmed + next.token);
            if (joined?.[1] && joined.index < trimmed.length) {
                return {
                    doi: cleanDoi(joined[1]),
                    line: i,
                    remainder: trimmed.slice(0, joined.index),
                    continuationLine: i + 1,
                    continuationRemainder: next.rest,
                };
            }
        }
    }

    return null;
}

/**
 * True when a line ends with a dangling DOI prefix, so a number at the start
 * of the following line belongs to the DOI rather than opening a record.
 */
export function endsInDoiContext(line: string): boolean {
    return DOI_CONTEXT_AT_END.test(line.trimEnd());
}

/**
 * Residue left on a line after cutting out a DOI carries no content.
 */
export function isResidue(text: string): boolean {
    return /^[\s.,;:]*$/.test(text) || /^\s*doi:?\s*$/i.test(text);
}

export function isBlank(line: string): boolean {
    return line.trim() === '';
}

/** `Abstract` on its own line */
export function isAbstractHeading(line: string): boolean {
    return /^abstract:?$/i.test(line.trim());
}

export function isAuthorInformationLine(line: string): boolean {
    return /^author information:?/i.test(line.trim());
}

/** PubMed affiliation entry, e.g. `(1)Department of Psychiatry, ...` */
export function isAffiliationLine(line: string): boolean {
    return /^\(\d+\)/.test(line.trim());
}

/**
 * Author list: every comma / ampersand separated part is a personal name.
 *
 * Accepted name shapes: `Smith JA`, `J. A. Smith`, and, only when the line
 * lists more than one name, `John Smith` / `John A. Smith`.
 */
export function isAuthorLine(line: string): boolean {
    const cleaned = line.replace(AFFILIATION_REF, '').trim().replace(/\.+$/, '');
    if (!cleaned) return false;

    const names = cleaned
        .split(NAME_SEPARATOR)
        .map((name) => name.trim())
        .filter((name) => name.length > 0 && name.toLowerCase() !== 'et al');
    if (names.length === 0) return false;

    return names.every((name) =>
        SURNAME_INITIALS.test(name) ||
        INITIALS_SURNAME.test(name) ||
        (names.length > 1 && FULL_NAME.test(name))
    );
}

/**
 * Journal citation that opens a PubMed record, e.g.
 * `J Med Internet Res. 2020 Jan 5;22(1):e123.`
 */
export function isCitationLine(line: string): boolean {
    const trimmed = line.trim();
    return CITATION_LINE.test(trimmed) && /[;:]|\bEpub\b/.test(trimmed);
}

/** Copyright / identifier lines that close a record */
export function isTrailerLine(line: string): boolean {
    return TRAILER_LINE.test(line.trim());
}
