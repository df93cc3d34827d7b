/**
 * Lowercased, punctuation-stripped, whitespace-collapsed title, as produced
 * by `normalizeTitle()`. Used as the exact-match lookup key.
 */
export type NormalizedTitleKey = string;

/**
 * One sequentially numbered entry parsed from the plain-text abstract corpus.
 */
export interface RawAbstractRecord {
    /** Record number as printed in the corpus (not guaranteed contiguous) */
    readonly sequence_index: number;

    /** Title, joined from one or more physical lines, trailing period stripped */
    readonly title: string;

    /** Author list and affiliation block, if one could be recognised */
    readonly author_block: string | null;

    /** DOI without any `doi:` / `https://doi.org/` prefix */
    readonly doi: string | null;

    /** Journal citation line that precedes the title in PubMed exports */
    readonly citation: string | null;

    /** Abstract text with line breaks collapsed to single spaces */
    readonly abstract_body: string;
}

/**
 * One row of the structured metadata table.
 */
export interface MetadataRecord {
    /** 0-based position of the row in the source table */
    readonly row_id: number;
    readonly title: string;
    /** Empty string means the row still needs an abstract */
    readonly abstract: string;
    readonly doi: string | null;
    /** Every source column, untouched */
    readonly fields: Readonly<Record<string, string>>;
}
