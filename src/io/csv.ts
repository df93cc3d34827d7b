/**
 * Minimal RFC 4180 CSV reading and writing.
 */

export interface CsvTable {
    headers: string[];
    records: Array<Record<string, string>>;
}

/**
 * Parse CSV text into rows of cells.
 * Handles quoted fields, doubled quotes, embedded newlines, CRLF and a UTF-8 BOM.
 */
export function parseCsvRows(text: string): string[][] {
    const input = text.replace(/^\uFEFF/, '');
    const rows: string[][] = [];
    let row: string[] = [];
    let cell = '';
    let inQuotes = false;
    let i = 0;

    while (i < input.length) {
        const ch = input.charAt(i);

        if (inQuotes) {
            if (ch === '"') {
                if (input.charAt(i + 1) === '"') {
                    cell += '"';
                    i += 2;
                    continue;
                }
                inQuotes = false;
            } else {
                cell += ch;
            }
            i++;
            continue;
        }

        if (ch === '"' && cell.length === 0) {
            inQuotes = true;
        } else if (ch === ',') {
            row.push(cell);
            cell = '';
        } else if (ch === '\n' || ch === '\r') {
            row.push(cell);
            rows.push(row);
            row = [];
            cell = '';
            if (ch === '\r' && input.charAt(i + 1) === '\n') i++;
        } else {
            cell += ch;
        }
        i++;
    }

    if (cell.length > 0 || row.length > 0) {
        row.push(cell);
        rows.push(row);
    }

    return rows.filter((r) => !(r.length === 1 && r[0] === ''));
}

/**
 * Parse CSV text with a header row into keyed records. Missing trailing cells
 * become empty strings; extra cells are ignored.
 */
export function parseCsv(text: string): CsvTable {
    const [headerRow, ...dataRows] = parseCsvRows(text);
    if (!headerRow) return { headers: [], records: [] };

    const headers = headerRow.map((h) => h.trim());
    const records = dataRows.map((cells) => {
        const record: Record<string, string> = {};
        headers.forEach((header, i) => {
            record[header] = cells[i] ?? '';
        });
        return record;
    });

    return { headers, records };
}

/**
 * Quote a single value. Line breaks become spaces so every record stays on one line.
 */
export function escapeCsvValue(value: string | number | null | undefined): string {
    const text = String(value ?? '').replace(/\r\n|\r|\n/g, ' ');
    return `"${text.replace(/"/g, '""')}"`;
}

/**
 * Serialize rows with every field quoted, prefixed with a BOM so spreadsheet
 * tools detect UTF-8.
 */
export function toCsv(headers: readonly string[], rows: ReadonlyArray<Readonly<Record<string, string | number | null>>>): string {
    let csv = '\uFEFF' + headers.map(escapeCsvValue).join(',') + '\r\n';
    for (const row of rows) {
        csv += headers.map((h) => escapeCsvValue(row[h])).join(',') + '\r\n';
    }
    return csv;
}
