/**
 * Tabular codec: CSV bytes <-> Dataset.
 *
 * Takes bytes (not file path) to keep core headless. Values are read as
 * plain text: no number or date coercion, so a statement such as "2024" stays
 * the string the analyst typed.
 */

import * as XLSX from 'xlsx';
import { normalizeHeaders, stripBom } from '../utils/csv.js';
import type { CellValue, Dataset, Row } from '../types/index.js';

/**
 * Decode CSV data into columns and rows.
 *
 * - first row is the header (see normalizeHeaders for naming rules)
 * - empty cells become null
 * - blank lines are skipped
 *
 * @param data - File contents (UTF-8)
 */
export function decodeDataset(data: ArrayBuffer | Uint8Array): Dataset {
    const text = stripBom(new TextDecoder('utf-8').decode(data));
    return decodeDatasetText(text);
}

/**
 * decodeDataset() for text already in memory.
 */
export function decodeDatasetText(text: string): Dataset {
    if (text.trim() === '') {
        return { columns: [], rows: [] };
    }

    const workbook = XLSX.read(text, { type: 'string', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const table = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        defval: null,
        blankrows: false,
        raw: true,
    });

    if (table.length === 0) {
        return { columns: [], rows: [] };
    }

    const columns = normalizeHeaders(table[0]);
    const rows: Row[] = table.slice(1).map((values) => {
        const row: Row = {};
        columns.forEach((col, i) => {
            row[col] = toCell(values[i]);
        });
        return row;
    });

    return { columns, rows };
}

/**
 * Encode columns and rows as CSV text.
 * Booleans are written True/False, missing values as empty cells.
 */
export function encodeDataset(columns: readonly string[], rows: readonly Row[]): string {
    const aoa: (string | number)[][] = [
        [...columns],
        ...rows.map((row) => columns.map((col) => toCsvValue(row[col]))),
    ];
    const sheet = XLSX.utils.aoa_to_sheet(aoa);
    return XLSX.utils.sheet_to_csv(sheet);
}

function toCell(value: unknown): CellValue {
    if (value === null || value === undefined || value === '') return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    return String(value);
}

function toCsvValue(value: CellValue): string | number {
    if (value === null || value === undefined) return '';
    if (typeof value === 'boolean') return value ? 'True' : 'False';
    return value;
}
