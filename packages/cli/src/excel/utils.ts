import exceljs from 'exceljs';
import type { Worksheet, Workbook } from 'exceljs';

const HEADER_FILL = 'FF4472C4';
const MAX_COLUMN_WIDTH = 100;

export function createWorkbook(): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Keyword Classifier';
    workbook.created = new Date();
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen so it stays visible while scrolling.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);
    headerRow.font = { bold: true, color: { argb: 'FFFFFFFF' }, size: 11 };
    headerRow.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL } };
    headerRow.alignment = { vertical: 'middle', horizontal: 'center' };

    worksheet.views = [{ state: 'frozen', xSplit: 0, ySplit: 1 }];
}

/**
 * Sizes each column to its longest cell text, within 10..MAX_COLUMN_WIDTH.
 * Statements run long, so the cap matters on the Results sheet.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach((column) => {
        let longest = 10;
        column.eachCell?.({ includeEmpty: false }, (cell) => {
            const text = cell.value === null || cell.value === undefined ? '' : String(cell.value);
            longest = Math.max(longest, text.length);
        });
        column.width = Math.min(longest + 2, MAX_COLUMN_WIDTH);
    });
}

/**
 * Formats a column of 0-100 percentages with two decimals.
 */
export function formatPercentColumn(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '0.00"%"';
    column.alignment = { horizontal: 'right' };
}
