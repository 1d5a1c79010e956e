import type { Workbook } from 'exceljs';
import type { ClassifiedDataset, Row } from '@keyword-classifier/core';
import { createWorkbook, formatHeaderRow, autoFitColumns, formatPercentColumn } from './utils.js';

/**
 * Generates the classification workbook.
 * Sheets: Results, Summary, By Category.
 */
export async function generateResultsExcel(classified: ClassifiedDataset): Promise<Workbook> {
    const workbook = createWorkbook();

    addResultsSheet(workbook, classified);
    addSummarySheet(workbook, classified);
    addCategorySheet(workbook, classified);

    return workbook;
}

/**
 * Sheet: Results
 * Input columns followed by the derived columns, one row per statement.
 */
function addResultsSheet(workbook: Workbook, classified: ClassifiedDataset): void {
    const sheet = workbook.addWorksheet('Results');
    sheet.columns = classified.columns.map((col) => ({ header: col, key: col }));

    for (const row of classified.rows) {
        sheet.addRow(toSheetRow(row, classified.columns));
    }

    formatHeaderRow(sheet);
    autoFitColumns(sheet);
}

/**
 * Sheet: Summary
 * Dataset-level metrics as key/value pairs.
 */
function addSummarySheet(workbook: Workbook, classified: ClassifiedDataset): void {
    const sheet = workbook.addWorksheet('Summary');
    sheet.columns = [
        { header: 'metric', key: 'metric' },
        { header: 'value', key: 'value' },
    ];

    const { stats, statementField } = classified;
    sheet.addRow({ metric: 'Statement column', value: statementField.field });
    sheet.addRow({ metric: 'Resolution strategy', value: statementField.strategy });
    sheet.addRow({ metric: 'Total rows', value: stats.total_rows });
    sheet.addRow({ metric: 'Rows with any category', value: stats.any_category_rows });
    sheet.addRow({ metric: 'Categories analyzed', value: stats.categories_analyzed });

    formatHeaderRow(sheet);
    autoFitColumns(sheet);
}

/**
 * Sheet: By Category
 * Columns: category, present_count, present_percentage
 */
function addCategorySheet(workbook: Workbook, classified: ClassifiedDataset): void {
    const sheet = workbook.addWorksheet('By Category');
    sheet.columns = [
        { header: 'category', key: 'category' },
        { header: 'present_count', key: 'present_count' },
        { header: 'present_percentage', key: 'present_percentage' },
    ];

    for (const stat of classified.stats.categories) {
        sheet.addRow({ ...stat });
    }

    formatHeaderRow(sheet);
    formatPercentColumn(sheet, 'present_percentage');
    autoFitColumns(sheet);
}

function toSheetRow(row: Row, columns: readonly string[]): Record<string, string | number | boolean | null> {
    const out: Record<string, string | number | boolean | null> = {};
    for (const col of columns) {
        out[col] = row[col] ?? null;
    }
    return out;
}
