import exceljs from 'exceljs';
import type { Row, Worksheet, Workbook } from 'exceljs';

/**
 * Creates a new workbook with standard metadata.
 */
export function createWorkbook(now: Date = new Date()): Workbook {
    const workbook = new exceljs.Workbook();
    workbook.creator = 'Spendwise';
    workbook.created = now;
    return workbook;
}

/**
 * Bold white-on-blue header row, frozen at the top.
 */
export function formatHeaderRow(worksheet: Worksheet): void {
    const headerRow = worksheet.getRow(1);

    headerRow.font = {
        bold: true,
        color: { argb: 'FFFFFFFF' },
        size: 11
    };

    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' }
    };

    headerRow.alignment = {
        vertical: 'middle',
        horizontal: 'center'
    };

    worksheet.views = [
        { state: 'frozen', xSplit: 0, ySplit: 1 }
    ];
}

/**
 * Bold, light-gray totals row.
 */
export function formatFooterRow(row: Row): void {
    row.font = { bold: true };
    row.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FFE0E0E0' }
    };
}

/**
 * Attempts to auto-fit column widths based on cell content.
 */
export function autoFitColumns(worksheet: Worksheet): void {
    worksheet.columns.forEach(column => {
        let maxLen = 10;
        column.eachCell?.({ includeEmpty: false }, cell => {
            if (cell.value !== null && cell.value !== undefined) {
                const len = cell.value.toString().length;
                if (len > maxLen) maxLen = len;
            }
        });
        column.width = Math.min(maxLen + 2, 100);
    });
}

/**
 * Two-decimal amount format, right aligned.
 */
export function formatCurrencyCell(worksheet: Worksheet, col: string | number): void {
    const column = worksheet.getColumn(col);
    column.numFmt = '#,##0.00';
    column.alignment = { horizontal: 'right' };
}
