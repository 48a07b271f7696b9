import type { Workbook } from 'exceljs';
import Decimal from 'decimal.js';
import { CATEGORIES, categoryGlyph, sumAmounts, type Category, type ExpenseRecord } from '@spendwise/core';
import { createWorkbook, formatHeaderRow, formatFooterRow, autoFitColumns, formatCurrencyCell } from './utils.js';

/**
 * Expense export: one row per record plus a per-category summary.
 * A record with several categories counts toward each of them, so the
 * category totals may add up to more than the grand total.
 */
export async function generateExpensesExcel(records: readonly ExpenseRecord[]): Promise<Workbook> {
    const workbook = createWorkbook();

    addExpensesSheet(workbook, records);
    addCategorySheet(workbook, records);

    return workbook;
}

/**
 * Sheet: Expenses
 * Columns: id, date, description, amount, categories, recorded_at
 */
function addExpensesSheet(workbook: Workbook, records: readonly ExpenseRecord[]): void {
    const sheet = workbook.addWorksheet('Expenses');
    sheet.columns = [
        { header: 'id', key: 'id' },
        { header: 'date', key: 'date' },
        { header: 'description', key: 'description' },
        { header: 'amount', key: 'amount' },
        { header: 'categories', key: 'categories' },
        { header: 'recorded_at', key: 'recorded_at' },
    ];

    for (const record of records) {
        sheet.addRow({
            id: record.id,
            date: record.date,
            description: record.description,
            amount: new Decimal(record.amount).toNumber(),
            categories: record.categories.join(', '),
            recorded_at: record.recorded_at,
        });
    }

    const footerRow = sheet.addRow({
        description: 'TOTAL',
        amount: sumAmounts(records).toNumber(),
    });
    formatFooterRow(footerRow);

    formatHeaderRow(sheet);
    formatCurrencyCell(sheet, 'amount');
    autoFitColumns(sheet);

    sheet.views = [
        { state: 'frozen', xSplit: 2, ySplit: 1 }
    ];
}

/**
 * Sheet: By Category
 * Columns: category, glyph, total_amount, expense_count
 * Rows follow the category set order; unused categories are omitted.
 */
function addCategorySheet(workbook: Workbook, records: readonly ExpenseRecord[]): void {
    const sheet = workbook.addWorksheet('By Category');
    sheet.columns = [
        { header: 'category', key: 'category' },
        { header: 'glyph', key: 'glyph' },
        { header: 'total_amount', key: 'total_amount' },
        { header: 'expense_count', key: 'expense_count' },
    ];

    const categoryStats = new Map<Category, { count: number; total: Decimal }>();

    for (const record of records) {
        for (const category of record.categories) {
            const stats = categoryStats.get(category) || { count: 0, total: new Decimal(0) };
            stats.count++;
            stats.total = stats.total.plus(new Decimal(record.amount));
            categoryStats.set(category, stats);
        }
    }

    for (const category of CATEGORIES) {
        const stats = categoryStats.get(category);
        if (!stats) continue;
        sheet.addRow({
            category,
            glyph: categoryGlyph(category),
            total_amount: stats.total.toNumber(),
            expense_count: stats.count,
        });
    }

    formatHeaderRow(sheet);
    formatCurrencyCell(sheet, 'total_amount');
    autoFitColumns(sheet);
}
