import { describe, it, expect } from 'vitest';
import { generateExpensesExcel } from '../src/excel/expenses.js';
import type { ExpenseRecord } from '@spendwise/shared';

describe('Excel Generation', () => {
    const records: ExpenseRecord[] = [
        {
            id: 1,
            description: 'Paid 250 for lunch at restaurant',
            amount: '250',
            categories: ['dining', 'food'],
            date: '2026-10-18',
            recorded_at: '2026-10-19T09:30:00.000Z',
        },
        {
            id: 2,
            description: 'Uber to airport',
            amount: '800.50',
            categories: ['transportation', 'travel'],
            date: '2026-10-19',
            recorded_at: '2026-10-19T10:00:00.000Z',
        },
        {
            id: 3,
            description: 'Snacks on the train',
            amount: '120',
            categories: ['food', 'snacks', 'transportation', 'travel'],
            date: '2026-10-19',
            recorded_at: '2026-10-19T11:00:00.000Z',
        },
    ];

    it('should generate the Expenses sheet with a totals row', async () => {
        const workbook = await generateExpensesExcel(records);
        const sheet = workbook.getWorksheet('Expenses');

        expect(sheet).toBeDefined();
        expect(sheet?.getRow(1).values).toEqual([
            undefined, 'id', 'date', 'description', 'amount', 'categories', 'recorded_at',
        ]);
        expect(sheet?.rowCount).toBe(5);

        const second = sheet?.getRow(3);
        expect(second?.getCell('description').value).toBe('Uber to airport');
        expect(second?.getCell('amount').value).toBe(800.5);
        expect(second?.getCell('categories').value).toBe('transportation, travel');

        const footer = sheet?.getRow(5);
        expect(footer?.getCell('description').value).toBe('TOTAL');
        expect(footer?.getCell('amount').value).toBe(1170.5);
    });

    it('should count multi-category records toward each category', async () => {
        const workbook = await generateExpensesExcel(records);
        const sheet = workbook.getWorksheet('By Category');

        const rows: unknown[][] = [];
        sheet?.eachRow((row, rowNumber) => {
            if (rowNumber > 1) {
                rows.push([
                    row.getCell('category').value,
                    row.getCell('total_amount').value,
                    row.getCell('expense_count').value,
                ]);
            }
        });

        // Category-set order: food, dining, snacks, travel, transportation
        expect(rows).toEqual([
            ['food', 370, 2],
            ['dining', 250, 1],
            ['snacks', 120, 1],
            ['travel', 920.5, 2],
            ['transportation', 920.5, 2],
        ]);
    });

    it('should produce header-only sheets for no records', async () => {
        const workbook = await generateExpensesExcel([]);

        expect(workbook.getWorksheet('By Category')?.rowCount).toBe(1);
        expect(workbook.getWorksheet('Expenses')?.getRow(2).getCell('amount').value).toBe(0);
    });
});
