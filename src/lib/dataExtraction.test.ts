import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import { afterEach, describe, expect, it } from 'vitest';
import {
    buildSalesTable,
    decodeText,
    detectEncoding,
    loadSalesTable,
    normalizeSalesTable,
    parseAmountValue,
    readSalesTable,
} from './dataExtraction';
import { InputFileError } from './errors';
import { analyzeSales } from './pipeline';
import { isMissingCell } from './utils';

describe('parseAmountValue', () => {
    it('accepts plain and formatted numbers', () => {
        expect(parseAmountValue('100')).toBe(100);
        expect(parseAmountValue(' -3 ')).toBe(-3);
        expect(parseAmountValue('₹1,250.50')).toBe(1250.5);
        expect(parseAmountValue('$ 40')).toBe(40);
        expect(parseAmountValue('1e3')).toBe(1000);
        expect(parseAmountValue('.5')).toBe(0.5);
        expect(parseAmountValue(42)).toBe(42);
    });

    it('rejects everything else', () => {
        expect(parseAmountValue('bad')).toBeNull();
        expect(parseAmountValue('0x10')).toBeNull();
        expect(parseAmountValue('Infinity')).toBeNull();
        expect(parseAmountValue('12abc')).toBeNull();
        expect(parseAmountValue(NaN)).toBeNull();
        expect(parseAmountValue(true)).toBeNull();
        expect(parseAmountValue(null)).toBeNull();
    });
});

describe('decodeText', () => {
    it('reads plain ASCII as UTF-8', () => {
        expect(detectEncoding(Buffer.from('amount,date\n10,2024-01-05\n', 'utf-8'))).toBe('utf-8');
    });

    it('decodes UTF-8 text', () => {
        const text = 'category\nCafé\nCrème brûlée\nThé glacé\nPâté\n';
        expect(decodeText(Buffer.from(text, 'utf-8'))).toBe(text);
    });

    it('drops a leading byte order mark', () => {
        expect(decodeText(new Uint8Array([0xef, 0xbb, 0xbf, 0x61]))).toBe('a');
    });
});

describe('normalizeSalesTable', () => {
    it('renames columns and row keys to normalized headers', () => {
        const t = normalizeSalesTable({
            columns: [' amount ', 'ship-state', 'AMOUNT', ''],
            rows: [{ ' amount ': '10', 'ship-state': 'KA', 'AMOUNT': '99', '': 'x' }, { 'ship-state': 'MH' }],
        });

        expect(t.columns).toEqual(['Amount', 'Ship-State', 'Column 4']);
        expect(t.rows).toEqual([
            { 'Amount': '10', 'Ship-State': 'KA', 'Column 4': 'x' },
            { 'Amount': null, 'Ship-State': 'MH', 'Column 4': null },
        ]);
    });

    it('leaves a loaded table as it is', () => {
        const t = buildSalesTable([['Amount', 'Order Date'], ['10', '2024-01-01']]);
        expect(normalizeSalesTable(t)).toEqual(t);
    });
});

describe('buildSalesTable', () => {
    it('normalizes headers and keys rows by them', () => {
        const t = buildSalesTable([
            [' amount ', 'Order Date', '', 'AMOUNT'],
            ['10', '2024-01-01', 'x', '99'],
            [null, '', ' '],
            ['5'],
        ]);

        expect(t.columns).toEqual(['Amount', 'Order Date', 'Column 3']);
        expect(t.rows).toEqual([
            { 'Amount': '10', 'Order Date': '2024-01-01', 'Column 3': 'x' },
            { 'Amount': '5', 'Order Date': null, 'Column 3': null },
        ]);
    });

    it('fails without a header row', () => {
        expect(() => buildSalesTable([])).toThrow(InputFileError);
        expect(() => buildSalesTable([[null, '']])).toThrow('Input has no header row.');
    });
});

describe('loadSalesTable', () => {
    it('parses CSV text into a table the pipeline can analyse', () => {
        const csv = 'amount,date,category\n100,2024-01-05,Shirt\n,2024-01-06,\n50,2024-02-01,Pants\n';
        const t = loadSalesTable(Buffer.from(csv, 'utf-8'), 'orders.csv');

        expect(t.columns).toEqual(['Amount', 'Date', 'Category']);
        expect(t.rows).toHaveLength(3);
        expect(t.rows[0]?.Category).toBe('Shirt');
        expect(isMissingCell(t.rows[1]?.Amount)).toBe(true);

        const analysis = analyzeSales(t);
        expect(analysis.metrics.orderCount).toBe(2);
        expect(analysis.metrics.totalRevenue).toBe(150);
        expect(analysis.audit.dropped.missingAmount).toBe(1);
    });

    it('keeps single-byte labels that differ by one accented letter apart', () => {
        const bytes = Buffer.concat([
            Buffer.from('amount,date,category\n10,2024-01-05,Caf', 'latin1'),
            Buffer.from([0xe9]),
            Buffer.from('\n20,2024-01-06,Caf', 'latin1'),
            Buffer.from([0xe8]),
            Buffer.from('\n', 'latin1'),
        ]);
        const t = loadSalesTable(bytes, 'latin1.csv');

        expect(t.rows).toHaveLength(2);
        const points = analyzeSales(t).series.category?.points ?? [];
        expect(points.map(p => p.total)).toEqual([20, 10]);
        expect(new Set(points.map(p => p.key)).size).toBe(2);
        expect(points.every(p => p.key.startsWith('Caf') && p.key.length === 4)).toBe(true);
    });

    it('reads the first sheet of a workbook', () => {
        const wb = XLSX.utils.book_new();
        XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet([
            ['Amount', 'Date', 'ship-state'],
            [100, '2024-01-05', 'KA'],
        ]), 'Orders');
        const data = new Uint8Array(XLSX.write(wb, { type: 'array', bookType: 'xlsx' }));

        const t = loadSalesTable(data, 'orders.xlsx');

        expect(t.columns).toEqual(['Amount', 'Date', 'Ship-State']);
        expect(t.rows).toEqual([{ 'Amount': 100, 'Date': '2024-01-05', 'Ship-State': 'KA' }]);
    });

    it('rejects unsupported file types', () => {
        expect(() => loadSalesTable(new Uint8Array(), 'report.pdf')).toThrow(InputFileError);
    });
});

describe('readSalesTable', () => {
    let dir: string | undefined;

    afterEach(async () => {
        if (dir) await rm(dir, { recursive: true, force: true });
        dir = undefined;
    });

    it('reads a file from disk', async () => {
        dir = await mkdtemp(join(tmpdir(), 'sales-report-'));
        const path = join(dir, 'orders.csv');
        await writeFile(path, 'Amount,Date\n10,2024-01-05\n', 'utf-8');

        const t = await readSalesTable(path);

        expect(t.columns).toEqual(['Amount', 'Date']);
        expect(t.rows).toHaveLength(1);
    });

    it('reports a missing file as an input error', async () => {
        await expect(readSalesTable(join(tmpdir(), 'does-not-exist-sales.csv'))).rejects.toBeInstanceOf(InputFileError);
    });
});
