import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import iconv from 'iconv-lite';
import jschardet from 'jschardet';
import * as XLSX from 'xlsx';
import type { CellValue, RawRecord, SalesTable } from '../types/sales';
import { normalizeColumnName } from '../utils/columnDetection';
import { InputFileError } from './errors';
import { isMissingCell } from './utils';

const TEXT_EXTENSIONS = new Set(['.csv', '.tsv', '.txt']);
const WORKBOOK_EXTENSIONS = new Set(['.xls', '.xlsx']);

export const SUPPORTED_EXTENSIONS = [...TEXT_EXTENSIONS, ...WORKBOOK_EXTENSIONS];

/** Single-byte fallback; every byte maps to its own character. */
const FALLBACK_ENCODING = 'windows-1252';

/**
 * Detects the charset of a text export. Plain ASCII is read
 * as UTF-8; an unknown or undetectable charset falls back to windows-1252
 * so distinct bytes stay distinct characters.
 */
export const detectEncoding = (data: Uint8Array): string => {
    const buffer = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    const detected = jschardet.detect(buffer);
    const encoding = detected.encoding ? detected.encoding.toLowerCase() : FALLBACK_ENCODING;
    if (encoding === 'ascii') return 'utf-8';
    return iconv.encodingExists(encoding) ? encoding : FALLBACK_ENCODING;
};

export const decodeText = (data: Uint8Array): string => {
    const buffer = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    return iconv.decode(buffer, detectEncoding(data)).replace(/^\uFEFF/, '');
};

const toCellValue = (val: unknown): CellValue => {
    if (val === undefined || val === null) return null;
    if (typeof val === 'string' || typeof val === 'number' || typeof val === 'boolean' || val instanceof Date) {
        return val;
    }
    return String(val);
};

/**
 * Strips currency symbols and thousands separators, then accepts only a
 * plain decimal literal. Returns null when the cell is not a number.
 */
export const parseAmountValue = (val: unknown): number | null => {
    if (typeof val === 'number') return Number.isFinite(val) ? val : null;
    if (typeof val !== 'string') return null;

    const candidate = val.trim().replace(/[₹$€£,]/g, '').trim();
    if (!/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i.test(candidate)) return null;

    const n = Number(candidate);
    return Number.isFinite(n) ? n : null;
};

const headerName = (cell: unknown, index: number): string => {
    const raw = cell === null || cell === undefined ? '' : String(cell);
    return raw.trim() === '' ? `Column ${index + 1}` : normalizeColumnName(raw);
};

/**
 * Pairs each header position with its normalized name. When two headers
 * normalize to the same name the first one wins.
 */
const headerSlots = <T>(header: readonly T[]) => {
    const slots: { source: T; index: number; name: string }[] = [];
    const seen = new Set<string>();
    header.forEach((cell, index) => {
        const name = headerName(cell, index);
        if (seen.has(name)) return;
        seen.add(name);
        slots.push({ source: cell, index, name });
    });
    return slots;
};

/**
 * Turns a header row plus data rows into records keyed by normalized
 * header. Blank headers get a positional name. All-blank rows are dropped.
 */
export const buildSalesTable = (matrix: readonly (readonly unknown[])[]): SalesTable => {
    const [header, ...body] = matrix;
    if (!header || header.every(isMissingCell)) {
        throw new InputFileError('Input has no header row.');
    }

    const slots = headerSlots(header);
    const rows: RawRecord[] = [];
    for (const cells of body) {
        if (cells.every(isMissingCell)) continue;
        const record: Record<string, CellValue> = {};
        for (const { index, name } of slots) {
            record[name] = toCellValue(cells[index]);
        }
        rows.push(Object.freeze(record));
    }

    return { columns: slots.map(s => s.name), rows };
};

/**
 * Renames a table's columns, and the keys of its rows, to their normalized
 * header names. Tables that came from `buildSalesTable` pass through
 * unchanged.
 */
export const normalizeSalesTable = (table: SalesTable): SalesTable => {
    const slots = headerSlots(table.columns);
    const rows = table.rows.map(row => {
        const record: Record<string, CellValue> = {};
        for (const { source, name } of slots) {
            record[name] = toCellValue(row[source]);
        }
        return Object.freeze(record);
    });
    return { columns: slots.map(s => s.name), rows };
};

const readFirstSheet = (workbook: XLSX.WorkBook, fileName: string): unknown[][] => {
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) {
        throw new InputFileError(`"${fileName}" contains no worksheet.`);
    }
    return XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: false });
};

/** Parses an in-memory CSV/TSV/TXT or XLS/XLSX export. */
export const loadSalesTable = (data: Uint8Array, fileName: string): SalesTable => {
    const ext = extname(fileName).toLowerCase();

    let workbook: XLSX.WorkBook;
    try {
        if (TEXT_EXTENSIONS.has(ext)) {
            workbook = XLSX.read(decodeText(data), { type: 'string', raw: true });
        } else if (WORKBOOK_EXTENSIONS.has(ext)) {
            workbook = XLSX.read(data, { type: 'array' });
        } else {
            throw new InputFileError(
                `Unsupported file type "${ext || basename(fileName)}"; expected one of ${SUPPORTED_EXTENSIONS.join(', ')}.`
            );
        }
    } catch (err) {
        if (err instanceof InputFileError) throw err;
        const reason = err instanceof Error ? err.message : String(err);
        throw new InputFileError(`Could not parse "${fileName}": ${reason}`);
    }

    return buildSalesTable(readFirstSheet(workbook, fileName));
};

export const readSalesTable = async (path: string): Promise<SalesTable> => {
    let data: Buffer;
    try {
        data = await readFile(path);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new InputFileError(`Could not read "${path}": ${reason}`);
    }
    return loadSalesTable(data, path);
};
