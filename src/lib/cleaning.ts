import type { CleaningResult, CleanRecord, ColumnRole, ColumnRoles, DropReason, RawRecord } from '../types/sales';
import { parseAmountValue } from './dataExtraction';
import { MissingColumnError } from './errors';
import { isMissingCell, parseDateValue } from './utils';

const emptyDropCounts = (): Record<DropReason, number> => ({
    missingAmount: 0,
    invalidAmount: 0,
    missingDate: 0,
    invalidDate: 0,
    nonPositiveAmount: 0,
});

/**
 * Keeps the rows that carry a positive numeric amount and a valid calendar
 * date, in their original order. Each rejected row is counted under the
 * first check it fails.
 *
 * @throws MissingColumnError when the amount or date role is unresolved
 */
export function cleanSalesRecords(rows: readonly RawRecord[], roles: ColumnRoles): CleaningResult {
    const amountKey = roles.amount;
    const dateKey = roles.date;
    if (amountKey === undefined || dateKey === undefined) {
        const missing: ColumnRole[] = [];
        if (amountKey === undefined) missing.push('amount');
        if (dateKey === undefined) missing.push('date');
        throw new MissingColumnError(missing);
    }

    const dropped = emptyDropCounts();
    const records: CleanRecord[] = [];

    for (const row of rows) {
        const rawAmount = row[amountKey];
        if (isMissingCell(rawAmount)) { dropped.missingAmount++; continue; }

        const amount = parseAmountValue(rawAmount);
        if (amount === null) { dropped.invalidAmount++; continue; }

        const rawDate = row[dateKey];
        if (isMissingCell(rawDate)) { dropped.missingDate++; continue; }

        const date = parseDateValue(rawDate);
        if (date === null) { dropped.invalidDate++; continue; }

        if (amount <= 0) { dropped.nonPositiveAmount++; continue; }

        records.push(Object.freeze({ source: row, amount, date }));
    }

    return {
        records,
        audit: { inputRows: rows.length, keptRows: records.length, dropped },
    };
}

export const totalDropped = (dropped: Record<DropReason, number>): number =>
    Object.values(dropped).reduce((a, b) => a + b, 0);
