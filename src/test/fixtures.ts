import type { CleanRecord, RawRecord, SalesTable } from '../types/sales';
import { buildSalesTable } from '../lib/dataExtraction';
import { parseDateValue } from '../lib/utils';

/** Header row first, as a CSV would have it. */
export const table = (...matrix: (string | number | null)[][]): SalesTable => buildSalesTable(matrix);

export const scenarioA = (): SalesTable => table(
    ['amount', 'date', 'category'],
    ['100', '2024-01-05', 'Shirt'],
    ['bad', '2024-01-06', 'Shirt'],
    ['50', '2024-02-01', 'Pants'],
);

export const withFulfilmentAndState = (): SalesTable => table(
    ['amount', 'date', 'fulfilment', 'ship-state'],
    ['100', '2024-01-05', 'Amazon', 'KA'],
    ['300', '2024-01-06', 'Merchant', 'MH'],
    ['50', '2024-02-01', 'Amazon', 'KA'],
    ['50', '2024-02-02', 'Amazon', 'DL'],
);

export function record(amount: number, isoDate: string, fields: RawRecord = {}): CleanRecord {
    const date = parseDateValue(isoDate);
    if (date === null) throw new Error(`bad fixture date ${isoDate}`);
    return { source: { Amount: amount, Date: isoDate, ...fields }, amount, date };
}
