import type { CleanRecord, Metrics } from '../types/sales';
import { EmptyDatasetError } from './errors';

/**
 * Order count, revenue, average order value and date span of the cleaned
 * orders. An empty collection has no meaningful average, so it throws
 * rather than reporting NaN or zero.
 */
export function calculateMetrics(records: readonly CleanRecord[]): Metrics {
    const first = records[0];
    if (first === undefined) {
        throw new EmptyDatasetError();
    }

    let totalRevenue = 0;
    let start = first.date;
    let end = first.date;
    for (const r of records) {
        totalRevenue += r.amount;
        if (r.date.getTime() < start.getTime()) start = r.date;
        if (r.date.getTime() > end.getTime()) end = r.date;
    }

    return {
        orderCount: records.length,
        totalRevenue,
        averageOrderValue: totalRevenue / records.length,
        dateRange: { start, end },
    };
}
