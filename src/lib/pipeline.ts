import type { SalesAnalysis, SalesTable, SeriesByDimension } from '../types/sales';
import { resolveColumnRoles } from '../utils/columnDetection';
import { aggregateAll, type AggregationOptions } from './aggregation';
import { cleanSalesRecords } from './cleaning';
import { normalizeSalesTable } from './dataExtraction';
import { calculateMetrics } from './metrics';

const freezeSeries = (series: SeriesByDimension): SeriesByDimension => {
    for (const s of Object.values(series)) {
        if (!s) continue;
        s.points.forEach(p => Object.freeze(p));
        Object.freeze(s.points);
        Object.freeze(s);
    }
    return Object.freeze(series);
};

/**
 * Runs resolve → clean → metrics → aggregate over one table, after
 * renaming its columns to their normalized names. Nothing is
 * mutated after it is returned; running twice on the same table gives
 * equal results.
 *
 * @throws MissingColumnError if amount or date cannot be resolved
 * @throws EmptyDatasetError if no row survives cleaning
 */
export function analyzeSales(table: SalesTable, options: AggregationOptions = {}): SalesAnalysis {
    const { columns, rows } = normalizeSalesTable(table);
    const roles = resolveColumnRoles(columns);
    const { records, audit } = cleanSalesRecords(rows, roles);
    const metrics = calculateMetrics(records);
    const { series, skipped } = aggregateAll(records, roles, options);

    return Object.freeze({
        roles,
        audit: Object.freeze({ ...audit, dropped: Object.freeze(audit.dropped) }),
        metrics: Object.freeze({ ...metrics, dateRange: Object.freeze(metrics.dateRange) }),
        series: freezeSeries(series),
        skippedDimensions: Object.freeze(skipped),
    });
}
