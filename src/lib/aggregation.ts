import type {
    AggregatedSeries,
    CellValue,
    CleanRecord,
    ColumnRole,
    ColumnRoles,
    Dimension,
    SeriesByDimension,
    SeriesPoint,
} from '../types/sales';
import { DEFAULT_TOP_N } from './constants';
import { DimensionUnavailableError } from './errors';
import { formatDateValue, isMissingCell, monthStart } from './utils';

export const DIMENSIONS: readonly Dimension[] = ['time', 'category', 'fulfillment', 'region'];

export const DIMENSION_ROLE: Readonly<Record<Dimension, ColumnRole>> = {
    time: 'date',
    category: 'category',
    fulfillment: 'fulfillment',
    region: 'region',
};

export interface AggregationOptions {
    /** Groups kept for ranked dimensions; the time series is never truncated. */
    topN?: number;
}

interface GroupKey {
    id: string;
    label: string;
}

/**
 * Groups on the cell's type as well as its text, so a numeric 7 and the
 * string "7" from a mixed Excel column stay separate groups.
 */
const groupKey = (val: CellValue): GroupKey | null => {
    if (isMissingCell(val)) return null;
    const label = val instanceof Date ? val.toISOString() : String(val);
    const kind = val instanceof Date ? 'date' : typeof val;
    return { id: `${kind}:${label}`, label };
};

/**
 * Sums amounts per group. Map iteration order is insertion order, so the
 * result lists groups in the order they were first seen.
 */
function sumBy(records: readonly CleanRecord[], keyOf: (r: CleanRecord) => GroupKey | null): SeriesPoint[] {
    const totals = new Map<string, SeriesPoint>();
    for (const r of records) {
        const key = keyOf(r);
        if (key === null) continue;
        const point = totals.get(key.id);
        if (point) {
            point.total += r.amount;
        } else {
            totals.set(key.id, { key: key.label, total: r.amount });
        }
    }
    return [...totals.values()];
}

/** Revenue per calendar month (`YYYY-MM`), oldest first. */
export function aggregateMonthly(records: readonly CleanRecord[]): SeriesPoint[] {
    const starts = new Map<string, number>();
    const points = sumBy(records, r => {
        const start = monthStart(r.date);
        const key = formatDateValue(start, 'month');
        starts.set(key, start.getTime());
        return { id: key, label: key };
    });
    return points.sort((a, b) => (starts.get(a.key) ?? 0) - (starts.get(b.key) ?? 0));
}

/**
 * Revenue per exact column value, highest first. Equal totals keep their
 * first-seen order (Array#sort is stable). Rows with a blank value are
 * left out of the groups.
 */
export function aggregateRanked(records: readonly CleanRecord[], column: string, topN = DEFAULT_TOP_N): SeriesPoint[] {
    return sumBy(records, r => groupKey(r.source[column] ?? null))
        .sort((a, b) => b.total - a.total)
        .slice(0, topN);
}

/**
 * @throws DimensionUnavailableError when the dimension's column was not resolved
 */
export function aggregateByDimension(
    records: readonly CleanRecord[],
    roles: ColumnRoles,
    dimension: Dimension,
    options: AggregationOptions = {},
): AggregatedSeries {
    const column = roles[DIMENSION_ROLE[dimension]];
    if (column === undefined) {
        throw new DimensionUnavailableError(dimension);
    }

    const points = dimension === 'time'
        ? aggregateMonthly(records)
        : aggregateRanked(records, column, options.topN);

    return { dimension, column, points };
}

export interface AggregateAllResult {
    series: SeriesByDimension;
    skipped: Dimension[];
}

/** Every dimension with a resolved column; the rest are listed as skipped. */
export function aggregateAll(
    records: readonly CleanRecord[],
    roles: ColumnRoles,
    options: AggregationOptions = {},
): AggregateAllResult {
    const series: SeriesByDimension = {};
    const skipped: Dimension[] = [];

    for (const dimension of DIMENSIONS) {
        if (roles[DIMENSION_ROLE[dimension]] === undefined) {
            skipped.push(dimension);
            continue;
        }
        series[dimension] = aggregateByDimension(records, roles, dimension, options);
    }

    return { series, skipped };
}
