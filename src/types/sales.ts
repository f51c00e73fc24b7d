export type CellValue = string | number | boolean | Date | null;

/** One source row, keyed by normalized column name. */
export type RawRecord = Readonly<Record<string, CellValue>>;

export interface SalesTable {
    columns: string[];   // headers, in source order
    rows: RawRecord[];
}

export type ColumnRole = 'amount' | 'date' | 'category' | 'fulfillment' | 'region';

export type ColumnRoles = Readonly<Partial<Record<ColumnRole, string>>>;

export type Dimension = 'time' | 'category' | 'fulfillment' | 'region';

export interface CleanRecord {
    source: RawRecord;
    amount: number;
    date: Date;          // UTC midnight of the calendar day
}

export type DropReason =
    | 'missingAmount'
    | 'invalidAmount'
    | 'missingDate'
    | 'invalidDate'
    | 'nonPositiveAmount';

export interface CleaningAudit {
    inputRows: number;
    keptRows: number;
    dropped: Record<DropReason, number>;
}

export interface CleaningResult {
    records: CleanRecord[];
    audit: CleaningAudit;
}

export interface DateRange {
    start: Date;
    end: Date;
}

export interface Metrics {
    orderCount: number;
    totalRevenue: number;
    averageOrderValue: number;
    dateRange: DateRange;
}

export interface SeriesPoint {
    key: string;
    total: number;
}

export interface AggregatedSeries {
    dimension: Dimension;
    column: string;
    points: SeriesPoint[];
}

export type SeriesByDimension = Partial<Record<Dimension, AggregatedSeries>>;

export interface SalesAnalysis {
    roles: ColumnRoles;
    audit: CleaningAudit;
    metrics: Metrics;
    series: SeriesByDimension;
    skippedDimensions: readonly Dimension[];
}
