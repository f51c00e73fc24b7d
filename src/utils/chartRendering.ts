/**
 * In-cell charts: each series becomes rows of label / total / share plus a
 * fixed-width bar of block characters, so the report needs no image
 * renderer.
 */

import type { AggregatedSeries, Dimension } from '../types/sales';

export const BAR_WIDTH = 30;

export type ChartKind = 'bar' | 'distribution';

export interface ChartRow {
    label: string;
    total: number;
    share: number;
    bar: string;
}

export interface ChartModel {
    dimension: Dimension;
    kind: ChartKind;
    title: string;
    axisLabel: string;
    caption: string;
    rows: ChartRow[];
}

interface ChartMeta {
    kind: ChartKind;
    title: (topN: number) => string;
    axisLabel: string;
    caption: (topN: number) => string;
}

const CHART_META: Record<Dimension, ChartMeta> = {
    time: {
        kind: 'bar',
        title: () => 'Monthly Revenue Trend',
        axisLabel: 'Month',
        caption: () => 'Monthly revenue shows seasonal performance patterns.',
    },
    category: {
        kind: 'bar',
        title: n => `Top ${n} Product Categories`,
        axisLabel: 'Category',
        caption: () => 'Top-performing product categories contributing to total revenue.',
    },
    fulfillment: {
        kind: 'distribution',
        title: () => 'Fulfillment Method Distribution',
        axisLabel: 'Fulfillment Method',
        caption: () => 'Fulfillment method distribution and its impact on delivery efficiency.',
    },
    region: {
        kind: 'bar',
        title: n => `Top ${n} States by Revenue`,
        axisLabel: 'State',
        caption: n => `Top ${n} states driving majority of sales revenue.`,
    },
};

/** A bar of `width` cells, `█` for the filled part and `░` for the rest. */
export function renderBar(value: number, max: number, width = BAR_WIDTH): string {
    const ratio = max > 0 ? Math.min(Math.max(value / max, 0), 1) : 0;
    const filled = Math.round(ratio * width);
    return '█'.repeat(filled) + '░'.repeat(width - filled);
}

/**
 * Bar charts scale each bar to the largest total and report the share of
 * `grandTotal`. Distribution charts (the pie equivalent) scale and share
 * against the series' own sum.
 */
export function renderSeriesChart(series: AggregatedSeries, grandTotal: number, topN: number): ChartModel {
    const meta = CHART_META[series.dimension];
    const seriesSum = series.points.reduce((acc, p) => acc + p.total, 0);
    const max = series.points.reduce((acc, p) => Math.max(acc, p.total), 0);

    const rows = series.points.map(p => {
        if (meta.kind === 'distribution') {
            const share = seriesSum > 0 ? p.total / seriesSum : 0;
            return { label: p.key, total: p.total, share, bar: renderBar(share, 1) };
        }
        const share = grandTotal > 0 ? p.total / grandTotal : 0;
        return { label: p.key, total: p.total, share, bar: renderBar(p.total, max) };
    });

    return {
        dimension: series.dimension,
        kind: meta.kind,
        title: meta.title(topN),
        axisLabel: meta.axisLabel,
        caption: meta.caption(topN),
        rows,
    };
}
