import type { AggregatedSeries, Dimension, SalesAnalysis } from '../types/sales';
import { formatCurrency, formatDateValue, formatNumber, formatPercent, joinList } from './utils';

export interface Narrative {
    deliverables: string[];
    expectedOutcome: string;
    executiveSummary: string;
    keyInsights: string[];
    recommendations: string[];
    conclusion: string[];
}

const DELIVERABLES = [
    'Comprehensive analysis report summarizing key findings, insights, and recommendations.',
    'Visualizations illustrating revenue over time and across the available breakdowns.',
    'Insights on product preferences, fulfillment, and geographical sales distribution.',
    'Recommendations for improving sales strategies, inventory management, and customer service.',
];

const EXPECTED_OUTCOME =
    'By analysing the sales export in depth, the goal is to surface insights that can be used to '
    + 'optimize business operations, enhance customer experience, and drive revenue growth.';

const FOCUS_AREAS: Record<Exclude<Dimension, 'time'>, string> = {
    category: 'product categories',
    fulfillment: 'fulfillment efficiency',
    region: 'geographical performance',
};

const share = (part: number, whole: number) => formatPercent(whole > 0 ? part / whole : 0);

const sumTotals = (s: AggregatedSeries) => s.points.reduce((acc, p) => acc + p.total, 0);

function seriesInsights(analysis: SalesAnalysis, sym: string): string[] {
    const { series, metrics } = analysis;
    const insights: string[] = [];

    const time = series.time;
    if (time && time.points.length > 0) {
        const peak = time.points.reduce((best, p) => (p.total > best.total ? p : best));
        insights.push(
            `Revenue peaked in ${peak.key} at ${formatCurrency(peak.total, sym)} across ${time.points.length} month(s) of activity.`
        );
    }

    const top = series.category?.points[0];
    if (top) {
        insights.push(
            `"${top.key}" is the leading category with ${share(top.total, metrics.totalRevenue)} of total revenue.`
        );
    }

    const fulfillment = series.fulfillment;
    const method = fulfillment?.points[0];
    if (fulfillment && method) {
        insights.push(
            `"${method.key}" handles ${share(method.total, sumTotals(fulfillment))} of fulfilled revenue.`
        );
    }

    const region = series.region;
    if (region && region.points.length > 0) {
        const top3 = region.points.slice(0, 3);
        insights.push(
            `The top ${top3.length} state(s) (${joinList(top3.map(p => p.key))}) account for `
            + `${share(sumTotals({ ...region, points: top3 }), metrics.totalRevenue)} of revenue.`
        );
    }

    return insights;
}

/**
 * Report commentary. Sentences about a breakdown only appear when that
 * breakdown was produced.
 */
export function buildNarrative(analysis: SalesAnalysis, currencySymbol: string): Narrative {
    const { metrics, series } = analysis;
    const from = formatDateValue(metrics.dateRange.start, 'short');
    const to = formatDateValue(metrics.dateRange.end, 'short');

    const areas = (['category', 'fulfillment', 'region'] as const)
        .filter(d => series[d] !== undefined)
        .map(d => FOCUS_AREAS[d]);

    const executiveSummary =
        `This report analyzes sales data from ${from} to ${to}. `
        + `It explores trends in ${joinList(['revenue', ...areas])}. `
        + 'Insights derived from this analysis aim to help optimize sales strategies, improve customer experience, '
        + 'and drive sustained revenue growth.';

    const keyInsights = [
        `${formatNumber(metrics.orderCount)} valid orders generated ${formatCurrency(metrics.totalRevenue, currencySymbol)}, `
        + `an average of ${formatCurrency(metrics.averageOrderValue, currencySymbol, 2)} per order.`,
        ...seriesInsights(analysis, currencySymbol),
    ];

    const recommendations: string[] = [];
    if (series.category || series.region) {
        recommendations.push('Focus marketing budgets on top regions and categories.');
    }
    if (series.category) {
        recommendations.push('Expand inventory for high-performing products.');
    }
    if (series.region) {
        recommendations.push('Streamline logistics in low-performing states to reduce costs.');
    }
    recommendations.push('Use predictive analytics to anticipate demand during seasonal peaks.');

    const conclusion = [
        'This analysis revealed the key patterns in the sales data across revenue trends'
        + (areas.length > 0 ? ` and ${joinList(areas)}.` : '.'),
        'Acting on the recommendations above supports data-driven decisions aimed at improving efficiency and profitability.',
    ];

    return {
        deliverables: [...DELIVERABLES],
        expectedOutcome: EXPECTED_OUTCOME,
        executiveSummary,
        keyInsights,
        recommendations,
        conclusion,
    };
}
