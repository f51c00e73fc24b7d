/**
 * ReportGenerator — sales performance report workbook
 *
 * Tab structure:
 *   Cover            — title block, deliverables, executive summary
 *   Key_Metrics      — orders, revenue, average order value, date range
 *   Visual_Analysis  — one in-cell chart per available breakdown
 *   Insights         — key insights, recommendations, conclusion
 *   Data_Audit       — resolved columns and rows dropped during cleaning
 *
 * Library: ExcelJS
 */

import ExcelJS from 'exceljs';
import type { ReportConfig } from '../lib/config';
import { DIMENSIONS } from '../lib/aggregation';
import { COLUMN_ROLES } from './columnDetection';
import { buildNarrative, type Narrative } from '../lib/narrative';
import { formatDateValue, toCalendarDate } from '../lib/utils';
import type { DropReason, SalesAnalysis } from '../types/sales';
import { renderSeriesChart, type ChartModel } from './chartRendering';

// ---------------------------------------------------------------------------
// Colour constants
// ---------------------------------------------------------------------------

const BRAND_ORANGE = 'FF9900';   // title + bars
const BRAND_DARK   = '232F3E';   // header backgrounds
const INK          = '0F1111';   // section titles
const HEADER_WHITE = 'FFFFFF';
const MID_GRAY     = '6B7280';
const LIGHT_GRAY   = 'F3F4F6';
const BORDER_GRAY  = '9CA3AF';

const DROP_LABELS: [DropReason, string][] = [
    ['missingAmount',     'Missing amount'],
    ['invalidAmount',     'Invalid amount'],
    ['missingDate',       'Missing date'],
    ['invalidDate',       'Invalid date'],
    ['nonPositiveAmount', 'Non-positive amount'],
];

export const SHEET_NAMES = ['Cover', 'Key_Metrics', 'Visual_Analysis', 'Insights', 'Data_Audit'] as const;

export interface ReportOptions {
    /** Date printed on the cover; defaults to today. */
    generatedAt?: Date;
}

const capitalize = (s: string) => s.charAt(0).toUpperCase() + s.slice(1);

// ===========================================================================
// ReportGenerator
// ===========================================================================

export class ReportGenerator {
    private analysis: SalesAnalysis;
    private config:   ReportConfig;
    private sym:      string;
    private generatedAt: Date;

    constructor(analysis: SalesAnalysis, config: ReportConfig, options: ReportOptions = {}) {
        this.analysis    = analysis;
        this.config      = config;
        this.sym         = config.currencySymbol;
        this.generatedAt = options.generatedAt ?? new Date();
    }

    // -----------------------------------------------------------------------
    // Public entry points
    // -----------------------------------------------------------------------

    /** Builds a fresh workbook on every call. */
    public build(): ExcelJS.Workbook {
        const wb = new ExcelJS.Workbook();
        wb.creator        = this.config.preparedBy;
        wb.lastModifiedBy = this.config.preparedBy;
        wb.created        = this.generatedAt;
        wb.modified       = this.generatedAt;

        const narrative = buildNarrative(this.analysis, this.sym);
        this.createCover(wb, narrative);
        this.createKeyMetrics(wb);
        this.createVisualAnalysis(wb);
        this.createInsights(wb, narrative);
        this.createDataAudit(wb);
        return wb;
    }

    public async generate(): Promise<Buffer> {
        const buf = await this.build().xlsx.writeBuffer();
        return Buffer.from(buf);
    }

    // -----------------------------------------------------------------------
    // Styling helpers
    // -----------------------------------------------------------------------

    /** Bold white text on BRAND_DARK — used for column headers */
    private styleHeader(cell: ExcelJS.Cell) {
        cell.fill   = { type: 'pattern', pattern: 'solid', fgColor: { argb: BRAND_DARK } };
        cell.font   = { bold: true, color: { argb: HEADER_WHITE }, name: 'Calibri', size: 11 };
        cell.alignment = { vertical: 'middle', horizontal: 'left' };
        cell.border = {
            top:    { style: 'thin', color: { argb: BORDER_GRAY } },
            left:   { style: 'thin', color: { argb: BORDER_GRAY } },
            bottom: { style: 'medium', color: { argb: BORDER_GRAY } },
            right:  { style: 'thin', color: { argb: BORDER_GRAY } },
        };
    }

    private styleHeaderRow(row: ExcelJS.Row) {
        row.eachCell({ includeEmpty: true }, cell => this.styleHeader(cell));
        row.height = 22;
    }

    /** Section title inside a sheet */
    private styleSection(cell: ExcelJS.Cell, text: string) {
        cell.value = text;
        cell.font  = { bold: true, size: 14, color: { argb: INK }, name: 'Calibri' };
    }

    /** Light body fill with a thin grid, as in the metrics table */
    private styleBodyRow(row: ExcelJS.Row) {
        row.eachCell({ includeEmpty: true }, cell => {
            cell.fill   = { type: 'pattern', pattern: 'solid', fgColor: { argb: LIGHT_GRAY } };
            cell.border = {
                top:    { style: 'thin', color: { argb: BORDER_GRAY } },
                left:   { style: 'thin', color: { argb: BORDER_GRAY } },
                bottom: { style: 'thin', color: { argb: BORDER_GRAY } },
                right:  { style: 'thin', color: { argb: BORDER_GRAY } },
            };
        });
    }

    private writeParagraph(ws: ExcelJS.Worksheet, r: number, text: string) {
        const cell = ws.getCell(`B${r}`);
        cell.value     = text;
        cell.font      = { size: 11, name: 'Calibri' };
        cell.alignment = { wrapText: true, vertical: 'top' };
        ws.getRow(r).height = Math.max(16, Math.ceil(text.length / 90) * 16);
    }

    private get curFmt0() { return `"${this.sym}"#,##0`; }
    private get curFmt2() { return `"${this.sym}"#,##0.00`; }
    private get pctFmt()  { return '0.0%'; }

    // -----------------------------------------------------------------------
    // TAB: Cover
    // -----------------------------------------------------------------------
    private createCover(wb: ExcelJS.Workbook, narrative: Narrative) {
        const ws = wb.addWorksheet('Cover', { views: [{ showGridLines: false }] });

        ws.getColumn(1).width = 24;
        ws.getColumn(2).width = 90;

        // ── Title block ───────────────────────────────────────────────────
        ws.mergeCells('A1:B1');
        const title = ws.getCell('A1');
        title.value     = this.config.title;
        title.font      = { bold: true, size: 20, color: { argb: BRAND_ORANGE }, name: 'Calibri' };
        title.alignment = { vertical: 'middle', horizontal: 'center' };
        title.fill      = { type: 'pattern', pattern: 'solid', fgColor: { argb: LIGHT_GRAY } };
        ws.getRow(1).height = 40;

        const printed = toCalendarDate(this.generatedAt) ?? this.analysis.metrics.dateRange.end;
        const meta = [
            `Prepared by ${this.config.preparedBy}`,
            this.config.subtitle,
            `Date: ${formatDateValue(printed, 'long')}`,
        ];
        meta.forEach((line, i) => {
            const r = i + 2;
            ws.mergeCells(`A${r}:B${r}`);
            ws.getCell(`A${r}`).value = line;
            ws.getCell(`A${r}`).font  = { size: 11, italic: i > 0, color: { argb: MID_GRAY } };
        });

        // ── Deliverables ─────────────────────────────────────────────────
        let r = 6;
        this.styleSection(ws.getCell(`A${r}`), 'DELIVERABLES');
        r++;
        narrative.deliverables.forEach((line, i) => {
            this.writeParagraph(ws, r, `${i + 1}. ${line}`);
            r++;
        });

        r++;
        this.styleSection(ws.getCell(`A${r}`), 'EXPECTED OUTCOME');
        r++;
        this.writeParagraph(ws, r, narrative.expectedOutcome);

        r += 2;
        this.styleSection(ws.getCell(`A${r}`), 'EXECUTIVE SUMMARY');
        r++;
        this.writeParagraph(ws, r, narrative.executiveSummary);
    }

    // -----------------------------------------------------------------------
    // TAB: Key_Metrics
    // -----------------------------------------------------------------------
    private createKeyMetrics(wb: ExcelJS.Workbook) {
        const ws = wb.addWorksheet('Key_Metrics', { views: [{ showGridLines: false }] });
        const { metrics } = this.analysis;

        ws.columns = [
            { header: 'Metric', key: 'metric', width: 30 },
            { header: 'Value',  key: 'value',  width: 34 },
        ];
        this.styleHeaderRow(ws.getRow(1));

        const range = `${formatDateValue(metrics.dateRange.start, 'table')} to ${formatDateValue(metrics.dateRange.end, 'table')}`;
        const rows: { metric: string; value: number | string; numFmt?: string }[] = [
            { metric: 'Total Orders',                        value: metrics.orderCount,        numFmt: '#,##0' },
            { metric: `Total Revenue (${this.sym})`,         value: metrics.totalRevenue,      numFmt: this.curFmt0 },
            { metric: `Average Order Value (${this.sym})`,   value: metrics.averageOrderValue, numFmt: this.curFmt2 },
            { metric: 'Date Range',                          value: range },
        ];

        for (const { metric, value, numFmt } of rows) {
            const row = ws.addRow({ metric, value });
            if (numFmt) row.getCell('value').numFmt = numFmt;
            row.getCell('value').alignment = { horizontal: 'left' };
            this.styleBodyRow(row);
        }
    }

    // -----------------------------------------------------------------------
    // TAB: Visual_Analysis
    // -----------------------------------------------------------------------
    private createVisualAnalysis(wb: ExcelJS.Workbook) {
        const ws = wb.addWorksheet('Visual_Analysis', { views: [{ showGridLines: false }] });

        ws.getColumn(1).width = 28;
        ws.getColumn(2).width = 18;
        ws.getColumn(3).width = 10;
        ws.getColumn(4).width = 34;

        this.styleSection(ws.getCell('A1'), 'Visual Analysis');
        let r = 3;

        for (const dimension of DIMENSIONS) {
            const series = this.analysis.series[dimension];
            if (!series) continue;
            const chart = renderSeriesChart(series, this.analysis.metrics.totalRevenue, this.config.topN);
            r = this.writeChart(ws, r, chart) + 1;
        }
    }

    /** Writes one chart block starting at row r; returns the next free row. */
    private writeChart(ws: ExcelJS.Worksheet, r: number, chart: ChartModel): number {
        const titleCell = ws.getCell(`A${r}`);
        titleCell.value = chart.title;
        titleCell.font  = { bold: true, size: 12, color: { argb: INK } };
        r++;

        const header = ws.getRow(r);
        header.values = [chart.axisLabel, `Revenue (${this.sym})`, 'Share', ''];
        this.styleHeaderRow(header);
        r++;

        if (chart.rows.length === 0) {
            ws.getCell(`A${r}`).value = '(no values)';
            ws.getCell(`A${r}`).font  = { italic: true, color: { argb: MID_GRAY } };
            r++;
        }

        for (const item of chart.rows) {
            const row = ws.getRow(r);
            row.values = [item.label, item.total, item.share, item.bar];
            row.getCell(2).numFmt = this.curFmt0;
            row.getCell(3).numFmt = this.pctFmt;
            row.getCell(4).font   = { color: { argb: BRAND_ORANGE }, name: 'Courier New', size: 9 };
            r++;
        }

        ws.mergeCells(`A${r}:D${r}`);
        const caption = ws.getCell(`A${r}`);
        caption.value = chart.caption;
        caption.font  = { italic: true, size: 10, color: { argb: MID_GRAY } };
        return r + 1;
    }

    // -----------------------------------------------------------------------
    // TAB: Insights
    // -----------------------------------------------------------------------
    private createInsights(wb: ExcelJS.Workbook, narrative: Narrative) {
        const ws = wb.addWorksheet('Insights', { views: [{ showGridLines: false }] });

        ws.getColumn(1).width = 24;
        ws.getColumn(2).width = 90;

        let r = 1;
        this.styleSection(ws.getCell(`A${r}`), 'KEY INSIGHTS');
        r++;
        for (const line of narrative.keyInsights) {
            this.writeParagraph(ws, r, `- ${line}`);
            r++;
        }

        r++;
        this.styleSection(ws.getCell(`A${r}`), 'RECOMMENDATIONS');
        r++;
        narrative.recommendations.forEach((line, i) => {
            this.writeParagraph(ws, r, `${i + 1}. ${line}`);
            r++;
        });

        r++;
        this.styleSection(ws.getCell(`A${r}`), 'CONCLUSION');
        r++;
        for (const line of narrative.conclusion) {
            this.writeParagraph(ws, r, line);
            r++;
        }
    }

    // -----------------------------------------------------------------------
    // TAB: Data_Audit
    // -----------------------------------------------------------------------
    private createDataAudit(wb: ExcelJS.Workbook) {
        const ws = wb.addWorksheet('Data_Audit');
        const { roles, audit } = this.analysis;

        ws.getColumn(1).width = 24;
        ws.getColumn(2).width = 34;

        const roleHeader = ws.addRow(['Role', 'Column']);
        this.styleHeaderRow(roleHeader);
        for (const role of COLUMN_ROLES) {
            const row = ws.addRow([capitalize(role), roles[role] ?? '(not found)']);
            if (roles[role] === undefined) {
                row.getCell(2).font = { italic: true, color: { argb: MID_GRAY } };
            }
        }

        ws.addRow([]);
        const checkHeader = ws.addRow(['Check', 'Rows']);
        this.styleHeaderRow(checkHeader);
        ws.addRow(['Rows read', audit.inputRows]);
        for (const [reason, label] of DROP_LABELS) {
            ws.addRow([label, audit.dropped[reason]]);
        }
        const kept = ws.addRow(['Orders kept', audit.keptRows]);
        kept.font = { bold: true };
    }
}
