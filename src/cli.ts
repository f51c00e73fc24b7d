import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { DIMENSION_ROLE } from './lib/aggregation';
import { totalDropped } from './lib/cleaning';
import { resolveConfig, type ReportConfig } from './lib/config';
import { readSalesTable } from './lib/dataExtraction';
import { ConfigError, SalesReportError } from './lib/errors';
import { analyzeSales } from './lib/pipeline';
import { formatNumber } from './lib/utils';
import type { SalesAnalysis } from './types/sales';
import { ReportGenerator } from './utils/ReportGenerator';

export const USAGE = `Usage: sales-report <input.csv|.xlsx> [options]

Options:
  --out <file.xlsx>    report path (default: Sales_Performance_Report.xlsx)
  --json <file.json>   also write the analysis as JSON
  --title <text>       report title
  --author <name>      "Prepared by" line
  --subtitle <text>    line under the author
  --currency <code>    INR, USD, EUR, ... or a symbol (default: INR)
  --top <n>            groups shown per ranked breakdown (default: 10)
  -h, --help           show this help`;

interface CliArgs {
    input: string;
    config: ReportConfig;
}

function readArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                out:      { type: 'string' },
                json:     { type: 'string' },
                title:    { type: 'string' },
                author:   { type: 'string' },
                subtitle: { type: 'string' },
                currency: { type: 'string' },
                top:      { type: 'string' },
                help:     { type: 'boolean', short: 'h' },
            },
        });
    } catch (err) {
        throw new ConfigError(err instanceof Error ? err.message : String(err));
    }
}

function parseCliArgs(argv: string[]): CliArgs | null {
    const { values, positionals } = readArgs(argv);
    if (values.help) return null;

    const [input, ...extra] = positionals;
    if (input === undefined) throw new ConfigError('Missing input file.');
    if (extra.length > 0) throw new ConfigError(`Unexpected arguments: ${extra.join(' ')}`);

    return {
        input,
        config: resolveConfig({
            outputPath: values.out,
            jsonPath:   values.json,
            title:      values.title,
            preparedBy: values.author,
            subtitle:   values.subtitle,
            currency:   values.currency,
            topN:       values.top,
        }),
    };
}

function logAnalysis(analysis: SalesAnalysis) {
    const { audit, skippedDimensions } = analysis;
    const dropped = totalDropped(audit.dropped);

    console.log(`[Pipeline] Kept ${formatNumber(audit.keptRows)} of ${formatNumber(audit.inputRows)} rows.`);
    if (dropped > 0) {
        const detail = Object.entries(audit.dropped)
            .filter(([, n]) => n > 0)
            .map(([reason, n]) => `${reason}=${n}`)
            .join(', ');
        console.warn(`[Pipeline] Dropped ${formatNumber(dropped)} row(s): ${detail}`);
    }
    for (const dimension of skippedDimensions) {
        console.warn(`[Pipeline] No "${DIMENSION_ROLE[dimension]}" column found; skipping ${dimension} breakdown.`);
    }
}

/** Runs one report; resolves to the process exit code. */
export async function main(argv: string[]): Promise<number> {
    try {
        const args = parseCliArgs(argv);
        if (args === null) {
            console.log(USAGE);
            return 0;
        }
        const { input, config } = args;

        const table = await readSalesTable(input);
        console.log(`[Loader] Read ${formatNumber(table.rows.length)} rows, ${table.columns.length} columns from ${input}`);

        const analysis = analyzeSales(table, { topN: config.topN });
        logAnalysis(analysis);

        const report = await new ReportGenerator(analysis, config).generate();
        await writeFile(config.outputPath, report);
        console.log(`[Report] Wrote ${config.outputPath}`);

        if (config.jsonPath) {
            await writeFile(config.jsonPath, `${JSON.stringify(analysis, null, 2)}\n`, 'utf-8');
            console.log(`[Report] Wrote ${config.jsonPath}`);
        }
        return 0;
    } catch (err) {
        if (err instanceof SalesReportError) {
            console.error(`[CLI] ${err.code}: ${err.message}`);
            if (err instanceof ConfigError) console.error(USAGE);
        } else {
            console.error('[CLI] Unexpected failure:', err);
        }
        return 1;
    }
}
