import { CURRENCY_SYMBOLS, REPORT_DEFAULTS } from './constants';
import { ConfigError } from './errors';

export interface ReportConfig {
    title: string;
    preparedBy: string;
    subtitle: string;
    currency: string;
    currencySymbol: string;
    topN: number;
    outputPath: string;
    jsonPath?: string;
}

/** Raw option values, as they arrive from the command line. */
export interface ConfigOverrides {
    title?: string;
    preparedBy?: string;
    subtitle?: string;
    currency?: string;
    topN?: string | number;
    outputPath?: string;
    jsonPath?: string;
}

/**
 * A known ISO code maps to its symbol. Any other short non-code string is
 * taken as the symbol itself.
 */
export const resolveCurrency = (raw: string): { currency: string; currencySymbol: string } => {
    const value = raw.trim();
    const code = value.toUpperCase();
    const known = CURRENCY_SYMBOLS[code];
    if (known !== undefined) return { currency: code, currencySymbol: known };

    if (value === '' || /^[A-Za-z]{3}$/.test(value) || value.length > 4) {
        throw new ConfigError(
            `Unknown currency "${raw}"; use one of ${Object.keys(CURRENCY_SYMBOLS).join(', ')} or a symbol.`
        );
    }
    return { currency: value, currencySymbol: value };
};

const parseTopN = (raw: string | number): number => {
    const n = typeof raw === 'number' ? raw : /^\s*\d+\s*$/.test(raw) ? parseInt(raw, 10) : NaN;
    if (!Number.isInteger(n) || n < 1) {
        throw new ConfigError(`--top must be a positive integer, got "${raw}".`);
    }
    return n;
};

const nonEmpty = (value: string | undefined, fallback: string): string => {
    const v = value?.trim();
    return v ? v : fallback;
};

export function resolveConfig(overrides: ConfigOverrides = {}): ReportConfig {
    const outputPath = nonEmpty(overrides.outputPath, REPORT_DEFAULTS.outputPath);
    if (!outputPath.toLowerCase().endsWith('.xlsx')) {
        throw new ConfigError(`Report path must end in .xlsx, got "${outputPath}".`);
    }

    return {
        title: nonEmpty(overrides.title, REPORT_DEFAULTS.title),
        preparedBy: nonEmpty(overrides.preparedBy, REPORT_DEFAULTS.preparedBy),
        subtitle: nonEmpty(overrides.subtitle, REPORT_DEFAULTS.subtitle),
        ...resolveCurrency(overrides.currency ?? REPORT_DEFAULTS.currency),
        topN: overrides.topN === undefined ? REPORT_DEFAULTS.topN : parseTopN(overrides.topN),
        outputPath,
        jsonPath: overrides.jsonPath?.trim() || undefined,
    };
}
