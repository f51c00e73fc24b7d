import { describe, expect, it } from 'vitest';
import { resolveConfig, resolveCurrency } from './config';
import { ConfigError } from './errors';

describe('resolveConfig', () => {
    it('fills in defaults', () => {
        expect(resolveConfig()).toEqual({
            title: 'Sales Performance Analysis Report',
            preparedBy: 'Sales Analytics',
            subtitle: 'Sales Data Analysis Project',
            currency: 'INR',
            currencySymbol: '₹',
            topN: 10,
            outputPath: 'Sales_Performance_Report.xlsx',
            jsonPath: undefined,
        });
    });

    it('applies overrides', () => {
        const config = resolveConfig({ title: ' Q1 Review ', preparedBy: 'Test Analyst', currency: 'usd', topN: '5', outputPath: 'out/q1.xlsx', jsonPath: 'q1.json' });

        expect(config).toMatchObject({ title: 'Q1 Review', preparedBy: 'Test Analyst', currency: 'USD', currencySymbol: '$', topN: 5, outputPath: 'out/q1.xlsx', jsonPath: 'q1.json' });
    });

    it('falls back on blank values', () => {
        expect(resolveConfig({ title: '  ', jsonPath: ' ' })).toMatchObject({ title: 'Sales Performance Analysis Report', jsonPath: undefined });
    });

    it.each(['0', '-2', 'abc', '2.5'])('rejects --top %s', topN => {
        expect(() => resolveConfig({ topN })).toThrow(ConfigError);
    });

    it('requires an .xlsx report path', () => {
        expect(() => resolveConfig({ outputPath: 'report.pdf' })).toThrow(ConfigError);
    });
});

describe('resolveCurrency', () => {
    it('maps codes and accepts explicit symbols', () => {
        expect(resolveCurrency('gbp')).toEqual({ currency: 'GBP', currencySymbol: '£' });
        expect(resolveCurrency('R$')).toEqual({ currency: 'R$', currencySymbol: 'R$' });
    });

    it('rejects unknown codes', () => {
        expect(() => resolveCurrency('XYZ')).toThrow(ConfigError);
        expect(() => resolveCurrency('')).toThrow(ConfigError);
    });
});
