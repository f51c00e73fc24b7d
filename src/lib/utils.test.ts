import { describe, expect, it } from 'vitest';
import {
    calendarDate,
    formatCurrency,
    formatDateValue,
    formatPercent,
    isMissingCell,
    joinList,
    monthStart,
    parseDateValue,
} from './utils';

const iso = (d: Date | null) => d?.toISOString().slice(0, 10) ?? null;

describe('isMissingCell', () => {
    it.each([null, undefined, NaN, '', '   ', 'NA', 'n/a', 'NULL', 'None', 'nan'])('treats %j as missing', val => {
        expect(isMissingCell(val)).toBe(true);
    });

    it.each([0, 'x', '0', false, new Date(0)])('keeps %j', val => {
        expect(isMissingCell(val)).toBe(false);
    });
});

describe('calendarDate', () => {
    it('rejects days that do not exist', () => {
        expect(calendarDate(2024, 2, 30)).toBeNull();
        expect(calendarDate(2023, 2, 29)).toBeNull();
        expect(calendarDate(2024, 13, 1)).toBeNull();
        expect(iso(calendarDate(2024, 2, 29))).toBe('2024-02-29');
    });
});

describe('parseDateValue', () => {
    it('reads ISO dates at UTC midnight and drops the time', () => {
        expect(parseDateValue('2024-01-05')?.toISOString()).toBe('2024-01-05T00:00:00.000Z');
        expect(iso(parseDateValue('2024-01-05 13:45:00'))).toBe('2024-01-05');
        expect(iso(parseDateValue('2024/3/7'))).toBe('2024-03-07');
    });

    it('reads slashed dates month-first unless the first part cannot be a month', () => {
        expect(iso(parseDateValue('04-30-22'))).toBe('2022-04-30');
        expect(iso(parseDateValue('01/02/2024'))).toBe('2024-01-02');
        expect(iso(parseDateValue('13/01/2024'))).toBe('2024-01-13');
        expect(iso(parseDateValue('12.31.99'))).toBe('1999-12-31');
    });

    it('reads Excel serial numbers', () => {
        expect(iso(parseDateValue(45000))).toBe('2023-03-15');
        expect(parseDateValue(12)).toBeNull();
    });

    it('reads month names', () => {
        expect(iso(parseDateValue('Jan 5, 2024'))).toBe('2024-01-05');
    });

    it('returns null for anything else', () => {
        expect(parseDateValue('bad')).toBeNull();
        expect(parseDateValue('2024-02-30')).toBeNull();
        expect(parseDateValue('')).toBeNull();
        expect(parseDateValue(true)).toBeNull();
        expect(parseDateValue('20240105')).toBeNull();
    });
});

describe('formatDateValue', () => {
    const d = new Date('2024-01-05T00:00:00.000Z');

    it('renders each style', () => {
        expect(formatDateValue(d)).toBe('05 Jan 2024');
        expect(formatDateValue(d, 'table')).toBe('05-Jan-2024');
        expect(formatDateValue(d, 'long')).toBe('January 05, 2024');
        expect(formatDateValue(d, 'month')).toBe('2024-01');
    });
});

describe('monthStart', () => {
    it('truncates to the first of the month', () => {
        expect(monthStart(new Date('2024-02-29T00:00:00.000Z')).toISOString()).toBe('2024-02-01T00:00:00.000Z');
    });
});

describe('number formatting', () => {
    it('formats currency, percentages and lists', () => {
        expect(formatCurrency(1234.5, '₹', 2)).toBe('₹1,234.50');
        expect(formatCurrency(150, '$')).toBe('$150');
        expect(formatPercent(2 / 3)).toBe('66.7%');
        expect(joinList([])).toBe('');
        expect(joinList(['a'])).toBe('a');
        expect(joinList(['a', 'b', 'c'])).toBe('a, b and c');
    });
});
