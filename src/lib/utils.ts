const MISSING_TOKENS = new Set(['na', 'n/a', 'nan', 'null', 'none']);

const SHORT_MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const LONG_MONTHS = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December',
];

const DAY_MS = 86400 * 1000;
const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);

/**
 * True for cells a spreadsheet reader would treat as empty: null/undefined,
 * NaN, blank strings and the usual NA spellings.
 */
export function isMissingCell(val: unknown): boolean {
    if (val === null || val === undefined) return true;
    if (typeof val === 'number') return Number.isNaN(val);
    if (typeof val === 'string') {
        const s = val.trim();
        return s === '' || MISSING_TOKENS.has(s.toLowerCase());
    }
    return false;
}

/** UTC midnight of the given calendar day, or null when the day does not exist. */
export function calendarDate(year: number, month: number, day: number): Date | null {
    if (month < 1 || month > 12 || day < 1 || day > 31) return null;
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

/** Drops the time of day, keeping the local calendar day. */
export function toCalendarDate(d: Date): Date | null {
    if (Number.isNaN(d.getTime())) return null;
    return calendarDate(d.getFullYear(), d.getMonth() + 1, d.getDate());
}

function expandYear(raw: string): number {
    const y = parseInt(raw, 10);
    if (raw.length > 2) return y;
    return y < 70 ? 2000 + y : 1900 + y;
}

export function parseDateValue(val: unknown): Date | null {
    if (isMissingCell(val)) return null;

    if (val instanceof Date) return toCalendarDate(val);

    // Excel serial date (approx 1954-2064)
    if (typeof val === 'number') {
        if (val > 20000 && val < 60000) {
            return new Date(EXCEL_EPOCH_MS + Math.floor(val) * DAY_MS);
        }
        return null;
    }

    if (typeof val !== 'string') return null;
    const s = val.trim();

    // YYYY-MM-DD, YYYY/MM/DD, optionally followed by a time
    const isoLike = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[T\s].*)?$/.exec(s);
    if (isoLike) {
        return calendarDate(parseInt(isoLike[1], 10), parseInt(isoLike[2], 10), parseInt(isoLike[3], 10));
    }

    // MM/DD/YYYY, or DD/MM/YYYY when the first part cannot be a month
    const slashed = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4}|\d{2})(?:[T\s].*)?$/.exec(s);
    if (slashed) {
        const first = parseInt(slashed[1], 10);
        const second = parseInt(slashed[2], 10);
        const year = expandYear(slashed[3]);
        return first > 12
            ? calendarDate(year, second, first)
            : calendarDate(year, first, second);
    }

    // Month names ("Jan 5, 2024", "5 January 2024")
    if (/[a-z]{3}/i.test(s)) {
        return toCalendarDate(new Date(s));
    }

    return null;
}

export type DateStyle = 'short' | 'table' | 'long' | 'month';

/**
 * short: 05 Jan 2024 · table: 05-Jan-2024 · long: January 05, 2024 · month: 2024-01
 */
export function formatDateValue(date: Date, style: DateStyle = 'short'): string {
    const dd = String(date.getUTCDate()).padStart(2, '0');
    const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
    const yyyy = String(date.getUTCFullYear()).padStart(4, '0');
    const mon = SHORT_MONTHS[date.getUTCMonth()];

    switch (style) {
        case 'short': return `${dd} ${mon} ${yyyy}`;
        case 'table': return `${dd}-${mon}-${yyyy}`;
        case 'long': return `${LONG_MONTHS[date.getUTCMonth()]} ${dd}, ${yyyy}`;
        case 'month': return `${yyyy}-${mm}`;
    }
}

export function monthStart(date: Date): Date {
    const start = new Date(0);
    start.setUTCFullYear(date.getUTCFullYear(), date.getUTCMonth(), 1);
    return start;
}

export function formatNumber(n: number, decimals = 0): string {
    return n.toLocaleString('en-US', { minimumFractionDigits: decimals, maximumFractionDigits: decimals });
}

export function formatCurrency(n: number, symbol: string, decimals = 0): string {
    return `${symbol}${formatNumber(n, decimals)}`;
}

export function formatPercent(ratio: number, decimals = 1): string {
    return `${(ratio * 100).toFixed(decimals)}%`;
}

/** "a", "a and b", "a, b and c" */
export function joinList(items: readonly string[]): string {
    if (items.length <= 1) return items.join('');
    return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}
