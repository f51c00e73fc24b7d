/**
 * Best-effort detection of the columns a sales export uses for each role.
 * Headers vary from one export to the next, so matching is a loose,
 * case-insensitive substring check against the normalized header.
 */

import type { ColumnRole, ColumnRoles } from '../types/sales';

export const COLUMN_KEYWORDS: Readonly<Record<ColumnRole, string>> = {
    amount: 'amount',
    date: 'date',
    category: 'category',
    fulfillment: 'fulfil',
    region: 'state',
};

export const COLUMN_ROLES: readonly ColumnRole[] = ['amount', 'date', 'category', 'fulfillment', 'region'];

/**
 * Trims a header and title-cases it: the first letter after any non-letter
 * is upper-cased, every other letter lower-cased.
 *
 * @example normalizeColumnName('  ship-state ') // 'Ship-State'
 */
export const normalizeColumnName = (name: string): string =>
    name
        .trim()
        .toLowerCase()
        .replace(/(^|[^\p{L}])(\p{L})/gu, (_, lead: string, letter: string) => lead + letter.toUpperCase());

export const detectColumn = (role: ColumnRole, columns: readonly string[]): string | undefined => {
    const keyword = COLUMN_KEYWORDS[role];
    return columns
        .map(normalizeColumnName)
        .find(c => c.toLowerCase().includes(keyword));
};

/**
 * Resolves every role against the header list. Roles with no matching
 * column are left out of the result.
 */
export const resolveColumnRoles = (columns: readonly string[]): ColumnRoles => {
    const roles: Partial<Record<ColumnRole, string>> = {};

    for (const role of COLUMN_ROLES) {
        const detected = detectColumn(role, columns);
        if (detected !== undefined) {
            roles[role] = detected;
        }
    }

    return Object.freeze(roles);
};
