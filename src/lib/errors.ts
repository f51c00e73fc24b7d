import type { ColumnRole, Dimension } from '../types/sales';

export type SalesReportErrorCode =
    | 'MISSING_COLUMN'
    | 'EMPTY_DATASET'
    | 'DIMENSION_UNAVAILABLE'
    | 'INPUT_FILE'
    | 'INVALID_CONFIG';

export class SalesReportError extends Error {
    readonly code: SalesReportErrorCode;

    constructor(code: SalesReportErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/** A mandatory role (amount or date) has no matching column. */
export class MissingColumnError extends SalesReportError {
    readonly roles: ColumnRole[];

    constructor(roles: ColumnRole[]) {
        const list = roles.map(r => `"${r}"`).join(', ');
        super('MISSING_COLUMN', `No column found for required role ${list}; cannot analyse this file.`);
        this.roles = roles;
    }
}

export class EmptyDatasetError extends SalesReportError {
    constructor(message = 'No valid orders remain after cleaning; average order value is undefined.') {
        super('EMPTY_DATASET', message);
    }
}

export class DimensionUnavailableError extends SalesReportError {
    readonly dimension: Dimension;

    constructor(dimension: Dimension) {
        super('DIMENSION_UNAVAILABLE', `Dimension "${dimension}" has no source column.`);
        this.dimension = dimension;
    }
}

export class InputFileError extends SalesReportError {
    constructor(message: string) {
        super('INPUT_FILE', message);
    }
}

export class ConfigError extends SalesReportError {
    constructor(message: string) {
        super('INVALID_CONFIG', message);
    }
}
