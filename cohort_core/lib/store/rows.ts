import type { SqlRow } from './types';

/** Reads the `n` column of a `SELECT COUNT(*) AS n` row. */
export function readCount(row: SqlRow | undefined): number {
    const value = row?.n;
    if (typeof value === 'number' && Number.isFinite(value)) {
        return value;
    }
    if (typeof value === 'bigint') {
        return Number(value);
    }
    return 0;
}

export function readSubjectId(value: unknown): string | null {
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'bigint') {
        return String(value);
    }
    return null;
}
