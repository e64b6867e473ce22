import { CohortStoreError } from '../store/errors';
import type { ExecutionErrorKind } from './types';

const REPAIRABLE: ReadonlySet<ExecutionErrorKind> = new Set<ExecutionErrorKind>(['syntax_error', 'schema_error', 'timeout']);

const DESTRUCTIVE_KEYWORDS = [
    'INSERT',
    'UPDATE',
    'DELETE',
    'DROP',
    'ALTER',
    'TRUNCATE',
    'CREATE',
    'ATTACH',
    'DETACH',
    'PRAGMA',
    'VACUUM',
    'REINDEX',
] as const;

const DESTRUCTIVE_PATTERN = new RegExp(`\\b(${DESTRUCTIVE_KEYWORDS.join('|')})\\b`, 'i');

export function classifyExecutionError(error: unknown): { kind: ExecutionErrorKind; message: string } {
    const message = error instanceof Error ? error.message : String(error);

    if (error instanceof CohortStoreError) {
        if (error.code === 'TIMEOUT') {
            return { kind: 'timeout', message };
        }
        if (error.code === 'READ_ONLY_VIOLATION') {
            return { kind: 'safety_violation', message };
        }
    }

    const lowered = message.toLowerCase();
    if (lowered.includes('syntax error') || lowered.includes('incomplete input') || lowered.includes('unrecognized token')) {
        return { kind: 'syntax_error', message };
    }
    if (lowered.includes('no such table') || lowered.includes('no such column')) {
        return { kind: 'schema_error', message };
    }
    return { kind: 'database_error', message };
}

/** Timeouts are retried like schema errors. */
export function isRepairable(kind: ExecutionErrorKind): boolean {
    return REPAIRABLE.has(kind);
}

/** Name from "no such table: main.labs" / "no such column: t.result_unit", without qualifiers. */
export function extractMissingIdentifier(message: string): string | null {
    const match = /no such (?:table|column):\s*([A-Za-z0-9_."]+)/i.exec(message);
    if (!match) {
        return null;
    }
    const segments = match[1].replace(/"/g, '').split('.').filter((segment) => segment.length > 0);
    return segments.length > 0 ? segments[segments.length - 1] : null;
}

/**
 * Finds a destructive keyword or a second statement outside string literals and comments.
 * Returns a description of the violation, or null when the text is a single read query.
 */
export function findSafetyViolation(sql: string): string | null {
    const stripped = sql
        .replace(/'(?:[^']|'')*'/g, "''")
        .replace(/--[^\n]*/g, ' ')
        .replace(/\/\*[\s\S]*?\*\//g, ' ');

    const keyword = DESTRUCTIVE_PATTERN.exec(stripped);
    if (keyword) {
        return `Destructive operation '${keyword[1].toUpperCase()}' not allowed`;
    }

    const statements = stripped.split(';').filter((part) => part.trim().length > 0);
    if (statements.length > 1) {
        return 'Multiple statements not allowed';
    }
    return null;
}
