export type SqlValue = string | number | bigint | Buffer | null;
export type SqlRow = Record<string, unknown>;

export interface QueryOptions {
    params?: readonly SqlValue[];
    /** Elapsed-time budget for the statement; exceeding it fails the query with TIMEOUT. */
    timeoutMs?: number;
}

/**
 * Read-only access to the clinical dataset. Implementations reject statements that write.
 */
export interface CohortStore {
    query(sql: string, options?: QueryOptions): Promise<SqlRow[]>;
}
