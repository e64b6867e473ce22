import Database from 'better-sqlite3';
import { CohortStoreError } from './errors';
import type { CohortStore, QueryOptions, SqlRow } from './types';

export interface SqliteCohortStoreOptions {
    /** Opened read-only; the file must exist. */
    path?: string;
    database?: Database.Database;
}

export class SqliteCohortStore implements CohortStore {
    private readonly db: Database.Database;
    private closed = false;

    constructor(options: SqliteCohortStoreOptions) {
        if (options.database) {
            this.db = options.database;
        } else if (options.path) {
            this.db = new Database(options.path, { readonly: true, fileMustExist: true });
        } else {
            throw new CohortStoreError('QUERY_FAILED', 'SqliteCohortStore requires a database path or handle.');
        }
    }

    static inMemory(): { store: SqliteCohortStore; database: Database.Database } {
        const database = new Database(':memory:');
        return { store: new SqliteCohortStore({ database }), database };
    }

    async query(sql: string, options: QueryOptions = {}): Promise<SqlRow[]> {
        if (this.closed) {
            throw new CohortStoreError('STORE_CLOSED', 'Cohort store is closed.');
        }

        const startedAt = Date.now();
        let rows: unknown[];
        try {
            const statement = this.db.prepare(sql);
            if (!statement.reader) {
                throw new CohortStoreError('READ_ONLY_VIOLATION', 'Statement does not return rows; only read queries are allowed.');
            }
            rows = statement.all(...(options.params ?? []));
        } catch (error) {
            if (error instanceof CohortStoreError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            throw new CohortStoreError('QUERY_FAILED', message);
        }

        const elapsedMs = Date.now() - startedAt;
        if (options.timeoutMs !== undefined && elapsedMs > options.timeoutMs) {
            throw new CohortStoreError('TIMEOUT', `Query exceeded ${options.timeoutMs}ms (took ${elapsedMs}ms).`);
        }

        return rows.filter(isRow);
    }

    close(): void {
        if (!this.closed) {
            this.closed = true;
            this.db.close();
        }
    }
}

function isRow(value: unknown): value is SqlRow {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
