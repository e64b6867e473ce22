import { buildBaseQuery, buildFragmentQuery } from '../compiler/planSql';
import type { QueryPlan } from '../compiler/types';
import { CohortStoreError } from '../store/errors';
import { readSubjectId } from '../store/rows';
import type { CohortStore, SqlRow } from '../store/types';
import { withTimeout } from '../utils/withTimeout';
import { FunnelComputeError } from './errors';
import type { SubjectSource } from './types';

export class StoreSubjectSource implements SubjectSource {
    private readonly store: CohortStore;
    private readonly timeoutMs: number | undefined;

    constructor(store: CohortStore, options: { timeoutMs?: number } = {}) {
        this.store = store;
        this.timeoutMs = options.timeoutMs;
    }

    async fetchBase(plan: QueryPlan): Promise<ReadonlySet<string>> {
        return toSubjectSet(await this.run(buildBaseQuery(plan)));
    }

    async fetchFragment(plan: QueryPlan, predicateId: string): Promise<ReadonlySet<string>> {
        const sql = buildFragmentQuery(plan, predicateId);
        if (sql === null) {
            throw new FunnelComputeError('UNKNOWN_PREDICATE', `Plan ${plan.planId} has no fragment for ${predicateId}.`, [predicateId]);
        }
        return toSubjectSet(await this.run(sql));
    }

    private run(sql: string): Promise<SqlRow[]> {
        return withTimeout(
            this.store.query(sql, { timeoutMs: this.timeoutMs }),
            this.timeoutMs,
            () => new CohortStoreError('TIMEOUT', `Query exceeded ${this.timeoutMs}ms.`),
        );
    }
}

function toSubjectSet(rows: readonly SqlRow[]): ReadonlySet<string> {
    const subjects = new Set<string>();
    for (const row of rows) {
        const id = readSubjectId(row.subject_id);
        if (id !== null) {
            subjects.add(id);
        }
    }
    return subjects;
}
