import type { QueryPlan } from '../compiler/types';
import { FunnelComputeError } from './errors';
import type { SubjectSource } from './types';

export interface FragmentCacheStats {
    baseLoads: number;
    fragmentLoads: number;
    prefixComputations: number;
}

/**
 * Subject-id sets for one plan version. Each set is loaded at most once and the
 * in-flight promise is shared, so concurrent what-if calls never load a fragment twice.
 * Intersections of inclusion prefixes are memoised: toggling a predicate only recomputes
 * the steps after the first changed one. A new plan version needs a new cache.
 */
export class FragmentCache {
    readonly planId: string;
    readonly planVersion: number;
    private readonly plan: QueryPlan;
    private readonly source: SubjectSource;
    private base: Promise<ReadonlySet<string>> | null = null;
    private readonly fragments = new Map<string, Promise<ReadonlySet<string>>>();
    private readonly prefixes = new Map<string, Promise<ReadonlySet<string>>>();
    private readonly counters: FragmentCacheStats = { baseLoads: 0, fragmentLoads: 0, prefixComputations: 0 };

    constructor(plan: QueryPlan, source: SubjectSource) {
        this.plan = plan;
        this.planId = plan.planId;
        this.planVersion = plan.version;
        this.source = source;
    }

    get stats(): FragmentCacheStats {
        return { ...this.counters };
    }

    isFor(plan: QueryPlan): boolean {
        return plan.planId === this.planId && plan.version === this.planVersion;
    }

    assertFor(plan: QueryPlan): void {
        if (!this.isFor(plan)) {
            throw new FunnelComputeError(
                'STALE_CACHE',
                `Fragment cache holds plan v${this.planVersion} (${this.planId}), not v${plan.version} (${plan.planId}).`,
            );
        }
    }

    getBase(): Promise<ReadonlySet<string>> {
        if (this.base === null) {
            this.counters.baseLoads += 1;
            this.base = this.source.fetchBase(this.plan).catch((error: unknown) => {
                this.base = null;
                throw error;
            });
        }
        return this.base;
    }

    getFragment(predicateId: string): Promise<ReadonlySet<string>> {
        const cached = this.fragments.get(predicateId);
        if (cached) {
            return cached;
        }

        this.counters.fragmentLoads += 1;
        const loading = this.source.fetchFragment(this.plan, predicateId).catch((error: unknown) => {
            this.fragments.delete(predicateId);
            throw error;
        });
        this.fragments.set(predicateId, loading);
        return loading;
    }

    /** Base intersected with the given inclusion fragments, in order. */
    getPrefix(predicateIds: readonly string[]): Promise<ReadonlySet<string>> {
        if (predicateIds.length === 0) {
            return this.getBase();
        }

        const key = predicateIds.join('\u0000');
        const cached = this.prefixes.get(key);
        if (cached) {
            return cached;
        }

        this.counters.prefixComputations += 1;
        const head = predicateIds.slice(0, -1);
        const last = predicateIds[predicateIds.length - 1];
        const computing = Promise.all([this.getPrefix(head), this.getFragment(last)])
            .then(([previous, fragment]) => intersect(previous, fragment))
            .catch((error: unknown) => {
                this.prefixes.delete(key);
                throw error;
            });
        this.prefixes.set(key, computing);
        return computing;
    }
}

export function intersect(left: ReadonlySet<string>, right: ReadonlySet<string>): ReadonlySet<string> {
    const [small, large] = left.size <= right.size ? [left, right] : [right, left];
    const result = new Set<string>();
    for (const id of small) {
        if (large.has(id)) {
            result.add(id);
        }
    }
    return result;
}
