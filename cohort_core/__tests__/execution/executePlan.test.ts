import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import type { CatalogSchema } from '../../lib/catalog';
import { compileQueryPlan } from '../../lib/compiler';
import type { QueryPlan } from '../../lib/compiler';
import { createCriteriaSet } from '../../lib/criteria';
import { assertExecutionSucceeded, executePlan, PlanExecutionError } from '../../lib/execution';
import type { SqliteCohortStore } from '../../lib/store';
import { createClaimsFixture, RecordingCohortStore, SlowCohortStore } from '../../lib/testing';
import { diabetesCriteria, heartFailureExclusionCriteria } from '../criteriaFixtures';

let store: SqliteCohortStore;
let schema: CatalogSchema;

beforeAll(async () => {
    const fixture = createClaimsFixture();
    store = fixture.store;
    schema = await fixture.catalog.getSchema();
});

afterAll(() => {
    store.close();
});

function planFor(input: unknown): QueryPlan {
    const result = compileQueryPlan(createCriteriaSet(input), schema);
    if (!result.ok) {
        throw result.error;
    }
    return result.plan;
}

function singlePredicate(resolution: Record<string, unknown>, extra: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        studyId: 'S1',
        predicates: [{
            id: 'I01',
            polarity: 'inclusion',
            domain: 'diagnosis',
            concept: 'heart failure',
            conceptResolution: { resolved: true, codeSystem: 'ICD10CM', confidence: 'high', ...resolution },
            verifiability: 'rwd',
            ...extra,
        }],
    };
}

describe('executePlan', () => {
    it('count mode runs only the count query', async () => {
        const recording = new RecordingCohortStore(store);
        const plan = planFor(heartFailureExclusionCriteria());

        const result = await executePlan(recording, plan, 'count');

        expect(result.status).toBe('ok');
        expect(result.rowCount).toBe(368);
        expect(result.planId).toBe(plan.planId);
        expect(result.planVersion).toBe(1);
        expect(result.previewRows).toEqual([]);
        expect(result.flags).toEqual([]);
        expect(result.timing.previewMs).toBeNull();
        expect(recording.statements).toEqual([plan.sql.count]);
    });

    it('preview mode counts first, then reads at most the preview limit', async () => {
        const recording = new RecordingCohortStore(store);
        const plan = planFor(heartFailureExclusionCriteria());

        const result = await executePlan(recording, plan, 'preview', { previewLimit: 3 });

        expect(recording.statements).toEqual([plan.sql.count, `${plan.sql.cohort}\nLIMIT 3`]);
        expect(result.rowCount).toBe(368);
        expect(result.previewRows).toEqual([
            { subjectId: 'P0002', indexDate: null },
            { subjectId: 'P0003', indexDate: null },
            { subjectId: 'P0004', indexDate: null },
        ]);
    });

    it('preview rows carry the index date from the index anchor', async () => {
        const plan = planFor(diabetesCriteria());

        const result = await executePlan(store, plan, 'preview', { previewLimit: 5 });

        expect(result.rowCount).toBe(69);
        expect(result.previewRows).toEqual([
            { subjectId: 'P0002', indexDate: '2020-06-01' },
            { subjectId: 'P0007', indexDate: '2020-06-01' },
            { subjectId: 'P0012', indexDate: '2020-06-01' },
            { subjectId: 'P0022', indexDate: '2020-06-01' },
            { subjectId: 'P0027', indexDate: '2020-06-01' },
        ]);
    });

    it('skips the row query and flags an empty cohort', async () => {
        const recording = new RecordingCohortStore(store);
        const plan = planFor({
            studyId: 'S1',
            predicates: [{
                id: 'I01',
                polarity: 'inclusion',
                domain: 'demographic',
                concept: 'age',
                valueConstraint: { operator: 'between', value: [200, 300] },
                verifiability: 'rwd',
            }],
        });

        const result = await executePlan(recording, plan, 'preview');

        expect(result.rowCount).toBe(0);
        expect(result.flags).toEqual(['empty_cohort']);
        expect(recording.statements).toHaveLength(1);
    });

    it('flags a cohort above the ceiling', async () => {
        const plan = planFor(heartFailureExclusionCriteria());

        const result = await executePlan(store, plan, 'count', { hugeCohortCeiling: 100 });

        expect(result.flags).toEqual(['huge_cohort']);
    });

    it('wildcard and hierarchy matching find the same heart failure claims', async () => {
        const wildcard = await executePlan(store, planFor(singlePredicate({ codeValues: ['I50*'], matchingLogic: 'wildcard' })), 'count');
        const hierarchy = await executePlan(store, planFor(singlePredicate({ codeValues: ['I50'], matchingLogic: 'hierarchy' })), 'count');
        const exact = await executePlan(store, planFor(singlePredicate({ codeValues: ['I50'], matchingLogic: 'exact' })), 'count');

        expect(wildcard.rowCount).toBe(14);
        expect(hierarchy.rowCount).toBe(14);
        expect(exact.rowCount).toBe(0);
    });

    it('applies count constraints per subject', async () => {
        const plan = planFor(singlePredicate(
            { codeValues: ['E11*'], matchingLogic: 'wildcard' },
            { concept: 'type 2 diabetes', countConstraint: { operator: '>=', count: 2 } },
        ));

        const result = await executePlan(store, plan, 'count');

        expect(result.rowCount).toBe(50);
    });

    it('matches drugs by ingredient name regardless of case', async () => {
        const plan = planFor({
            studyId: 'S1',
            predicates: [{
                id: 'I01',
                polarity: 'inclusion',
                domain: 'drug',
                concept: 'metformin',
                conceptResolution: { resolved: true, codeSystem: 'NDC', codeValues: ['Metformin'], matchingLogic: 'ingredient', confidence: 'high' },
                verifiability: 'rwd',
            }],
        });

        const result = await executePlan(store, plan, 'count');

        expect(result.rowCount).toBe(34);
    });

    it('returns a timeout result when the store is too slow', async () => {
        const plan = planFor(heartFailureExclusionCriteria());

        const result = await executePlan(new SlowCohortStore(store, 50), plan, 'count', { timeoutMs: 10 });

        expect(result.status).toBe('error');
        if (result.status === 'error') {
            expect(result.errorKind).toBe('timeout');
            expect(result.errorMessage).toBe('Query exceeded 10ms.');
            expect(result.rowCount).toBeNull();
        }
    });

    it('classifies a missing column as a schema error', async () => {
        const drifted = createClaimsFixture({ omitColumns: { claims: ['tertiary_diagnosis_code'] } });
        const plan = planFor(heartFailureExclusionCriteria());

        const result = await executePlan(drifted.store, plan, 'count');
        drifted.store.close();

        expect(result.status).toBe('error');
        if (result.status === 'error') {
            expect(result.errorKind).toBe('schema_error');
            expect(result.errorMessage).toContain('no such column');
            expect(result.errorMessage).toContain('tertiary_diagnosis_code');
        }
        expect(() => assertExecutionSucceeded(result)).toThrow(PlanExecutionError);
    });
});
