import { describe, expect, it } from 'vitest';
import { compileQueryPlan } from '../../lib/compiler';
import type { QueryPlan } from '../../lib/compiler';
import { createCriteriaSet } from '../../lib/criteria';
import { executePlan } from '../../lib/execution';
import { createHandBuiltFixture } from '../../lib/testing';
import type { FixtureRow, HandBuiltRows } from '../../lib/testing';
import { HEART_FAILURE_CODES } from '../criteriaFixtures';

function patient(id: string): FixtureRow {
    return { patient_id: id, age: 60, enrollment_start_date: '2020-01-01', enrollment_end_date: '2020-12-31' };
}

function visit(patientId: string, serviceDate: string, code: string): FixtureRow {
    return { patient_id: patientId, service_date: serviceDate, primary_diagnosis_code: code };
}

function heartFailureInclusion(extra: Record<string, unknown>): Record<string, unknown> {
    return {
        studyId: 'HF-COUNT-01',
        predicates: [{
            id: 'I01',
            polarity: 'inclusion',
            domain: 'diagnosis',
            concept: 'heart failure',
            conceptResolution: HEART_FAILURE_CODES,
            verifiability: 'rwd',
            ...extra,
        }],
        anchorRules: [{ name: 'enroll', kind: 'enrollment_start' }],
    };
}

async function cohortOf(rows: HandBuiltRows, input: Record<string, unknown>): Promise<{ plan: QueryPlan; subjects: string[] }> {
    const { store, catalog } = createHandBuiltFixture(rows);
    try {
        const compiled = compileQueryPlan(createCriteriaSet(input), await catalog.getSchema());
        if (!compiled.ok) {
            throw compiled.error;
        }
        const result = await executePlan(store, compiled.plan, 'preview');
        expect(result.status).toBe('ok');
        return { plan: compiled.plan, subjects: result.previewRows.map((row) => row.subjectId) };
    } finally {
        store.close();
    }
}

describe('count constraints', () => {
    it('counts only events from the first match through withinDays when a proportion is set', async () => {
        const rows: HandBuiltRows = {
            patients: ['P1', 'P2', 'P3', 'P4'].map(patient),
            claims: [
                visit('P1', '2021-01-05', 'Z00.00'),
                visit('P1', '2021-01-20', 'Z00.00'),
                visit('P1', '2021-03-01', 'I50.9'),
                visit('P1', '2021-03-02', 'Z00.00'),
                visit('P2', '2021-03-01', 'I50.9'),
                visit('P2', '2021-03-05', 'Z00.00'),
                visit('P2', '2021-03-08', 'Z00.00'),
                visit('P3', '2021-03-01', 'I50.9'),
                visit('P3', '2021-04-01', 'Z00.00'),
                visit('P4', '2021-03-01', 'Z00.00'),
            ],
        };

        const { plan, subjects } = await cohortOf(rows, heartFailureInclusion({
            countConstraint: { operator: '>=', count: 1, withinDays: 10, proportion: 0.5 },
        }));

        expect(plan.fragments[0].sql).toContain('WHERE julianday(q.event_date) - julianday(q.first_date) BETWEEN 0 AND 10');
        expect(subjects).toEqual(['P1', 'P3']);
    });

    it('needs the given number of matching events inside withinDays of the first one', async () => {
        const rows: HandBuiltRows = {
            patients: ['P1', 'P2'].map(patient),
            claims: [
                visit('P1', '2021-01-01', 'I50.9'),
                visit('P1', '2021-01-20', 'I50.22'),
                visit('P2', '2021-01-01', 'I50.9'),
                visit('P2', '2021-03-01', 'I50.9'),
            ],
        };

        const { subjects } = await cohortOf(rows, heartFailureInclusion({
            countConstraint: { operator: '>=', count: 2, withinDays: 30 },
        }));

        expect(subjects).toEqual(['P1']);
    });

    it('compares the matching share against the proportion', async () => {
        const rows: HandBuiltRows = {
            patients: ['P1', 'P2'].map(patient),
            claims: [
                visit('P1', '2021-01-01', 'I50.9'),
                visit('P1', '2021-02-01', 'I50.9'),
                visit('P1', '2021-03-01', 'Z00.00'),
                visit('P1', '2021-04-01', 'Z00.00'),
                visit('P2', '2021-01-01', 'I50.9'),
                visit('P2', '2021-02-01', 'Z00.00'),
                visit('P2', '2021-03-01', 'Z00.00'),
                visit('P2', '2021-04-01', 'Z00.00'),
            ],
        };

        const { plan, subjects } = await cohortOf(rows, heartFailureInclusion({
            countConstraint: { operator: '>=', count: 1, proportion: 0.5 },
        }));

        expect(plan.fragments[0].sql).toContain('HAVING SUM(q.is_match) * 10 >= 5 * COUNT(*)');
        expect(subjects).toEqual(['P1']);
    });

    it('takes the ceiling of proportion times total without rounding the proportion', async () => {
        const rows: HandBuiltRows = {
            patients: [patient('P2')],
            claims: [
                visit('P2', '2021-01-01', 'I50.9'),
                visit('P2', '2021-02-01', 'Z00.00'),
                visit('P2', '2021-03-01', 'Z00.00'),
            ],
        };

        const above = await cohortOf(rows, heartFailureInclusion({
            countConstraint: { operator: '>=', count: 1, proportion: 0.3333334 },
        }));
        const below = await cohortOf(rows, heartFailureInclusion({
            countConstraint: { operator: '>=', count: 1, proportion: 0.3333333 },
        }));

        expect(above.plan.fragments[0].sql).toContain('SUM(q.is_match) * 10000000 >= 3333334 * COUNT(*)');
        expect(above.subjects).toEqual([]);
        expect(below.subjects).toEqual(['P2']);
    });

    it('writes exponent-form proportions as exact fractions', async () => {
        const rows: HandBuiltRows = {
            patients: [patient('P1')],
            claims: [visit('P1', '2021-01-01', 'I50.9')],
        };

        const { plan, subjects } = await cohortOf(rows, heartFailureInclusion({
            countConstraint: { operator: '>=', count: 1, proportion: 1e-7 },
        }));

        expect(plan.fragments[0].sql).toContain('SUM(q.is_match) * 10000000 >= 1 * COUNT(*)');
        expect(subjects).toEqual(['P1']);
    });
});

describe('named periods', () => {
    const rows: HandBuiltRows = {
        patients: ['Q1', 'Q2', 'Q3', 'Q4', 'Q5'].map(patient),
        claims: [
            visit('Q1', '2019-06-01', 'I50.9'),
            visit('Q2', '2020-06-01', 'I50.9'),
            visit('Q3', '2021-02-01', 'I50.9'),
            visit('Q4', '2020-06-01', 'Z00.00'),
            visit('Q5', '2018-01-01', 'I50.9'),
        ],
    };

    it('baseline keeps events strictly before the anchor', async () => {
        const { subjects } = await cohortOf(rows, heartFailureInclusion({
            temporalWindow: { reference: 'enroll', during: 'baseline' },
        }));

        expect(subjects).toEqual(['Q1', 'Q5']);
    });

    it('baseline with beforeDays bounds the look-back', async () => {
        const { subjects } = await cohortOf(rows, heartFailureInclusion({
            temporalWindow: { reference: 'enroll', during: 'baseline', beforeDays: 365 },
        }));

        expect(subjects).toEqual(['Q1']);
    });

    it('follow_up keeps events on or after the anchor', async () => {
        const { subjects } = await cohortOf(rows, heartFailureInclusion({
            temporalWindow: { reference: 'enroll', during: 'follow_up' },
        }));

        expect(subjects).toEqual(['Q2', 'Q3']);
    });

    it('enrollment keeps events inside the enrollment period', async () => {
        const { plan, subjects } = await cohortOf(rows, heartFailureInclusion({
            temporalWindow: { reference: 'enroll', during: 'enrollment' },
        }));

        expect(plan.fragments[0].sql).toContain('ev.event_date BETWEEN date(pop.enrollment_start_date) AND date(pop.enrollment_end_date)');
        expect(subjects).toEqual(['Q2']);
    });
});
