import { beforeAll, describe, expect, it } from 'vitest';
import type { CatalogSchema } from '../../lib/catalog';
import { buildFragmentQuery, buildFunnelQuery, compileQueryPlan, CriteriaCompileError } from '../../lib/compiler';
import type { QueryPlan } from '../../lib/compiler';
import { createCriteriaSet } from '../../lib/criteria';
import { createClaimsFixture } from '../../lib/testing';
import { diabetesCriteria, heartFailureExclusionCriteria } from '../criteriaFixtures';

let schema: CatalogSchema;

beforeAll(async () => {
    const { catalog, store } = createClaimsFixture();
    schema = await catalog.getSchema();
    store.close();
});

function compiled(input: unknown): QueryPlan {
    const result = compileQueryPlan(createCriteriaSet(input), schema);
    if (!result.ok) {
        throw result.error;
    }
    return result.plan;
}

function compileError(input: unknown): CriteriaCompileError {
    const result = compileQueryPlan(createCriteriaSet(input), schema);
    if (result.ok) {
        throw new Error('expected compilation to fail');
    }
    return result.error;
}

function withPredicate(predicate: Record<string, unknown>): Record<string, unknown> {
    return { studyId: 'S1', predicates: [predicate] };
}

describe('compileQueryPlan', () => {
    it('compiles one CTE per predicate and combines them as included minus excluded', () => {
        const plan = compiled(heartFailureExclusionCriteria());

        expect(plan.version).toBe(1);
        expect(plan.studyId).toBe('HF-EXCL-01');
        expect(plan.population).toEqual({ table: 'patients', subjectColumn: 'patient_id' });
        expect(plan.indexAnchor).toBeNull();
        expect(plan.gaps).toEqual([]);
        expect(plan.fragments.map((fragment) => fragment.name)).toEqual(['p_I01', 'p_E01']);
        expect(plan.combination).toEqual({ inclusion: ['p_I01'], exclusion: ['p_E01'], final: 'included_minus_excluded' });
        expect(plan.sql.base).toBe('SELECT DISTINCT b.patient_id AS subject_id\nFROM patients b\nWHERE b.patient_id IS NOT NULL');
        expect(plan.fragments[0].sql).toBe('SELECT DISTINCT t.patient_id AS subject_id\nFROM patients t\nWHERE t.age BETWEEN 18 AND 75');
        expect(plan.fragments[1].sql).toContain(
            "WHERE (t.primary_diagnosis_code LIKE 'I50%' OR t.secondary_diagnosis_code LIKE 'I50%' OR t.tertiary_diagnosis_code LIKE 'I50%')",
        );
    });

    it('renders the cohort query with the named CTE layout', () => {
        const plan = compiled(heartFailureExclusionCriteria());
        const cohort = plan.sql.cohort;

        expect(cohort.startsWith('WITH\nbase_population AS (\n')).toBe(true);
        expect(cohort).toContain('included_subjects AS (\n    SELECT subject_id FROM base_population\n    INTERSECT\n    SELECT subject_id FROM p_I01\n)');
        expect(cohort).toContain('excluded_subjects AS (\n    SELECT subject_id FROM p_E01\n)');
        expect(cohort).toContain('final_cohort AS (\n    SELECT subject_id FROM included_subjects\n    EXCEPT\n    SELECT subject_id FROM excluded_subjects\n)');
        expect(cohort.endsWith('SELECT f.subject_id, NULL AS index_date\nFROM final_cohort f\nORDER BY f.subject_id')).toBe(true);
        expect(plan.sql.count.endsWith('SELECT COUNT(*) AS n FROM final_cohort')).toBe(true);
    });

    it('is deterministic and ignores key order in the input', () => {
        const first = compiled(heartFailureExclusionCriteria());
        const second = compiled(heartFailureExclusionCriteria());
        const reordered = compiled({ predicates: heartFailureExclusionCriteria().predicates, studyId: 'HF-EXCL-01' });

        expect(second.planId).toBe(first.planId);
        expect(reordered.planId).toBe(first.planId);
        expect(second.sql).toEqual(first.sql);
    });

    it('keeps the plan id when only the version number changes', () => {
        const set = createCriteriaSet(heartFailureExclusionCriteria());
        const v1 = compileQueryPlan(set, schema);
        const v4 = compileQueryPlan(set, schema, { planVersion: 4 });

        expect(v1.ok && v4.ok).toBe(true);
        if (v1.ok && v4.ok) {
            expect(v4.plan.version).toBe(4);
            expect(v4.plan.planId).toBe(v1.plan.planId);
        }
    });

    it('returns a frozen plan', () => {
        const plan = compiled(heartFailureExclusionCriteria());

        expect(Object.isFrozen(plan)).toBe(true);
        expect(Object.isFrozen(plan.fragments)).toBe(true);
        expect(Object.isFrozen(plan.fragments[0])).toBe(true);
    });

    it('compiles first-event anchors before the fragments windowed on them', () => {
        const plan = compiled(diabetesCriteria());

        expect(plan.indexAnchor).toBe('first_t2d');
        expect(plan.anchors.map((anchor) => anchor.cteName)).toEqual(['anchor_first_t2d']);
        expect(plan.fragments.find((fragment) => fragment.predicateId === 'I03')?.anchors).toEqual(['anchor_first_t2d']);
        expect(plan.sql.cohort.indexOf('anchor_first_t2d AS (')).toBeLessThan(plan.sql.cohort.indexOf('p_I03 AS ('));
        expect(plan.sql.cohort).toContain('LEFT JOIN anchor_first_t2d ia ON ia.subject_id = f.subject_id');
    });

    it('lists non-RWD predicates as gaps instead of fragments', () => {
        const plan = compiled(diabetesCriteria());

        expect(plan.fragments.map((fragment) => fragment.predicateId)).toEqual(['I01', 'I02', 'I03', 'E01']);
        expect(plan.gaps).toEqual([{
            predicateId: 'N01',
            kind: 'non_rwd',
            issue: 'Not enforceable from the available data; kept for documentation.',
            requiresUserInput: false,
        }]);
    });

    it('turns a predicate that needs a definition into a gap proposing the first candidate', () => {
        const plan = compiled(withPredicate({
            id: 'I01',
            polarity: 'inclusion',
            domain: 'diagnosis',
            concept: 'uncontrolled diabetes',
            verifiability: 'rwd',
            needsDefinition: true,
            candidateDefinitions: ['E11.65 on any claim', 'HbA1c >= 9%'],
        }));

        expect(plan.fragments).toEqual([]);
        expect(plan.gaps).toEqual([{
            predicateId: 'I01',
            kind: 'needs_definition',
            issue: 'Clinically ambiguous; an operational definition is required before compilation.',
            requiresUserInput: true,
            proposedResolution: 'E11.65 on any claim',
        }]);
    });

    it('skips an unresolved partial-RWD inclusion with an automatic gap', () => {
        const plan = compiled(withPredicate({
            id: 'I01',
            polarity: 'inclusion',
            domain: 'procedure',
            concept: 'cardiac rehabilitation',
            verifiability: 'partial_rwd',
        }));

        expect(plan.gaps).toEqual([{
            predicateId: 'I01',
            kind: 'unresolved_concept',
            issue: 'Concept "cardiac rehabilitation" is not resolved to codes.',
            requiresUserInput: true,
        }]);
    });

    it('fails on an unresolved required exclusion', () => {
        const error = compileError(withPredicate({
            id: 'E02',
            polarity: 'exclusion',
            domain: 'diagnosis',
            concept: 'stroke',
            verifiability: 'rwd',
        }));

        expect(error.kind).toBe('unresolved_required_predicate');
        expect(error.predicateIds).toEqual(['E02']);
        expect(error.message).toBe('Unresolved required predicates: Exclusion predicate E02 (stroke) must be resolved before compilation.');
    });

    it('fails on an unresolved exclusion even when it is marked as skipped', () => {
        const error = compileError({
            ...withPredicate({ id: 'E02', polarity: 'exclusion', domain: 'diagnosis', concept: 'stroke', verifiability: 'rwd' }),
            gaps: [{ predicateId: 'E02', kind: 'unresolved_concept', issue: 'Skipped by the user.', requiresUserInput: false }],
        });

        expect(error.kind).toBe('unresolved_required_predicate');
    });

    it('compiles an unresolved required inclusion that the user skipped', () => {
        const plan = compiled({
            ...withPredicate({ id: 'I02', polarity: 'inclusion', domain: 'diagnosis', concept: 'stroke', verifiability: 'rwd' }),
            gaps: [{ predicateId: 'I02', kind: 'unresolved_concept', issue: 'Skipped by the user.', requiresUserInput: false }],
        });

        expect(plan.fragments).toEqual([]);
        expect(plan.gaps.map((gap) => gap.issue)).toEqual(['Skipped by the user.']);
    });

    it('fails when the catalog maps no table for the domain', () => {
        const error = compileError(withPredicate({
            id: 'I01',
            polarity: 'inclusion',
            domain: 'observation',
            concept: 'smoking status',
            conceptResolution: { resolved: true, codeSystem: 'local', codeValues: ['current'], matchingLogic: 'exact', confidence: 'high' },
            verifiability: 'rwd',
        }));

        expect(error.kind).toBe('missing_catalog_mapping');
        expect(error.message).toBe('Missing catalog mappings: No catalog mapping for domain "observation".');
    });

    it('fails on a lab unit with no conversion', () => {
        const error = compileError(withPredicate({
            id: 'I01',
            polarity: 'inclusion',
            domain: 'lab',
            concept: 'HbA1c',
            conceptResolution: { resolved: true, codeSystem: 'LOINC', codeValues: ['4548-4'], matchingLogic: 'exact', confidence: 'high' },
            valueConstraint: { operator: '>=', value: 7, unit: 'mg/dL' },
            verifiability: 'rwd',
        }));

        expect(error.kind).toBe('unsupported_unit');
        expect(error.message).toBe('Unsupported units: Unit "mg/dL" cannot be converted to % for hba1c.');
    });

    it('fails on an anchor built from a predicate that cannot compile', () => {
        const error = compileError({
            studyId: 'S1',
            predicates: [
                { id: 'I02', polarity: 'inclusion', domain: 'diagnosis', concept: 'frailty', verifiability: 'non_rwd' },
                {
                    id: 'I03',
                    polarity: 'inclusion',
                    domain: 'diagnosis',
                    concept: 'heart failure',
                    conceptResolution: { resolved: true, codeSystem: 'ICD10CM', codeValues: ['I50*'], matchingLogic: 'wildcard', confidence: 'high' },
                    temporalWindow: { reference: 'frail', afterDays: 90 },
                    verifiability: 'rwd',
                },
            ],
            anchorRules: [{ name: 'frail', kind: 'first_event', predicateId: 'I02' }],
        });

        expect(error.kind).toBe('invalid_anchor');
        expect(error.predicateIds).toEqual(['I03', 'I02']);
        expect(error.message).toBe('Invalid anchors: Anchor "frail" references predicate "I02", which cannot be compiled.');
    });

    it('demotes predicates with missing columns when asked to', () => {
        const drifted: CatalogSchema = {
            ...schema,
            tables: schema.tables.map((table) => (table.name === 'labs'
                ? { ...table, columns: table.columns.filter((column) => column.name !== 'result_unit') }
                : table)),
        };
        const set = createCriteriaSet(diabetesCriteria());

        const strict = compileQueryPlan(set, drifted);
        expect(strict.ok).toBe(false);
        if (!strict.ok) {
            expect(strict.error.kind).toBe('missing_catalog_mapping');
            expect(strict.error.predicateIds).toEqual(['I03']);
        }

        const lenient = compileQueryPlan(set, drifted, { demoteMissingReferences: true });
        expect(lenient.ok).toBe(true);
        if (lenient.ok) {
            expect(lenient.plan.fragments.map((fragment) => fragment.predicateId)).toEqual(['I01', 'I02', 'E01']);
            expect(lenient.demoted).toEqual([{
                predicateId: 'I03',
                kind: 'schema_demoted',
                issue: 'Demoted after a schema error: Predicate I03 references columns missing from the catalog: labs.result_unit.',
                requiresUserInput: true,
            }]);
        }
    });
});

describe('code matching SQL', () => {
    function fragmentSql(resolution: Record<string, unknown>): string {
        const plan = compiled(withPredicate({
            id: 'I01',
            polarity: 'inclusion',
            domain: 'diagnosis',
            concept: 'test concept',
            conceptResolution: { resolved: true, codeSystem: 'ICD10CM', confidence: 'high', ...resolution },
            verifiability: 'rwd',
        }));
        return plan.fragments[0].sql;
    }

    it('expands hierarchy codes through the reference table', () => {
        const sql = fragmentSql({ codeValues: ['I50'], matchingLogic: 'hierarchy' });

        expect(sql).toContain(
            "t.primary_diagnosis_code IN (SELECT r.icd_10_code FROM ref_icd10 r WHERE r.icd_10_code = 'I50' OR r.icd_10_code LIKE 'I50%')",
        );
    });

    it('quotes exact codes and escapes LIKE metacharacters', () => {
        expect(fragmentSql({ codeValues: ["X'1"], matchingLogic: 'exact' })).toContain("t.primary_diagnosis_code IN ('X''1')");
        expect(fragmentSql({ codeValues: ['A_B*'], matchingLogic: 'exact' })).toContain("t.primary_diagnosis_code LIKE 'A\\_B%' ESCAPE '\\'");
    });

    it('adds a HAVING clause for count constraints', () => {
        const plan = compiled(withPredicate({
            id: 'I01',
            polarity: 'inclusion',
            domain: 'diagnosis',
            concept: 'type 2 diabetes',
            conceptResolution: { resolved: true, codeSystem: 'ICD10CM', codeValues: ['E11*'], matchingLogic: 'wildcard', confidence: 'high' },
            countConstraint: { operator: '>=', count: 2 },
            verifiability: 'rwd',
        }));

        expect(plan.fragments[0].sql.endsWith('GROUP BY q.subject_id\nHAVING COUNT(*) >= 2')).toBe(true);
    });
});

describe('funnel and fragment queries', () => {
    it('the funnel query counts each enabled step and reuses fragment CTE names', () => {
        const plan = compiled(heartFailureExclusionCriteria());
        const sql = buildFunnelQuery(plan, ['I01', 'E01']);

        expect(sql).toContain('step_1 AS (\n    SELECT subject_id FROM step_0\n    INTERSECT\n    SELECT subject_id FROM p_I01\n)');
        expect(sql).toContain('funnel_final AS (\n    SELECT subject_id FROM step_1\n    EXCEPT\n    SELECT subject_id FROM funnel_excluded\n)');
        expect(sql.endsWith("SELECT 2, 'final', COUNT(*) FROM funnel_final\nORDER BY step_order")).toBe(true);
    });

    it('an empty enabled set counts only the base population', () => {
        const plan = compiled(heartFailureExclusionCriteria());
        const sql = buildFunnelQuery(plan, []);

        expect(sql).not.toContain('p_I01');
        expect(sql.endsWith("SELECT 0 AS step_order, 'base' AS step_key, COUNT(*) AS n FROM step_0\nORDER BY step_order")).toBe(true);
    });

    it('a fragment query carries the anchors it joins against', () => {
        const plan = compiled(diabetesCriteria());
        const sql = buildFragmentQuery(plan, 'I03');

        expect(sql?.startsWith('WITH\nanchor_first_t2d AS (')).toBe(true);
        expect(sql?.endsWith('SELECT subject_id FROM p_I03')).toBe(true);
        expect(buildFragmentQuery(plan, 'N01')).toBeNull();
    });
});
