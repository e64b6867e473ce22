import { catalogHasColumn } from '../catalog/catalogLookup';
import type { CatalogSchema } from '../catalog/types';
import { gapsFor, hasUsableResolution } from '../criteria/criteriaSet';
import type { AnchorRule, CriteriaSet, Gap, GapKind, Predicate } from '../criteria/types';
import { buildCanonicalHash } from '../identity/canonicalHash';
import { deepFreeze } from '../utils/deepFreeze';
import { compileAnchor, upstreamAnchors } from './anchors';
import { CriteriaCompileError } from './errors';
import type { CompileErrorDetail, CompileErrorKind } from './errors';
import { buildCohortSql, buildCountSql, buildFunnelSql } from './planSql';
import type { PlanStructure } from './planSql';
import { buildFragmentSql, planPredicateSource } from './predicateSql';
import type { PredicateSource } from './predicateSql';
import { anchorName, fragmentName } from './sqlText';
import type { CompileOptions, CompileResult, PlanAnchor, PlanFragment, QueryPlan } from './types';

const ERROR_PRIORITY: readonly CompileErrorKind[] = [
    'unresolved_required_predicate',
    'missing_catalog_mapping',
    'unsupported_unit',
    'invalid_anchor',
];

const ERROR_LABELS: Record<CompileErrorKind, string> = {
    unresolved_required_predicate: 'Unresolved required predicates',
    missing_catalog_mapping: 'Missing catalog mappings',
    unsupported_unit: 'Unsupported units',
    invalid_anchor: 'Invalid anchors',
};

/**
 * Compiles a CriteriaSet against a catalog into an immutable QueryPlan.
 *
 * Predicates that cannot be enforced (non_rwd, awaiting a definition, unresolved
 * partial_rwd, explicitly skipped, or demoted after a schema error) are left out of the
 * fragments and listed in `plan.gaps`. Alternatives on a resolution are never used here.
 */
export function compileQueryPlan(set: CriteriaSet, catalog: CatalogSchema, options: CompileOptions = {}): CompileResult {
    const details: CompileErrorDetail[] = [];
    const gaps: Gap[] = [];
    const demoted: Gap[] = [];
    const sources: PredicateSource[] = [];
    const population = catalog.population;

    if (!catalogHasColumn(catalog, population.table, population.subjectColumn)) {
        details.push({
            predicateId: null,
            kind: 'missing_catalog_mapping',
            message: `Population table ${population.table}.${population.subjectColumn} is not in the catalog.`,
        });
    }

    for (const predicate of set.predicates) {
        const recorded = gapsFor(set, predicate.id);

        if (predicate.verifiability === 'non_rwd') {
            gaps.push(...pickGaps(recorded, 'non_rwd', () => autoGap(predicate, 'non_rwd', 'Not enforceable from the available data; kept for documentation.', false)));
            continue;
        }

        if (predicate.needsDefinition) {
            gaps.push(...pickGaps(recorded, 'needs_definition', () => autoGap(
                predicate,
                'needs_definition',
                'Clinically ambiguous; an operational definition is required before compilation.',
                true,
                predicate.candidateDefinitions?.[0],
            )));
            continue;
        }

        if (!hasUsableResolution(predicate)) {
            const required = predicate.verifiability === 'rwd';
            if (required && (predicate.polarity === 'exclusion' || recorded.length === 0)) {
                details.push({
                    predicateId: predicate.id,
                    kind: 'unresolved_required_predicate',
                    message: predicate.polarity === 'exclusion'
                        ? `Exclusion predicate ${predicate.id} (${predicate.concept}) must be resolved before compilation.`
                        : `Predicate ${predicate.id} (${predicate.concept}) has no resolved concept and is not marked as skipped.`,
                });
            } else {
                gaps.push(...(recorded.length > 0
                    ? recorded
                    : [autoGap(predicate, 'unresolved_concept', `Concept "${predicate.concept}" is not resolved to codes.`, true)]));
            }
            continue;
        }

        if (recorded.length > 0) {
            gaps.push(...recorded);
            continue;
        }

        const outcome = planPredicateSource(predicate, catalog);
        const problem = outcome.ok ? missingReferences(predicate, outcome.source, catalog) : outcome;
        if (problem === null) {
            if (outcome.ok) {
                sources.push(outcome.source);
            }
            continue;
        }

        if (options.demoteMissingReferences && problem.kind === 'missing_catalog_mapping') {
            const gap = autoGap(predicate, 'schema_demoted', `Demoted after a schema error: ${problem.message}`, true);
            gaps.push(gap);
            demoted.push(gap);
            continue;
        }
        details.push({ predicateId: predicate.id, kind: problem.kind, message: problem.message });
    }

    const anchors = compileAnchors(set, catalog, sources, details);

    if (details.length > 0) {
        return { ok: false, error: toCompileError(details) };
    }

    const fragments: PlanFragment[] = sources.map((source) => {
        const window = source.predicate.temporalWindow;
        return {
            name: fragmentName(source.predicate.id),
            predicateId: source.predicate.id,
            polarity: source.predicate.polarity,
            domain: source.predicate.domain,
            concept: source.predicate.concept,
            sql: buildFragmentSql(source, population),
            anchors: window && window.during !== 'enrollment' ? [anchorName(window.reference)] : [],
            references: source.references,
        };
    });

    const structure: PlanStructure = {
        baseSql: [
            `SELECT DISTINCT b.${population.subjectColumn} AS subject_id`,
            `FROM ${population.table} b`,
            `WHERE b.${population.subjectColumn} IS NOT NULL`,
        ].join('\n'),
        anchors,
        fragments,
        indexAnchor: set.indexAnchor,
    };

    const combination = {
        inclusion: fragments.filter((fragment) => fragment.polarity === 'inclusion').map((fragment) => fragment.name),
        exclusion: fragments.filter((fragment) => fragment.polarity === 'exclusion').map((fragment) => fragment.name),
        final: 'included_minus_excluded' as const,
    };

    const sql = {
        base: structure.baseSql,
        cohort: buildCohortSql(structure),
        count: buildCountSql(structure),
        funnel: buildFunnelSql(structure, fragments.map((fragment) => fragment.predicateId)),
    };

    const content = {
        studyId: set.studyId,
        criteriaVersion: set.version,
        population: { table: population.table, subjectColumn: population.subjectColumn },
        indexAnchor: set.indexAnchor,
        anchors,
        fragments,
        gaps,
        combination,
        sql,
    };

    const plan: QueryPlan = {
        planId: buildCanonicalHash(content),
        version: options.planVersion ?? 1,
        ...content,
    };

    return { ok: true, plan: deepFreeze(plan), demoted };
}

/**
 * Anchors referenced by compiled fragments or named as the index anchor, upstream
 * anchors first. Failures are reported against the predicates that use the anchor.
 */
function compileAnchors(
    set: CriteriaSet,
    catalog: CatalogSchema,
    sources: readonly PredicateSource[],
    details: CompileErrorDetail[],
): PlanAnchor[] {
    const users = new Map<string, string[]>();
    const use = (name: string, predicateId: string | null) => {
        const list = users.get(name) ?? [];
        if (predicateId !== null) {
            list.push(predicateId);
        }
        users.set(name, list);
    };

    for (const source of sources) {
        const window = source.predicate.temporalWindow;
        if (window && window.during !== 'enrollment') {
            use(window.reference, source.predicate.id);
        }
    }
    if (set.indexAnchor !== null) {
        use(set.indexAnchor, null);
    }

    const byName = new Map<string, AnchorRule>(set.anchorRules.map((rule) => [rule.name, rule]));
    let pending = Array.from(users.keys());
    while (pending.length > 0) {
        const next: string[] = [];
        for (const name of pending) {
            const rule = byName.get(name);
            if (!rule) {
                continue;
            }
            for (const upstream of upstreamAnchors(rule, set)) {
                if (!users.has(upstream)) {
                    next.push(upstream);
                }
                use(upstream, null);
            }
        }
        pending = next;
    }

    const ordered = set.anchorRules
        .filter((rule) => users.has(rule.name))
        .sort((left, right) => Number(left.kind === 'first_event') - Number(right.kind === 'first_event'));

    const anchors: PlanAnchor[] = [];
    for (const rule of ordered) {
        const outcome = compileAnchor(rule, set, catalog);
        if (outcome.ok) {
            anchors.push(outcome.anchor);
            continue;
        }
        const predicateIds = users.get(rule.name) ?? [];
        const involved = rule.kind === 'first_event' ? [...predicateIds, rule.predicateId] : predicateIds;
        if (involved.length === 0) {
            details.push({ predicateId: null, kind: 'invalid_anchor', message: outcome.message });
        }
        for (const predicateId of involved) {
            details.push({ predicateId, kind: 'invalid_anchor', message: outcome.message });
        }
    }
    return anchors;
}

function missingReferences(
    predicate: Predicate,
    source: PredicateSource,
    catalog: CatalogSchema,
): { kind: CompileErrorKind; message: string } | null {
    const absent = source.references.filter((reference) => !catalogHasColumn(catalog, reference.table, reference.column));
    if (absent.length === 0) {
        return null;
    }
    const names = Array.from(new Set(absent.map((reference) => `${reference.table}.${reference.column}`))).join(', ');
    return { kind: 'missing_catalog_mapping', message: `Predicate ${predicate.id} references columns missing from the catalog: ${names}.` };
}

function toCompileError(details: readonly CompileErrorDetail[]): CriteriaCompileError {
    const kind = ERROR_PRIORITY.find((candidate) => details.some((detail) => detail.kind === candidate)) ?? 'missing_catalog_mapping';
    const messages = Array.from(new Set(details.filter((detail) => detail.kind === kind).map((detail) => detail.message)));
    return new CriteriaCompileError(kind, `${ERROR_LABELS[kind]}: ${messages.join(' ')}`, details);
}

function pickGaps(recorded: readonly Gap[], kind: GapKind, fallback: () => Gap): Gap[] {
    const matching = recorded.filter((gap) => gap.kind === kind);
    return matching.length > 0 ? matching : [fallback()];
}

function autoGap(predicate: Predicate, kind: GapKind, issue: string, requiresUserInput: boolean, proposedResolution?: string): Gap {
    const gap: Gap = { predicateId: predicate.id, kind, issue, requiresUserInput };
    return proposedResolution === undefined ? gap : { ...gap, proposedResolution };
}
