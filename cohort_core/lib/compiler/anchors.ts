import { catalogHasColumn } from '../catalog/catalogLookup';
import type { CatalogSchema } from '../catalog/types';
import { findPredicate, hasUsableResolution } from '../criteria/criteriaSet';
import type { AnchorRule, CriteriaSet } from '../criteria/types';
import { buildQualifyingRows, planPredicateSource } from './predicateSql';
import { anchorName, dateShift, indent } from './sqlText';
import type { ColumnReference, PlanAnchor } from './types';

export type AnchorOutcome =
    | { ok: true; anchor: PlanAnchor }
    | { ok: false; message: string };

/**
 * Compiles one anchor rule into a CTE body yielding `(subject_id, anchor_date)`,
 * one row per subject.
 */
export function compileAnchor(rule: AnchorRule, set: CriteriaSet, catalog: CatalogSchema): AnchorOutcome {
    const population = catalog.population;

    if (rule.kind === 'enrollment_start') {
        const start = population.enrollmentStartColumn;
        if (!start) {
            return { ok: false, message: `Anchor "${rule.name}" needs an enrollment start column on ${population.table}.` };
        }
        const references = [
            { table: population.table, column: population.subjectColumn },
            { table: population.table, column: start },
        ];
        const sql = [
            `SELECT e.${population.subjectColumn} AS subject_id, MIN(date(e.${start})) AS anchor_date`,
            `FROM ${population.table} e`,
            `WHERE e.${start} IS NOT NULL`,
            `GROUP BY e.${population.subjectColumn}`,
        ].join('\n');
        return checked(rule, sql, references, catalog, []);
    }

    if (rule.kind === 'column') {
        const subjectColumn = rule.subjectColumn ?? population.subjectColumn;
        const references = [
            { table: rule.table, column: subjectColumn },
            { table: rule.table, column: rule.column },
        ];
        const sql = [
            `SELECT c.${subjectColumn} AS subject_id, MIN(date(c.${rule.column})) AS anchor_date`,
            `FROM ${rule.table} c`,
            `WHERE c.${rule.column} IS NOT NULL`,
            `GROUP BY c.${subjectColumn}`,
        ].join('\n');
        return checked(rule, sql, references, catalog, []);
    }

    const predicate = findPredicate(set, rule.predicateId);
    if (!predicate) {
        return { ok: false, message: `Anchor "${rule.name}" references unknown predicate "${rule.predicateId}".` };
    }
    if (predicate.domain === 'demographic' || predicate.domain === 'enrollment') {
        return { ok: false, message: `Anchor "${rule.name}" needs an event predicate; "${predicate.id}" is ${predicate.domain}.` };
    }
    if (predicate.verifiability === 'non_rwd' || predicate.needsDefinition || !hasUsableResolution(predicate)) {
        return { ok: false, message: `Anchor "${rule.name}" references predicate "${predicate.id}", which cannot be compiled.` };
    }

    const windowAnchor = predicate.temporalWindow?.reference;
    if (windowAnchor !== undefined && predicate.temporalWindow?.during !== 'enrollment') {
        const upstream = set.anchorRules.find((candidate) => candidate.name === windowAnchor);
        if (upstream?.kind === 'first_event') {
            return { ok: false, message: `Anchor "${rule.name}" cannot chain first-event anchors through "${predicate.id}".` };
        }
    }

    const outcome = planPredicateSource(predicate, catalog);
    if (!outcome.ok) {
        return { ok: false, message: `Anchor "${rule.name}": ${outcome.message}` };
    }
    if (!outcome.source.mapping.dateColumn) {
        return { ok: false, message: `Anchor "${rule.name}" needs an event date for domain "${predicate.domain}".` };
    }

    const rows = buildQualifyingRows(outcome.source, population, { matchFlag: false, firstDate: false });
    const sql = [
        `SELECT fe.subject_id, ${dateShift('MIN(fe.event_date)', rule.offsetDays ?? 0)} AS anchor_date`,
        `FROM (\n${indent(rows)}\n) fe`,
        'GROUP BY fe.subject_id',
    ].join('\n');
    return checked(rule, sql, outcome.source.references, catalog, upstreamAnchors(rule, set).map(anchorName));
}

/** Anchor CTE names a first-event anchor body joins against. */
export function upstreamAnchors(rule: AnchorRule, set: CriteriaSet): string[] {
    if (rule.kind !== 'first_event') {
        return [];
    }
    const window = findPredicate(set, rule.predicateId)?.temporalWindow;
    return window && window.during !== 'enrollment' ? [window.reference] : [];
}

function checked(
    rule: AnchorRule,
    sql: string,
    references: readonly ColumnReference[],
    catalog: CatalogSchema,
    upstream: readonly string[],
): AnchorOutcome {
    const absent = references.filter((reference) => !catalogHasColumn(catalog, reference.table, reference.column));
    if (absent.length > 0) {
        const names = absent.map((reference) => `${reference.table}.${reference.column}`).join(', ');
        return { ok: false, message: `Anchor "${rule.name}" references missing columns: ${names}.` };
    }
    return {
        ok: true,
        anchor: {
            name: rule.name,
            cteName: anchorName(rule.name),
            kind: rule.kind,
            sql,
            upstream,
            references,
        },
    };
}
