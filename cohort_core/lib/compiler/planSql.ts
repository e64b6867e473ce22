import { anchorName, renderWith, sqlNumber, sqlString } from './sqlText';
import type { PlanAnchor, PlanFragment, QueryPlan } from './types';

export const BASE_CTE = 'base_population';
export const INCLUDED_CTE = 'included_subjects';
export const EXCLUDED_CTE = 'excluded_subjects';
export const FINAL_CTE = 'final_cohort';

export interface PlanStructure {
    baseSql: string;
    anchors: readonly PlanAnchor[];
    fragments: readonly PlanFragment[];
    indexAnchor: string | null;
}

interface Cte {
    name: string;
    body: string;
}

export function structureOf(plan: QueryPlan): PlanStructure {
    return {
        baseSql: plan.sql.base,
        anchors: plan.anchors,
        fragments: plan.fragments,
        indexAnchor: plan.indexAnchor,
    };
}

/**
 * CTEs the given fragments need, in plan order: the base population, the anchors they
 * join against (and the index anchor when asked for), then the fragments themselves.
 */
function dependencyCtes(structure: PlanStructure, fragments: readonly PlanFragment[], withIndexAnchor: boolean): Cte[] {
    const wanted = new Set<string>(fragments.flatMap((fragment) => fragment.anchors));
    if (withIndexAnchor && structure.indexAnchor !== null) {
        wanted.add(anchorName(structure.indexAnchor));
    }

    let grew = true;
    while (grew) {
        grew = false;
        for (const anchor of structure.anchors) {
            if (!wanted.has(anchor.cteName)) {
                continue;
            }
            for (const upstream of anchor.upstream) {
                if (!wanted.has(upstream)) {
                    wanted.add(upstream);
                    grew = true;
                }
            }
        }
    }

    const fragmentNames = new Set(fragments.map((fragment) => fragment.name));
    return [
        { name: BASE_CTE, body: structure.baseSql },
        ...structure.anchors
            .filter((anchor) => wanted.has(anchor.cteName))
            .map((anchor) => ({ name: anchor.cteName, body: anchor.sql })),
        ...structure.fragments
            .filter((fragment) => fragmentNames.has(fragment.name))
            .map((fragment) => ({ name: fragment.name, body: fragment.sql })),
    ];
}

function combinationCtes(inclusion: readonly PlanFragment[], exclusion: readonly PlanFragment[]): Cte[] {
    const included = [`SELECT subject_id FROM ${BASE_CTE}`, ...inclusion.map((fragment) => `SELECT subject_id FROM ${fragment.name}`)]
        .join('\nINTERSECT\n');
    const excluded = exclusion.length > 0
        ? exclusion.map((fragment) => `SELECT subject_id FROM ${fragment.name}`).join('\nUNION\n')
        : `SELECT subject_id FROM ${BASE_CTE} WHERE 0`;

    return [
        { name: INCLUDED_CTE, body: included },
        { name: EXCLUDED_CTE, body: excluded },
        { name: FINAL_CTE, body: `SELECT subject_id FROM ${INCLUDED_CTE}\nEXCEPT\nSELECT subject_id FROM ${EXCLUDED_CTE}` },
    ];
}

function fullCohortCtes(structure: PlanStructure): Cte[] {
    const inclusion = structure.fragments.filter((fragment) => fragment.polarity === 'inclusion');
    const exclusion = structure.fragments.filter((fragment) => fragment.polarity === 'exclusion');
    return [
        ...dependencyCtes(structure, structure.fragments, true),
        ...combinationCtes(inclusion, exclusion),
    ];
}

/** Final cohort with the index date of every subject, ordered by subject id. */
export function buildCohortSql(structure: PlanStructure): string {
    const indexJoin = structure.indexAnchor === null
        ? null
        : `LEFT JOIN ${anchorName(structure.indexAnchor)} ia ON ia.subject_id = f.subject_id`;
    const select = [
        `SELECT f.subject_id, ${indexJoin ? 'ia.anchor_date' : 'NULL'} AS index_date`,
        `FROM ${FINAL_CTE} f`,
        ...(indexJoin ? [indexJoin] : []),
        'ORDER BY f.subject_id',
    ].join('\n');
    return renderWith(fullCohortCtes(structure), select);
}

export function buildCountSql(structure: PlanStructure): string {
    return renderWith(fullCohortCtes(structure), `SELECT COUNT(*) AS n FROM ${FINAL_CTE}`);
}

/**
 * Parallel attrition query: one count per step, reusing the fragment CTE names.
 * Ids without a compiled fragment are left out.
 */
export function buildFunnelSql(structure: PlanStructure, enabledIds: Iterable<string>): string {
    const enabled = new Set(enabledIds);
    const fragments = structure.fragments.filter((fragment) => enabled.has(fragment.predicateId));
    const inclusion = fragments.filter((fragment) => fragment.polarity === 'inclusion');
    const exclusion = fragments.filter((fragment) => fragment.polarity === 'exclusion');

    const ctes = dependencyCtes(structure, fragments, false);
    ctes.push({ name: 'step_0', body: `SELECT subject_id FROM ${BASE_CTE}` });
    inclusion.forEach((fragment, index) => {
        ctes.push({
            name: `step_${index + 1}`,
            body: `SELECT subject_id FROM step_${index}\nINTERSECT\nSELECT subject_id FROM ${fragment.name}`,
        });
    });

    const counts = [`SELECT 0 AS step_order, 'base' AS step_key, COUNT(*) AS n FROM step_0`];
    inclusion.forEach((fragment, index) => {
        counts.push(`SELECT ${sqlNumber(index + 1)}, ${sqlString(fragment.predicateId)}, COUNT(*) FROM step_${index + 1}`);
    });

    if (fragments.length > 0) {
        const last = `step_${inclusion.length}`;
        if (exclusion.length > 0) {
            ctes.push({
                name: 'funnel_excluded',
                body: exclusion.map((fragment) => `SELECT subject_id FROM ${fragment.name}`).join('\nUNION\n'),
            });
            ctes.push({ name: 'funnel_final', body: `SELECT subject_id FROM ${last}\nEXCEPT\nSELECT subject_id FROM funnel_excluded` });
        } else {
            ctes.push({ name: 'funnel_final', body: `SELECT subject_id FROM ${last}` });
        }
        counts.push(`SELECT ${sqlNumber(inclusion.length + 1)}, 'final', COUNT(*) FROM funnel_final`);
    }

    return renderWith(ctes, `${counts.join('\nUNION ALL\n')}\nORDER BY step_order`);
}

export function buildBaseQuery(plan: QueryPlan): string {
    return plan.sql.base;
}

export function buildCountQuery(plan: QueryPlan): string {
    return plan.sql.count;
}

export function buildPreviewQuery(plan: QueryPlan, limit: number): string {
    return `${plan.sql.cohort}\nLIMIT ${sqlNumber(Math.max(0, Math.trunc(limit)))}`;
}

export function buildFunnelQuery(plan: QueryPlan, enabledIds: Iterable<string>): string {
    return buildFunnelSql(structureOf(plan), enabledIds);
}

/** Stand-alone query returning the subject ids of one compiled fragment. */
export function buildFragmentQuery(plan: QueryPlan, predicateId: string): string | null {
    const fragment = plan.fragments.find((entry) => entry.predicateId === predicateId);
    if (!fragment) {
        return null;
    }
    const ctes = dependencyCtes(structureOf(plan), [fragment], false).filter((cte) => cte.name !== BASE_CTE);
    return renderWith(ctes, `SELECT subject_id FROM ${fragment.name}`);
}
