import { getDomainMapping, subjectColumnFor } from '../catalog/catalogLookup';
import type { CatalogSchema, DomainMapping, PopulationMapping } from '../catalog/types';
import { requiresConceptResolution } from '../criteria/criteriaSet';
import type { ComparisonOperator, CountConstraint, MatchingLogic, NumericRange, Predicate, TemporalWindow, ValueConstraint } from '../criteria/types';
import { findUnitProfile, normalizedUnitKey, toStandardUnit } from '../units/unitConversions';
import type { UnitProfile } from '../units/unitConversions';
import type { CompileErrorKind } from './errors';
import { anchorName, dateShift, indent, sqlNumber, sqlString, sqlStringList } from './sqlText';
import type { ColumnReference } from './types';

const EVENT_ALIAS = 't';

export interface PredicateSource {
    predicate: Predicate;
    mapping: DomainMapping;
    subjectColumn: string;
    references: readonly ColumnReference[];
    /** Demographic column picked from the concept label. */
    demographicColumn: string | null;
    unitProfile: UnitProfile | null;
}

export type SourceOutcome =
    | { ok: true; source: PredicateSource }
    | { ok: false; kind: CompileErrorKind; message: string };

/**
 * Picks the mapped table and columns a predicate compiles against and lists every
 * column it will reference. Nothing here checks that the columns exist.
 */
export function planPredicateSource(predicate: Predicate, catalog: CatalogSchema): SourceOutcome {
    const mapping = getDomainMapping(catalog, predicate.domain);
    if (!mapping) {
        return missing(`No catalog mapping for domain "${predicate.domain}".`);
    }

    const subjectColumn = subjectColumnFor(catalog, mapping);
    const references: ColumnReference[] = [{ table: mapping.table, column: subjectColumn }];
    const use = (column: string) => references.push({ table: mapping.table, column });
    let demographicColumn: string | null = null;
    let unitProfile: UnitProfile | null = null;

    if (predicate.domain === 'demographic') {
        demographicColumn = findDemographicColumn(predicate.concept, mapping);
        if (demographicColumn === null) {
            return missing(`No demographic column matches concept "${predicate.concept}".`);
        }
        use(demographicColumn);
    } else if (predicate.domain === 'enrollment') {
        if (!mapping.startColumn || !mapping.endColumn) {
            return missing('Enrollment mapping needs start and end columns.');
        }
        use(mapping.startColumn);
        use(mapping.endColumn);
    } else {
        if (requiresConceptResolution(predicate)) {
            const logic = matchingLogicOf(predicate);
            if (logic === 'ingredient') {
                if (!mapping.ingredientColumn) {
                    return missing(`Domain "${predicate.domain}" has no ingredient column for ingredient matching.`);
                }
                use(mapping.ingredientColumn);
            } else {
                if (mapping.codeColumns.length === 0) {
                    return missing(`Domain "${predicate.domain}" has no code columns.`);
                }
                mapping.codeColumns.forEach(use);
                if (logic === 'hierarchy') {
                    if (!mapping.reference) {
                        return missing(`Domain "${predicate.domain}" has no reference table for hierarchy matching.`);
                    }
                    references.push({ table: mapping.reference.table, column: mapping.reference.codeColumn });
                }
            }
        }

        const needsDate = predicate.temporalWindow !== undefined || predicate.countConstraint?.withinDays !== undefined;
        if (needsDate && !mapping.dateColumn) {
            return missing(`Domain "${predicate.domain}" has no event date column for temporal filters.`);
        }
        if (mapping.dateColumn) {
            use(mapping.dateColumn);
        }

        if (predicate.valueConstraint) {
            if (!mapping.valueColumn) {
                return missing(`Domain "${predicate.domain}" has no value column for value constraints.`);
            }
            use(mapping.valueColumn);
            if (mapping.unitColumn) {
                use(mapping.unitColumn);
                unitProfile = findUnitProfile(predicate.concept);
            }

            const unit = predicate.valueConstraint.unit;
            if (unitProfile && unit !== undefined && toStandardUnit(unitProfile, 0, unit) === null) {
                return {
                    ok: false,
                    kind: 'unsupported_unit',
                    message: `Unit "${unit}" cannot be converted to ${unitProfile.standardUnit} for ${unitProfile.test}.`,
                };
            }
        }
    }

    if (predicate.temporalWindow?.during === 'enrollment') {
        const population = catalog.population;
        if (!population.enrollmentStartColumn || !population.enrollmentEndColumn) {
            return missing('Population has no enrollment columns for the enrollment period.');
        }
        references.push(
            { table: population.table, column: population.subjectColumn },
            { table: population.table, column: population.enrollmentStartColumn },
            { table: population.table, column: population.enrollmentEndColumn },
        );
    }

    return {
        ok: true,
        source: { predicate, mapping, subjectColumn, references, demographicColumn, unitProfile },
    };
}

/** Body of the `p_<id>` CTE: DISTINCT subject_id of subjects satisfying the predicate. */
export function buildFragmentSql(source: PredicateSource, population: PopulationMapping): string {
    const { predicate } = source;
    if (predicate.domain === 'demographic') {
        return buildDemographicSql(source);
    }
    if (predicate.domain === 'enrollment') {
        return buildEnrollmentSql(source);
    }

    const count = predicate.countConstraint;
    if (!count) {
        const rows = buildQualifyingRows(source, population, { matchFlag: false, firstDate: false });
        return `SELECT DISTINCT q.subject_id\nFROM (\n${indent(rows)}\n) q`;
    }

    const matchFlag = count.proportion !== undefined;
    const firstDate = count.withinDays !== undefined;
    const rows = buildQualifyingRows(source, population, { matchFlag, firstDate });
    const lines = [
        'SELECT q.subject_id',
        `FROM (\n${indent(rows)}\n) q`,
    ];
    if (count.withinDays !== undefined) {
        lines.push(`WHERE julianday(q.event_date) - julianday(q.first_date) BETWEEN 0 AND ${sqlNumber(count.withinDays)}`);
    }
    lines.push('GROUP BY q.subject_id');
    lines.push(`HAVING ${countHaving(count, 'q')}`);
    return lines.join('\n');
}

/**
 * Qualifying events of an event-domain predicate as `(subject_id, event_date)` rows.
 * First-event anchors take the earliest of these per subject.
 */
export function buildQualifyingRows(
    source: PredicateSource,
    population: PopulationMapping,
    options: { matchFlag: boolean; firstDate: boolean },
): string {
    const { predicate, mapping } = source;
    const filter = codeFilter(predicate, mapping);
    const value = predicate.valueConstraint ? valueExpression(source) : null;

    const eventColumns = [
        `${EVENT_ALIAS}.${source.subjectColumn} AS subject_id`,
        mapping.dateColumn ? `date(${EVENT_ALIAS}.${mapping.dateColumn}) AS event_date` : 'NULL AS event_date',
    ];
    if (value) {
        eventColumns.push(`${value.expression} AS event_value`);
    }
    if (options.matchFlag) {
        eventColumns.push(`CASE WHEN ${filter} THEN 1 ELSE 0 END AS is_match`);
    }

    const eventWhere = options.matchFlag ? domainPresence(mapping) : filter;
    const events = [
        `SELECT ${eventColumns.join(', ')}`,
        `FROM ${mapping.table} ${EVENT_ALIAS}`,
        `WHERE ${eventWhere}`,
    ].join('\n');

    const select = ['ev.subject_id', 'ev.event_date'];
    if (options.matchFlag) {
        select.push('ev.is_match');
    }
    if (options.firstDate) {
        select.push(options.matchFlag
            ? 'MIN(CASE WHEN ev.is_match = 1 THEN ev.event_date END) OVER (PARTITION BY ev.subject_id) AS first_date'
            : 'MIN(ev.event_date) OVER (PARTITION BY ev.subject_id) AS first_date');
    }

    const joins: string[] = [];
    const conditions: string[] = [];
    const window = predicate.temporalWindow;
    if (window) {
        if (window.during === 'enrollment') {
            joins.push(`JOIN ${population.table} pop ON pop.${population.subjectColumn} = ev.subject_id`);
            conditions.push(`ev.event_date BETWEEN date(pop.${population.enrollmentStartColumn ?? ''}) AND date(pop.${population.enrollmentEndColumn ?? ''})`);
        } else {
            joins.push(`JOIN ${anchorName(window.reference)} a ON a.subject_id = ev.subject_id`);
            conditions.push(...eventWindowConditions(window, 'ev.event_date', 'a.anchor_date'));
        }
    }
    if (value) {
        conditions.push(comparison('ev.event_value', value.constraint));
    }

    const lines = [
        `SELECT ${select.join(', ')}`,
        `FROM (\n${indent(events)}\n) ev`,
        ...joins,
    ];
    if (conditions.length > 0) {
        lines.push(`WHERE ${conditions.join('\n  AND ')}`);
    }
    return lines.join('\n');
}

function buildDemographicSql(source: PredicateSource): string {
    const { predicate, mapping } = source;
    const column = `${EVENT_ALIAS}.${source.demographicColumn ?? ''}`;
    const condition = predicate.valueConstraint
        ? comparison(column, predicate.valueConstraint)
        : columnCodeCondition(column, codeValuesOf(predicate), matchingLogicOf(predicate));

    return [
        `SELECT DISTINCT ${EVENT_ALIAS}.${source.subjectColumn} AS subject_id`,
        `FROM ${mapping.table} ${EVENT_ALIAS}`,
        `WHERE ${condition}`,
    ].join('\n');
}

function buildEnrollmentSql(source: PredicateSource): string {
    const { predicate, mapping } = source;
    const start = `${EVENT_ALIAS}.${mapping.startColumn ?? ''}`;
    const end = `${EVENT_ALIAS}.${mapping.endColumn ?? ''}`;
    const lines = [
        `SELECT DISTINCT ${EVENT_ALIAS}.${source.subjectColumn} AS subject_id`,
        `FROM ${mapping.table} ${EVENT_ALIAS}`,
    ];
    const conditions = [`${start} IS NOT NULL`, `${end} IS NOT NULL`];

    const window = predicate.temporalWindow;
    if (window && window.during !== 'enrollment') {
        lines.push(`JOIN ${anchorName(window.reference)} a ON a.subject_id = ${EVENT_ALIAS}.${source.subjectColumn}`);
        conditions.push(...enrollmentCoverageConditions(window, start, end, 'a.anchor_date'));
    }
    if (predicate.valueConstraint) {
        conditions.push(comparison(`(julianday(${end}) - julianday(${start}))`, predicate.valueConstraint));
    }

    lines.push(`WHERE ${conditions.join('\n  AND ')}`);
    return lines.join('\n');
}

/**
 * Event date inside the window around the anchor. A one-sided window is closed at the
 * anchor itself; baseline is strictly before the anchor and follow-up on or after it.
 */
export function eventWindowConditions(window: TemporalWindow, eventDate: string, anchorDate: string): string[] {
    const { beforeDays, afterDays } = window;
    const lower = beforeDays !== undefined ? `${eventDate} >= ${dateShift(anchorDate, -beforeDays)}` : null;
    const upper = afterDays !== undefined ? `${eventDate} <= ${dateShift(anchorDate, afterDays)}` : null;

    if (window.during === 'baseline') {
        return [`${eventDate} < date(${anchorDate})`, ...(lower ? [lower] : [])];
    }
    if (window.during === 'follow_up') {
        return [`${eventDate} >= date(${anchorDate})`, ...(upper ? [upper] : [])];
    }

    return [
        lower ?? `${eventDate} >= date(${anchorDate})`,
        upper ?? `${eventDate} <= date(${anchorDate})`,
    ];
}

/** Enrollment must span the look-back before the anchor and the look-forward after it. */
function enrollmentCoverageConditions(window: TemporalWindow, start: string, end: string, anchorDate: string): string[] {
    const conditions: string[] = [];
    const lookBack = window.beforeDays ?? (window.during === 'baseline' ? 0 : undefined);
    const lookForward = window.afterDays ?? (window.during === 'follow_up' ? 0 : undefined);
    if (lookBack !== undefined) {
        conditions.push(`date(${start}) <= ${dateShift(anchorDate, -lookBack)}`);
    }
    if (lookForward !== undefined) {
        conditions.push(`date(${end}) >= ${dateShift(anchorDate, lookForward)}`);
    }
    return conditions;
}

function codeFilter(predicate: Predicate, mapping: DomainMapping): string {
    const codes = codeValuesOf(predicate);
    const logic = matchingLogicOf(predicate);

    if (logic === 'ingredient') {
        const names = codes.map((code) => code.trim().toLowerCase()).filter((code) => code.length > 0);
        if (names.length === 0) {
            return '0';
        }
        return `LOWER(${EVENT_ALIAS}.${mapping.ingredientColumn ?? ''}) IN (${sqlStringList(names)})`;
    }

    if (logic === 'hierarchy' && mapping.reference) {
        const reference = mapping.reference;
        const roots = codes.map(stripWildcard).filter((code) => code.length > 0);
        if (roots.length === 0) {
            return '0';
        }
        const rootConditions = roots
            .map((root) => `r.${reference.codeColumn} = ${sqlString(root)} OR ${likePrefix(`r.${reference.codeColumn}`, root)}`)
            .join(' OR ');
        const descendants = `SELECT r.${reference.codeColumn} FROM ${reference.table} r WHERE ${rootConditions}`;
        return wrapOr(mapping.codeColumns.map((column) => `${EVENT_ALIAS}.${column} IN (${descendants})`));
    }

    return wrapOr(mapping.codeColumns.map((column) => columnCodeCondition(`${EVENT_ALIAS}.${column}`, codes, logic)));
}

/** Matches codes on one column: exact codes through IN, wildcard codes through LIKE. */
function columnCodeCondition(column: string, codes: readonly string[], logic: MatchingLogic): string {
    const exact: string[] = [];
    const prefixes: string[] = [];
    for (const raw of codes) {
        const code = raw.trim();
        if (logic === 'wildcard' || isWildcardCode(code)) {
            const prefix = stripWildcard(code);
            if (prefix.length > 0) {
                prefixes.push(prefix);
            }
        } else if (code.length > 0) {
            exact.push(code);
        }
    }

    const parts: string[] = [];
    if (exact.length > 0) {
        parts.push(`${column} IN (${sqlStringList(exact)})`);
    }
    parts.push(...prefixes.map((prefix) => likePrefix(column, prefix)));
    return parts.length === 0 ? '0' : wrapOr(parts);
}

/** Rows that belong to the domain at all; the denominator of a proportion. */
function domainPresence(mapping: DomainMapping): string {
    const columns = mapping.codeColumns.length > 0
        ? mapping.codeColumns
        : (mapping.ingredientColumn ? [mapping.ingredientColumn] : []);
    if (columns.length === 0) {
        return '1';
    }
    return wrapOr(columns.map((column) => `${EVENT_ALIAS}.${column} IS NOT NULL`));
}

function valueExpression(source: PredicateSource): { expression: string; constraint: ValueConstraint } | null {
    const constraint = source.predicate.valueConstraint;
    const valueColumn = source.mapping.valueColumn;
    if (!constraint || !valueColumn) {
        return null;
    }

    const raw = `${EVENT_ALIAS}.${valueColumn}`;
    const profile = source.unitProfile;
    const unitColumn = source.mapping.unitColumn;
    if (!profile || !unitColumn) {
        return { expression: raw, constraint };
    }

    const unitKey = `REPLACE(REPLACE(REPLACE(LOWER(${EVENT_ALIAS}.${unitColumn}), ' ', ''), 'μ', 'u'), 'µ', 'u')`;
    const cases = [
        `WHEN ${EVENT_ALIAS}.${unitColumn} IS NULL THEN ${raw}`,
        `WHEN ${unitKey} = ${sqlString(normalizedUnitKey(profile.standardUnit))} THEN ${raw}`,
        ...profile.alternatives.map((alternative) => {
            const scaled = `${raw} * ${sqlNumber(alternative.scale)}`;
            const converted = alternative.offset === 0 ? scaled : `${scaled} + ${sqlNumber(alternative.offset)}`;
            return `WHEN ${unitKey} = ${sqlString(normalizedUnitKey(alternative.unit))} THEN ${converted}`;
        }),
    ];

    return {
        expression: `CASE ${cases.join(' ')} ELSE NULL END`,
        constraint: toStandardConstraint(constraint, profile),
    };
}

function toStandardConstraint(constraint: ValueConstraint, profile: UnitProfile): ValueConstraint {
    const unit = constraint.unit;
    if (unit === undefined) {
        return constraint;
    }
    const convert = (value: number) => toStandardUnit(profile, value, unit) ?? value;
    if (constraint.operator === 'between') {
        return { operator: 'between', value: [convert(constraint.value[0]), convert(constraint.value[1])], unit: profile.standardUnit };
    }
    return { operator: constraint.operator, value: convert(constraint.value), unit: profile.standardUnit };
}

function countHaving(count: CountConstraint, alias: string): string {
    const total = count.operator === 'between'
        ? comparison('COUNT(*)', { operator: 'between', value: count.count })
        : comparison('COUNT(*)', { operator: count.operator, value: count.count });
    if (count.proportion === undefined) {
        return total;
    }
    // matching >= ceil(p * total) holds exactly when matching * denominator >= numerator * total.
    const { numerator, denominator } = decimalFraction(count.proportion);
    return `SUM(${alias}.is_match) * ${denominator} >= ${numerator} * COUNT(*)\n   AND ${total}`;
}

/** Exact `numerator / denominator` form of a decimal as integer literals, read off its shortest decimal text. */
function decimalFraction(value: number): { numerator: string; denominator: string } {
    const match = /^(\d+)(?:\.(\d+))?(?:e([+-]?\d+))?$/.exec(String(value));
    if (!match) {
        throw new RangeError(`Cannot express ${value} as a decimal fraction.`);
    }
    const [, whole, fraction = '', exponent = '0'] = match;
    const scale = fraction.length - Number(exponent);
    const digits = `${whole}${fraction}`.replace(/^0+(?=\d)/, '');
    if (scale <= 0) {
        return { numerator: `${digits}${'0'.repeat(-scale)}`, denominator: '1' };
    }
    return { numerator: digits, denominator: `1${'0'.repeat(scale)}` };
}

type Comparison =
    | { operator: Exclude<ComparisonOperator, 'between'>; value: number }
    | { operator: 'between'; value: NumericRange };

export function comparison(expression: string, condition: Comparison): string {
    if (condition.operator === 'between') {
        return `${expression} BETWEEN ${sqlNumber(condition.value[0])} AND ${sqlNumber(condition.value[1])}`;
    }
    return `${expression} ${condition.operator} ${sqlNumber(condition.value)}`;
}

function likePrefix(column: string, prefix: string): string {
    const escaped = prefix.replace(/[\\%_]/g, (char) => `\\${char}`);
    const pattern = sqlString(`${escaped}%`);
    return escaped === prefix ? `${column} LIKE ${pattern}` : `${column} LIKE ${pattern} ESCAPE '\\'`;
}

function wrapOr(parts: readonly string[]): string {
    if (parts.length === 0) {
        return '0';
    }
    return parts.length === 1 ? parts[0] : `(${parts.join(' OR ')})`;
}

function isWildcardCode(code: string): boolean {
    return code.endsWith('*') || code.endsWith('%');
}

export function stripWildcard(code: string): string {
    return code.trim().replace(/[*%.]+$/, '');
}

function matchingLogicOf(predicate: Predicate): MatchingLogic {
    return predicate.conceptResolution?.matchingLogic ?? 'exact';
}

function codeValuesOf(predicate: Predicate): readonly string[] {
    return predicate.conceptResolution?.codeValues ?? [];
}

function findDemographicColumn(concept: string, mapping: DomainMapping): string | null {
    const normalized = concept.toLowerCase();
    const entries = Object.entries(mapping.conceptColumns ?? {})
        .sort((left, right) => right[0].length - left[0].length);
    const match = entries.find(([keyword]) => new RegExp(`(^|[^a-z0-9])${keyword.toLowerCase()}([^a-z0-9]|$)`).test(normalized));
    return match ? match[1] : null;
}

function missing(message: string): SourceOutcome {
    return { ok: false, kind: 'missing_catalog_mapping', message };
}
