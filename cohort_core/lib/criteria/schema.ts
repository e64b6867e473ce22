import { z } from 'zod';
import { CODE_SYSTEMS, CONFIDENCE_LEVELS, MATCHING_LOGIC, NAMED_PERIODS, GAP_KINDS, PREDICATE_DOMAINS } from './types';

// Predicate ids and anchor names end up inside CTE names, so they stay identifier-safe.
const IDENTIFIER_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;
const SQL_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const identifier = z.string().regex(IDENTIFIER_PATTERN, 'must start with a letter and contain only letters, digits and underscores');
const sqlName = z.string().regex(SQL_NAME_PATTERN, 'must be a plain SQL identifier');
const dayCount = z.number().int().nonnegative();
const comparison = z.enum(['>=', '<=', '>', '<', '=']);

const orderedRange = z
    .tuple([z.number(), z.number()])
    .refine(([low, high]) => low <= high, { message: 'between range must be ordered as [low, high] with low <= high' });

export const AlternativeResolutionSchema = z.object({
    codeValues: z.array(z.string().min(1)),
    description: z.string(),
    confidence: z.enum(CONFIDENCE_LEVELS),
    matchingLogic: z.enum(MATCHING_LOGIC).optional(),
});

export const ConceptResolutionSchema = z.object({
    resolved: z.boolean(),
    codeSystem: z.enum(CODE_SYSTEMS),
    codeValues: z.array(z.string().min(1)),
    matchingLogic: z.enum(MATCHING_LOGIC),
    confidence: z.enum(CONFIDENCE_LEVELS),
    alternatives: z.array(AlternativeResolutionSchema).optional(),
    notes: z.string().optional(),
});

export const TemporalWindowSchema = z
    .object({
        reference: identifier,
        beforeDays: dayCount.optional(),
        afterDays: dayCount.optional(),
        during: z.enum(NAMED_PERIODS).optional(),
    })
    .refine(
        (window) => window.beforeDays !== undefined || window.afterDays !== undefined || window.during !== undefined,
        { message: 'temporal window needs beforeDays, afterDays or during' },
    );

export const ValueConstraintSchema = z.union([
    z.object({ operator: comparison, value: z.number(), unit: z.string().optional() }),
    z.object({ operator: z.literal('between'), value: orderedRange, unit: z.string().optional() }),
]);

const proportion = z
    .number()
    .refine((value) => value > 0 && value <= 1, { message: 'proportion must be in (0, 1]' });

export const CountConstraintSchema = z.union([
    z.object({
        operator: comparison,
        count: z.number().int().nonnegative(),
        withinDays: dayCount.optional(),
        proportion: proportion.optional(),
    }),
    z.object({
        operator: z.literal('between'),
        count: orderedRange,
        withinDays: dayCount.optional(),
        proportion: proportion.optional(),
    }),
]);

export const PredicateSchema = z.object({
    id: identifier,
    polarity: z.enum(['inclusion', 'exclusion']),
    domain: z.enum(PREDICATE_DOMAINS),
    concept: z.string().min(1),
    description: z.string().optional(),
    conceptResolution: ConceptResolutionSchema.optional(),
    temporalWindow: TemporalWindowSchema.optional(),
    valueConstraint: ValueConstraintSchema.optional(),
    countConstraint: CountConstraintSchema.optional(),
    verifiability: z.enum(['rwd', 'partial_rwd', 'non_rwd']),
    needsDefinition: z.boolean().default(false),
    candidateDefinitions: z.array(z.string()).optional(),
});

export const GapSchema = z.object({
    predicateId: z.string().min(1),
    kind: z.enum(GAP_KINDS),
    issue: z.string().min(1),
    proposedResolution: z.string().optional(),
    requiresUserInput: z.boolean(),
});

export const AnchorRuleSchema = z.discriminatedUnion('kind', [
    z.object({ name: identifier, kind: z.literal('enrollment_start'), description: z.string().optional() }),
    z.object({
        name: identifier,
        kind: z.literal('column'),
        table: sqlName,
        column: sqlName,
        subjectColumn: sqlName.optional(),
        description: z.string().optional(),
    }),
    z.object({
        name: identifier,
        kind: z.literal('first_event'),
        predicateId: identifier,
        offsetDays: z.number().int().optional(),
        description: z.string().optional(),
    }),
]);

export const CriteriaSetSchema = z
    .object({
        studyId: z.string().min(1),
        version: z.number().int().positive().default(1),
        predicates: z.array(PredicateSchema),
        anchorRules: z.array(AnchorRuleSchema).default([]),
        indexAnchor: identifier.nullable().optional(),
        gaps: z.array(GapSchema).default([]),
    })
    .superRefine((set, ctx) => {
        const predicateIds = new Set<string>();
        set.predicates.forEach((predicate, index) => {
            if (predicateIds.has(predicate.id)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['predicates', index, 'id'],
                    message: `duplicate predicate id "${predicate.id}"`,
                });
            }
            predicateIds.add(predicate.id);
        });

        const anchorNames = new Map<string, string>();
        set.anchorRules.forEach((rule, index) => {
            if (anchorNames.has(rule.name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['anchorRules', index, 'name'],
                    message: `duplicate anchor rule "${rule.name}"`,
                });
            }
            anchorNames.set(rule.name, rule.kind);

            if (rule.kind === 'first_event' && !predicateIds.has(rule.predicateId)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['anchorRules', index, 'predicateId'],
                    message: `anchor "${rule.name}" references unknown predicate "${rule.predicateId}"`,
                });
            }
        });

        set.predicates.forEach((predicate, index) => {
            const reference = predicate.temporalWindow?.reference;
            if (reference === undefined) {
                return;
            }

            const kind = anchorNames.get(reference);
            if (kind === undefined) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['predicates', index, 'temporalWindow', 'reference'],
                    message: `unknown anchor "${reference}"`,
                });
                return;
            }

            const anchoredOnItself = set.anchorRules.some(
                (rule) => rule.kind === 'first_event' && rule.name === reference && rule.predicateId === predicate.id,
            );
            if (anchoredOnItself) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['predicates', index, 'temporalWindow', 'reference'],
                    message: `predicate "${predicate.id}" cannot be windowed on its own first event`,
                });
            }
        });

        if (typeof set.indexAnchor === 'string' && !anchorNames.has(set.indexAnchor)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['indexAnchor'],
                message: `index anchor "${set.indexAnchor}" is not an anchor rule`,
            });
        }

        set.gaps.forEach((gap, index) => {
            if (!predicateIds.has(gap.predicateId)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['gaps', index, 'predicateId'],
                    message: `gap references unknown predicate "${gap.predicateId}"`,
                });
            }
        });
    });

export type CriteriaSetInput = z.input<typeof CriteriaSetSchema>;
