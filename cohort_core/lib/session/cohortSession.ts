import { v4 as uuidv4 } from 'uuid';
import type { CatalogSchema } from '../catalog/types';
import { compileQueryPlan } from '../compiler/compileQueryPlan';
import { buildFunnelQuery } from '../compiler/planSql';
import type { QueryPlan } from '../compiler/types';
import { resolveWithTimeout } from '../concepts/resolveWithTimeout';
import { applyCriteriaEdits, createCriteriaSet } from '../criteria/criteriaSet';
import type { CriteriaEdit, CriteriaSet, Gap, GapKind, Predicate } from '../criteria/types';
import { isRepairable } from '../execution/classifyError';
import { DEFAULT_MAX_REPAIR_ATTEMPTS, runRepairLoop } from '../execution/repairLoop';
import { executePlan } from '../execution/executePlan';
import type { ExecutionMode, ExecutionResult, RepairAttempt, RepairOutcome } from '../execution/types';
import { computeFunnel } from '../funnel/computeFunnel';
import { FunnelComputeError } from '../funnel/errors';
import { FragmentCache } from '../funnel/fragmentCache';
import { StoreSubjectSource } from '../funnel/storeSubjectSource';
import type { FunnelReport } from '../funnel/types';
import { InMemoryRunLogSink, SessionRunLogger, toLogError } from '../runtime/runLogging';
import type { RunLogSink, SessionStage, TaskStatus } from '../runtime/runLogging';
import { SessionStateError } from './errors';
import { conceptsReady, pendingConceptPredicates } from './readiness';
import { APPROVAL_TOKENS, WAITING_STATES, canTransition, isApprovalToken } from './transitions';
import type { SessionState } from './transitions';
import type { CohortSessionOptions, PlanVersionSummary, ResultBundle, SessionError, StateTransition } from './types';

export const DEFAULT_RESOLVER_TIMEOUT_MS = 15_000;

/**
 * One cohort-building session: owns its CriteriaSet, the plan versions compiled from it,
 * the fragment cache of the current plan and the funnel. Every transition after
 * submission is derived from the CriteriaSet; skips live in its gaps.
 *
 * Sessions share nothing; two sessions over the same store keep separate caches.
 */
export class CohortSession {
    readonly sessionId: string;
    private readonly options: CohortSessionOptions;
    private readonly mode: ExecutionMode;
    private readonly maxRepairAttempts: number;
    private readonly logSink: RunLogSink;
    private logger: SessionRunLogger | null = null;

    private currentState: SessionState = 'collecting_criteria';
    private criteriaSet: CriteriaSet | null = null;
    private plan: QueryPlan | null = null;
    private cache: FragmentCache | null = null;
    private readonly planHistory: PlanVersionSummary[] = [];
    private execution: ExecutionResult | null = null;
    private repairAttempts: RepairAttempt[] = [];
    private enabledIds: string[] = [];
    private funnelReport: FunnelReport | null = null;
    private lastError: SessionError | null = null;
    private readonly transitions: StateTransition[] = [];

    constructor(options: CohortSessionOptions) {
        this.options = options;
        this.sessionId = options.sessionId ?? uuidv4();
        this.mode = options.mode ?? 'preview';
        this.maxRepairAttempts = Math.max(0, Math.trunc(options.maxRepairAttempts ?? DEFAULT_MAX_REPAIR_ATTEMPTS));
        this.logSink = options.logSink ?? new InMemoryRunLogSink();
    }

    get state(): SessionState {
        return this.currentState;
    }

    get criteria(): CriteriaSet | null {
        return this.criteriaSet;
    }

    get currentPlan(): QueryPlan | null {
        return this.plan;
    }

    async submitCriteria(input: unknown): Promise<ResultBundle> {
        this.assertState('submitCriteria', ['collecting_criteria']);
        const set = createCriteriaSet(input);

        this.criteriaSet = set;
        this.logger = new SessionRunLogger({ sink: this.logSink, sessionId: this.sessionId, studyId: set.studyId });
        await this.logTask('CRITERIA', 'criteria.submit', 'SUCCEEDED', `Criteria set ${set.studyId} v${set.version} submitted`, {
            predicates: set.predicates.length,
            anchorRules: set.anchorRules.length,
            gaps: set.gaps.length,
        });

        if (set.predicates.length > 0) {
            await this.transition('compiling_concepts', `Criteria set with ${set.predicates.length} predicates submitted`);
        }
        return this.getResultBundle();
    }

    /** Structures free text through the configured interpreter, then submits it. */
    async interpretCriteria(criteriaText: string, studyId: string): Promise<ResultBundle> {
        this.assertState('interpretCriteria', ['collecting_criteria']);
        const interpreter = this.options.interpreter;
        if (!interpreter) {
            throw new SessionStateError('MISSING_COLLABORATOR', 'No criteria interpreter is configured for this session.');
        }
        const set = await interpreter.interpret(criteriaText, { studyId });
        return this.submitCriteria(set);
    }

    /**
     * Resolves every predicate that still needs codes. Unresolved answers, timeouts and
     * resolver failures are recorded as gaps so the query can compile without them.
     */
    async resolveConcepts(): Promise<ResultBundle> {
        this.assertState('resolveConcepts', ['compiling_concepts']);
        const set = this.requireCriteria();
        const startedAt = Date.now();
        await this.logger?.writeStageStart({ stage: 'CONCEPTS', startedAt });

        const pending = pendingConceptPredicates(set);
        const edits: CriteriaEdit[] = [];
        for (const predicate of pending) {
            edits.push(...await this.resolvePredicate(predicate));
        }
        if (edits.length > 0) {
            this.criteriaSet = applyCriteriaEdits(set, edits);
        }

        const updated = this.requireCriteria();
        const newGaps = updated.gaps.filter((gap) => pending.some((predicate) => predicate.id === gap.predicateId));
        await this.logger?.writeStageTerminal({
            stage: 'CONCEPTS',
            status: 'SUCCEEDED',
            startedAt,
            endedAt: Date.now(),
            refs: {
                attempted: pending.map((predicate) => predicate.id),
                skipped: newGaps.map((gap) => `${gap.predicateId}:${gap.kind}`),
                criteriaVersion: updated.version,
            },
        });

        if (conceptsReady(updated)) {
            await this.transition('compiling_query', `Concepts ready (${pending.length} resolved or skipped)`);
        }
        return this.getResultBundle();
    }

    async compileQuery(): Promise<ResultBundle> {
        this.assertState('compileQuery', ['compiling_query']);
        const set = this.requireCriteria();
        const startedAt = Date.now();
        await this.logger?.writeStageStart({ stage: 'COMPILE', startedAt, refs: { criteriaVersion: set.version } });

        let schema: CatalogSchema;
        try {
            schema = await this.options.catalog.getSchema();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            return this.failCompile(startedAt, { stage: 'compile', kind: 'catalog_unavailable', message, predicateIds: [] }, error);
        }

        const result = compileQueryPlan(set, schema, { planVersion: this.nextPlanVersion() });
        if (!result.ok) {
            return this.failCompile(startedAt, {
                stage: 'compile',
                kind: result.error.kind,
                message: result.error.message,
                predicateIds: result.error.predicateIds,
            }, result.error);
        }

        this.installPlan(result.plan, 'compile');
        this.lastError = null;
        await this.logger?.writeStageTerminal({
            stage: 'COMPILE',
            status: 'SUCCEEDED',
            startedAt,
            endedAt: Date.now(),
            refs: {
                planId: result.plan.planId,
                planVersion: result.plan.version,
                fragments: result.plan.fragments.map((fragment) => fragment.predicateId),
                gaps: result.plan.gaps.map((gap) => `${gap.predicateId}:${gap.kind}`),
            },
        });
        await this.transition('executing', `Plan v${result.plan.version} compiled`);
        return this.getResultBundle();
    }

    /**
     * Runs the current plan count-first. Repairable failures go through the bounded
     * repair loop; an exhausted or unrepairable failure waits for the user with the
     * verbatim error and every attempt diff.
     */
    async execute(): Promise<ResultBundle> {
        this.assertState('execute', ['executing']);
        const set = this.requireCriteria();
        const plan = this.requirePlan();
        const startedAt = Date.now();
        await this.logger?.writeStageStart({ stage: 'EXECUTE', startedAt, refs: { planVersion: plan.version, mode: this.mode } });

        const result = await executePlan(this.options.store, plan, this.mode, this.options.execution);
        this.execution = result;
        this.repairAttempts = [];

        if (result.status === 'ok') {
            this.lastError = null;
            await this.logger?.writeStageTerminal({
                stage: 'EXECUTE',
                status: 'SUCCEEDED',
                startedAt,
                endedAt: Date.now(),
                refs: { rowCount: result.rowCount, flags: result.flags, timing: result.timing },
            });
            await this.transition('funneling', `Plan v${plan.version} returned ${result.rowCount} subjects`);
            return this.getResultBundle();
        }

        await this.logger?.writeStageTerminal({
            stage: 'EXECUTE',
            status: 'FAILED',
            startedAt,
            endedAt: Date.now(),
            error: { code: result.errorKind, message: result.errorMessage },
        });

        if (!isRepairable(result.errorKind) || this.maxRepairAttempts === 0) {
            this.lastError = { stage: 'execute', kind: result.errorKind, message: result.errorMessage, predicateIds: [] };
            await this.transition('awaiting_feedback', `${result.errorKind} is not repaired automatically`);
            return this.getResultBundle();
        }

        await this.transition('repairing', `${result.errorKind}: ${result.errorMessage}`);
        return this.repair(set, plan, result);
    }

    async computeFunnel(): Promise<ResultBundle> {
        this.assertState('computeFunnel', ['funneling']);
        try {
            this.funnelReport = await this.runFunnel(this.enabledIds);
        } catch (error) {
            if (!(error instanceof FunnelComputeError)) {
                throw error;
            }
            this.lastError = { stage: 'funnel', kind: error.code, message: error.message, predicateIds: error.predicateIds };
            await this.transition('awaiting_feedback', `Funnel failed: ${error.code}`);
            return this.getResultBundle();
        }

        const steps = this.funnelReport.steps;
        await this.transition('awaiting_feedback', `Funnel computed with ${steps.length} steps`);
        return this.getResultBundle();
    }

    /** Runs every automatic stage until the session needs the caller. */
    async advance(): Promise<ResultBundle> {
        while (!WAITING_STATES.includes(this.currentState)) {
            const before = this.currentState;
            switch (before) {
                case 'compiling_concepts':
                    await this.resolveConcepts();
                    break;
                case 'compiling_query':
                    await this.compileQuery();
                    break;
                case 'executing':
                    await this.execute();
                    break;
                case 'funneling':
                    await this.computeFunnel();
                    break;
                default:
                    throw new SessionStateError('INVALID_STATE', `Session cannot advance from ${before}.`);
            }
            if (this.currentState === before) {
                break;
            }
        }
        return this.getResultBundle();
    }

    /**
     * Funnel for another enabled subset of the current plan. Reuses the fragment cache,
     * so only fragments and prefixes not seen before are loaded.
     */
    async whatIf(enabledIds: Iterable<string>): Promise<FunnelReport> {
        this.assertState('whatIf', ['awaiting_feedback']);
        const report = await this.runFunnel(enabledIds);
        this.enabledIds = [...report.enabledIds];
        this.funnelReport = report;
        return report;
    }

    /** Applies user edits and routes back to concept resolution or compilation. */
    async revise(edits: CriteriaEdit | readonly CriteriaEdit[]): Promise<ResultBundle> {
        this.assertState('revise', ['awaiting_feedback']);
        const list: readonly CriteriaEdit[] = Array.isArray(edits) ? edits : [edits];
        const next = applyCriteriaEdits(this.requireCriteria(), list);

        await this.transition('revising', `${list.length} edit(s): ${list.map((edit) => edit.type).join(', ')}`);
        this.criteriaSet = next;
        this.lastError = null;
        await this.logTask('CRITERIA', 'criteria.revise', 'SUCCEEDED', `Criteria revised to v${next.version}`, {
            edits: list.map((edit) => edit.type),
        });

        if (conceptsReady(next)) {
            await this.transition('compiling_query', 'Every predicate is resolved or skipped');
        } else {
            const pending = pendingConceptPredicates(next).map((predicate) => predicate.id);
            await this.transition('compiling_concepts', `Needs resolution: ${pending.join(', ')}`);
        }
        return this.getResultBundle();
    }

    async approve(token: string): Promise<ResultBundle> {
        this.assertState('approve', ['awaiting_feedback']);
        if (!isApprovalToken(token)) {
            throw new SessionStateError(
                'INVALID_APPROVAL',
                `"${token}" is not an approval token; use one of: ${APPROVAL_TOKENS.join(', ')}.`,
            );
        }
        if (!this.plan || this.execution?.status !== 'ok') {
            throw new SessionStateError('INVALID_STATE', 'Nothing to approve: the current plan has not executed successfully.');
        }

        await this.logTask('REVIEW', 'review.approve', 'SUCCEEDED', `Plan v${this.plan.version} approved`, {
            planId: this.plan.planId,
            token: token.trim(),
        });
        await this.transition('finalized', `Approved with "${token.trim()}"`);
        return this.getResultBundle();
    }

    getResultBundle(): ResultBundle {
        const plan = this.plan;
        const criteria = this.criteriaSet;
        return {
            sessionId: this.sessionId,
            studyId: criteria?.studyId ?? null,
            state: this.currentState,
            criteria,
            plan,
            queryText: plan?.sql.cohort ?? null,
            funnelQueryText: this.funnelReport?.sql ?? (plan ? buildFunnelQuery(plan, this.enabledIds) : null),
            planHistory: [...this.planHistory],
            execution: this.execution,
            repairAttempts: [...this.repairAttempts],
            enabledIds: [...this.enabledIds],
            funnel: this.funnelReport?.steps ?? [],
            funnelNotes: this.funnelReport?.notes ?? [],
            gaps: plan?.gaps ?? criteria?.gaps ?? [],
            warnings: this.funnelReport?.warnings ?? [],
            lastError: this.lastError,
            transitions: [...this.transitions],
        };
    }

    private async repair(set: CriteriaSet, plan: QueryPlan, initial: ExecutionResult): Promise<ResultBundle> {
        const startedAt = Date.now();
        await this.logger?.writeStageStart({ stage: 'REPAIR', startedAt, refs: { fromVersion: plan.version } });

        let outcome: RepairOutcome;
        try {
            outcome = await runRepairLoop({
                store: this.options.store,
                catalog: this.options.catalog,
                criteria: set,
                plan,
                mode: this.mode,
                options: this.options.execution,
                maxRepairAttempts: this.maxRepairAttempts,
                initialResult: initial,
                onAttempt: (attempt) => this.onRepairAttempt(attempt),
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.lastError = { stage: 'repair', kind: 'repair_failed', message, predicateIds: [] };
            await this.logger?.writeStageTerminal({ stage: 'REPAIR', status: 'FAILED', startedAt, endedAt: Date.now(), error: toLogError(error) });
            await this.transition('awaiting_feedback', `Repair failed: ${message}`);
            return this.getResultBundle();
        }

        this.repairAttempts = [...outcome.attempts];
        this.execution = outcome.result;

        if (outcome.status === 'succeeded') {
            if (outcome.demoted.length > 0) {
                this.criteriaSet = applyCriteriaEdits(this.requireCriteria(), outcome.demoted.map((gap): CriteriaEdit => ({ type: 'record_gap', gap })));
            }
            this.lastError = null;
            await this.logger?.writeStageTerminal({
                stage: 'REPAIR',
                status: 'SUCCEEDED',
                startedAt,
                endedAt: Date.now(),
                refs: {
                    attempts: outcome.attempts.length,
                    planVersion: outcome.plan.version,
                    demoted: outcome.demoted.map((gap) => gap.predicateId),
                },
            });
            await this.transition('funneling', `Repaired plan v${outcome.plan.version} returned ${outcome.result.rowCount} subjects`);
            return this.getResultBundle();
        }

        const compileError = outcome.compileError;
        this.lastError = {
            stage: 'repair',
            kind: compileError?.kind ?? outcome.result.errorKind,
            message: compileError?.message ?? outcome.result.errorMessage,
            predicateIds: compileError?.predicateIds ?? [],
        };
        await this.logger?.writeStageTerminal({
            stage: 'REPAIR',
            status: 'FAILED',
            startedAt,
            endedAt: Date.now(),
            refs: { reason: outcome.reason, attempts: outcome.attempts.length },
            error: { code: this.lastError.kind, message: this.lastError.message },
        });
        await this.transition('awaiting_feedback', `Repair ${outcome.reason} after ${outcome.attempts.length} attempt(s)`);
        return this.getResultBundle();
    }

    private async onRepairAttempt(attempt: RepairAttempt): Promise<void> {
        const result = attempt.result;
        await this.logTask(
            'REPAIR',
            `repair.attempt.${attempt.attempt}`,
            result?.status === 'ok' ? 'SUCCEEDED' : 'FAILED',
            `Repair attempt ${attempt.attempt} after ${attempt.trigger.errorKind}`,
            {
                fromVersion: attempt.fromVersion,
                toVersion: attempt.toVersion,
                missingIdentifier: attempt.trigger.missingIdentifier,
                demoted: attempt.demoted.map((gap) => gap.predicateId),
                diff: attempt.diff,
            },
        );

        if (attempt.plan === null || result === null) {
            return;
        }
        this.installPlan(attempt.plan, 'repair');
        this.execution = result;
        await this.transition('executing', `Repair attempt ${attempt.attempt} runs plan v${attempt.plan.version}`);
        if (result.status === 'error' && isRepairable(result.errorKind) && attempt.attempt < this.maxRepairAttempts) {
            await this.transition('repairing', `${result.errorKind}: ${result.errorMessage}`);
        }
    }

    private async resolvePredicate(predicate: Predicate): Promise<CriteriaEdit[]> {
        const resolver = this.options.resolver;
        if (!resolver) {
            return [gapEdit(predicate, 'unresolved_concept', 'No concept resolver is configured.')];
        }

        const outcome = await resolveWithTimeout(
            resolver,
            { label: predicate.concept, domain: predicate.domain, codeSystemHint: predicate.conceptResolution?.codeSystem },
            this.options.resolverTimeoutMs ?? DEFAULT_RESOLVER_TIMEOUT_MS,
        );

        switch (outcome.status) {
            case 'resolved':
                return [{ type: 'set_resolution', predicateId: predicate.id, resolution: outcome.resolution }];
            case 'unresolved': {
                const alternatives = outcome.resolution.alternatives ?? [];
                const notes = outcome.resolution.notes ? `: ${outcome.resolution.notes}` : '';
                return [
                    { type: 'set_resolution', predicateId: predicate.id, resolution: outcome.resolution },
                    gapEdit(
                        predicate,
                        'unresolved_concept',
                        `Concept "${predicate.concept}" could not be resolved${notes}`,
                        alternatives.length > 0 ? `Select one of ${alternatives.length} alternative(s).` : undefined,
                    ),
                ];
            }
            case 'timeout':
                return [gapEdit(predicate, 'resolver_timeout', outcome.message)];
            case 'failed':
                return [gapEdit(predicate, 'unresolved_concept', `Concept resolver failed: ${outcome.message}`)];
        }
    }

    private async runFunnel(enabledIds: Iterable<string>): Promise<FunnelReport> {
        const plan = this.requirePlan();
        const cache = this.cache;
        if (cache === null) {
            throw new SessionStateError('INVALID_STATE', 'The current plan has no fragment cache.');
        }

        const startedAt = Date.now();
        try {
            const report = await computeFunnel(plan, enabledIds, cache, this.options.funnel);
            await this.logTask('FUNNEL', 'funnel.compute', 'SUCCEEDED', `Funnel for plan v${plan.version}`, {
                enabledIds: report.enabledIds,
                counts: report.steps.map((step) => step.count),
                warnings: report.warnings.map((warning) => warning.kind),
                cache: cache.stats,
            }, startedAt);
            return report;
        } catch (error) {
            await this.logTask('FUNNEL', 'funnel.compute', 'FAILED', `Funnel for plan v${plan.version} failed`, {}, startedAt, error);
            throw error;
        }
    }

    private installPlan(plan: QueryPlan, origin: PlanVersionSummary['origin']): void {
        this.plan = plan;
        this.cache = new FragmentCache(plan, new StoreSubjectSource(this.options.store, { timeoutMs: this.options.execution?.timeoutMs }));
        this.enabledIds = plan.fragments.map((fragment) => fragment.predicateId);
        this.funnelReport = null;
        this.planHistory.push({
            version: plan.version,
            planId: plan.planId,
            criteriaVersion: plan.criteriaVersion,
            origin,
            fragmentIds: plan.fragments.map((fragment) => fragment.predicateId),
            gapIds: plan.gaps.map((gap) => gap.predicateId),
        });
    }

    private async failCompile(startedAt: number, failure: SessionError, error: unknown): Promise<ResultBundle> {
        this.lastError = failure;
        this.plan = null;
        this.cache = null;
        this.execution = null;
        this.funnelReport = null;
        this.enabledIds = [];
        await this.logger?.writeStageTerminal({
            stage: 'COMPILE',
            status: 'FAILED',
            startedAt,
            endedAt: Date.now(),
            refs: { predicateIds: failure.predicateIds },
            error: toLogError(error),
        });
        await this.transition('awaiting_feedback', `Compilation failed: ${failure.kind}`);
        return this.getResultBundle();
    }

    private nextPlanVersion(): number {
        const last = this.planHistory[this.planHistory.length - 1];
        return (last?.version ?? 0) + 1;
    }

    private async transition(to: SessionState, reason: string): Promise<void> {
        const from = this.currentState;
        if (!canTransition(from, to)) {
            throw new SessionStateError('INVALID_TRANSITION', `Transition ${from} -> ${to} is not allowed.`);
        }
        this.currentState = to;
        this.transitions.push({ from, to, reason, at: new Date().toISOString() });
        await this.logTask('SYSTEM', `transition.${from}.${to}`, 'SUCCEEDED', reason, { from, to });
    }

    private async logTask(
        stage: SessionStage,
        taskKey: string,
        status: TaskStatus,
        message: string,
        refs: Record<string, unknown>,
        startedAt?: number,
        error?: unknown,
    ): Promise<void> {
        await this.logger?.writeTask({
            stage,
            taskKey,
            status,
            message,
            refs,
            startedAt,
            error: error === undefined ? null : toLogError(error),
        });
    }

    private assertState(operation: string, allowed: readonly SessionState[]): void {
        if (this.currentState === 'finalized') {
            throw new SessionStateError('FINALIZED', `Session ${this.sessionId} is finalized; ${operation} is not allowed.`);
        }
        if (!allowed.includes(this.currentState)) {
            throw new SessionStateError(
                'INVALID_STATE',
                `${operation} is not allowed in state ${this.currentState} (expected ${allowed.join(' or ')}).`,
            );
        }
    }

    private requireCriteria(): CriteriaSet {
        if (this.criteriaSet === null) {
            throw new SessionStateError('INVALID_STATE', 'No criteria set has been submitted.');
        }
        return this.criteriaSet;
    }

    private requirePlan(): QueryPlan {
        if (this.plan === null) {
            throw new SessionStateError('INVALID_STATE', 'No query plan has been compiled.');
        }
        return this.plan;
    }
}

function gapEdit(predicate: Predicate, kind: GapKind, issue: string, proposedResolution?: string): CriteriaEdit {
    const gap: Gap = { predicateId: predicate.id, kind, issue, requiresUserInput: true };
    return { type: 'record_gap', gap: proposedResolution === undefined ? gap : { ...gap, proposedResolution } };
}
