import { readFileSync } from 'node:fs';
import { OpenAiCompatibleClient } from '../ai/client';
import type { FetchLike } from '../ai/client';
import { LlmCriteriaInterpreter } from '../ai/criteriaInterpreter';
import { SqliteCatalogAdapter } from '../catalog/sqliteCatalog';
import { LlmConceptResolver } from '../concepts/llmConceptResolver';
import { ReferenceTableConceptResolver } from '../concepts/referenceTableResolver';
import type { ConceptResolver } from '../concepts/types';
import { loadSettings } from '../config/settings';
import type { CohortSettings } from '../config/settings';
import { stableStringify } from '../identity/canonicalHash';
import { ConsoleRunLogSink, InMemoryRunLogSink } from '../runtime/runLogging';
import { CohortSession } from '../session/cohortSession';
import type { ResultBundle } from '../session/types';
import { SqliteCohortStore } from '../store/sqliteCohortStore';

type CriteriaSource =
    | { kind: 'file'; path: string }
    | { kind: 'text'; path: string; studyId: string };

type CliArgs = {
    db: string | null;
    criteria: CriteriaSource;
    enable: string[] | null;
    preview: boolean;
    maxRepairs: number | null;
    resolve: 'tables' | 'ai' | null;
    verbose: boolean;
};

const BOOLEAN_FLAGS = new Set(['preview', 'resolve', 'resolve-ai', 'verbose']);

export interface CohortCliOptions {
    env?: NodeJS.ProcessEnv;
    /** Receives log documents as JSON lines with --verbose; stderr by default. */
    writeLog?: (line: string) => void;
    /** Transport for the AI endpoint; the global fetch by default. */
    fetchImpl?: FetchLike;
}

/**
 * Runs one criteria file, or free text interpreted by the AI endpoint, through a session
 * against a SQLite dataset and reports the plan, the count, the funnel and any gaps as
 * key-sorted JSON. Timings and transition timestamps are left out so the same inputs
 * always print the same output.
 */
export async function runCohortCli(argv: string[], options: CohortCliOptions = {}): Promise<{ bundle: ResultBundle; output: string }> {
    const args = parseArgs(argv);
    const settings = loadSettings(options.env ?? process.env);
    const criteriaText = readFileSync(args.criteria.path, 'utf8');
    const aiClient = args.criteria.kind === 'text' || args.resolve === 'ai'
        ? createAiClient(settings, options.fetchImpl)
        : null;

    const store = new SqliteCohortStore({ path: args.db ?? settings.databasePath });
    try {
        let resolver: ConceptResolver | undefined;
        if (args.resolve === 'tables') {
            resolver = new ReferenceTableConceptResolver({ store });
        } else if (args.resolve === 'ai' && aiClient !== null) {
            resolver = new LlmConceptResolver(aiClient);
        }

        const session = new CohortSession({
            store,
            catalog: new SqliteCatalogAdapter({ store }),
            resolver,
            interpreter: aiClient === null ? undefined : new LlmCriteriaInterpreter(aiClient),
            logSink: args.verbose ? new ConsoleRunLogSink(options.writeLog) : new InMemoryRunLogSink(),
            mode: args.preview ? 'preview' : 'count',
            maxRepairAttempts: args.maxRepairs ?? settings.maxRepairAttempts,
            resolverTimeoutMs: settings.resolverTimeoutMs,
            execution: {
                timeoutMs: settings.queryTimeoutMs,
                previewLimit: settings.previewRowLimit,
                hugeCohortCeiling: settings.hugeCohortCeiling,
            },
            funnel: {
                suspiciousDropThreshold: settings.suspiciousDropThreshold,
                hugeCohortCeiling: settings.hugeCohortCeiling,
            },
        });

        if (args.criteria.kind === 'text') {
            await session.interpretCriteria(criteriaText, args.criteria.studyId);
        } else {
            const criteria: unknown = JSON.parse(criteriaText);
            await session.submitCriteria(criteria);
        }
        let bundle = await session.advance();
        if (args.enable !== null && bundle.state === 'awaiting_feedback' && bundle.plan !== null) {
            await session.whatIf(args.enable);
            bundle = session.getResultBundle();
        }

        return {
            bundle,
            output: stableStringify(summarize(bundle), 2),
        };
    } finally {
        store.close();
    }
}

function createAiClient(settings: CohortSettings, fetchImpl: FetchLike | undefined): OpenAiCompatibleClient {
    if (settings.ai === null) {
        throw new Error('AI_ENDPOINT and AI_MODEL must be set for --criteria-text and --resolve-ai');
    }
    return new OpenAiCompatibleClient({ ...settings.ai, fetchImpl });
}

function summarize(bundle: ResultBundle): Record<string, unknown> {
    const execution = bundle.execution;
    return {
        studyId: bundle.studyId,
        state: bundle.state,
        criteriaVersion: bundle.criteria?.version ?? null,
        planId: bundle.plan?.planId ?? null,
        planVersion: bundle.plan?.version ?? null,
        rowCount: execution?.status === 'ok' ? execution.rowCount : null,
        flags: execution?.flags ?? [],
        previewRows: execution?.previewRows ?? [],
        enabledIds: bundle.enabledIds,
        funnel: bundle.funnel.map((step) => ({
            step: step.stepLabel,
            count: step.count,
            percentOfBase: step.percentOfBase,
            removedFromPrevious: step.removedFromPrevious,
        })),
        warnings: bundle.warnings.map((warning) => warning.message),
        notes: bundle.funnelNotes,
        gaps: bundle.gaps,
        repairs: bundle.repairAttempts.map((attempt) => ({
            attempt: attempt.attempt,
            errorKind: attempt.trigger.errorKind,
            errorMessage: attempt.trigger.errorMessage,
            toVersion: attempt.toVersion,
            demoted: attempt.demoted.map((gap) => gap.predicateId),
        })),
        lastError: bundle.lastError,
        queryText: bundle.queryText,
        funnelQueryText: bundle.funnelQueryText,
    };
}

function parseArgs(argv: string[]): CliArgs {
    const flags = new Map<string, string | boolean>();

    for (let i = 0; i < argv.length; i += 1) {
        const token = argv[i];
        if (!token.startsWith('--')) {
            continue;
        }

        const name = token.slice(2);
        if (BOOLEAN_FLAGS.has(name)) {
            flags.set(name, true);
            continue;
        }

        const value = argv[i + 1];
        if (value === undefined || value.startsWith('--')) {
            throw new Error(`Missing value for --${name}`);
        }

        flags.set(name, value);
        i += 1;
    }

    if (flags.get('resolve') === true && flags.get('resolve-ai') === true) {
        throw new Error('Use either --resolve or --resolve-ai');
    }

    const enable = flags.get('enable');
    return {
        db: optionalFlag(flags, 'db'),
        criteria: criteriaSource(flags),
        enable: typeof enable === 'string'
            ? enable.split(',').map((id) => id.trim()).filter((id) => id.length > 0)
            : null,
        preview: flags.get('preview') === true,
        maxRepairs: optionalCount(flags, 'max-repairs'),
        resolve: flags.get('resolve') === true ? 'tables' : flags.get('resolve-ai') === true ? 'ai' : null,
        verbose: flags.get('verbose') === true,
    };
}

function criteriaSource(flags: Map<string, string | boolean>): CriteriaSource {
    const file = optionalFlag(flags, 'criteria');
    const text = optionalFlag(flags, 'criteria-text');
    if (file !== null && text !== null) {
        throw new Error('Use either --criteria or --criteria-text');
    }
    if (text !== null) {
        return { kind: 'text', path: text, studyId: requiredFlag(flags, 'study') };
    }
    return { kind: 'file', path: requiredFlag(flags, 'criteria') };
}

function optionalFlag(flags: Map<string, string | boolean>, name: string): string | null {
    const value = flags.get(name);
    return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

function requiredFlag(flags: Map<string, string | boolean>, name: string): string {
    const value = flags.get(name);
    if (typeof value !== 'string' || value.trim().length === 0) {
        throw new Error(`Missing required flag --${name}`);
    }

    return value.trim();
}

function optionalCount(flags: Map<string, string | boolean>, name: string): number | null {
    const value = flags.get(name);
    if (typeof value !== 'string') {
        return null;
    }
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
        throw new Error(`Invalid --${name} value: ${value}`);
    }
    return parsed;
}
