import { sha256 } from '../identity/canonicalHash';

export type TaskStatus = 'STARTED' | 'SUCCEEDED' | 'FAILED' | 'SKIPPED';
export type SessionStage = 'CRITERIA' | 'CONCEPTS' | 'COMPILE' | 'EXECUTE' | 'REPAIR' | 'FUNNEL' | 'REVIEW' | 'SYSTEM';
export type StageTerminalStatus = Extract<TaskStatus, 'SUCCEEDED' | 'FAILED' | 'SKIPPED'>;

export interface TaskLogError {
    code: string;
    message: string;
    stack?: string;
    type?: string;
}

export interface TaskLogDocument {
    sessionId: string;
    studyId: string;
    seq: number;
    stage: SessionStage;
    taskKey: string;
    taskId: string;
    status: TaskStatus;
    startedAt: string;
    endedAt: string;
    durationMs: number;
    message: string;
    refs: Record<string, unknown>;
    error: Required<TaskLogError>;
    createdAt: string;
}

export interface SinkWriteReport {
    attempted: number;
    succeeded: number;
    failed: number;
    firstFailure?: { taskKey: string; reason: string } | null;
}

export interface RunLogSink {
    write(documents: TaskLogDocument[]): Promise<SinkWriteReport>;
}

export class InMemoryRunLogSink implements RunLogSink {
    readonly documents: TaskLogDocument[] = [];

    async write(documents: TaskLogDocument[]): Promise<SinkWriteReport> {
        this.documents.push(...documents);
        return { attempted: documents.length, succeeded: documents.length, failed: 0 };
    }
}

/** One JSON line per task document, on stderr unless another writer is given. */
export class ConsoleRunLogSink implements RunLogSink {
    private readonly writeLine: (line: string) => void;

    constructor(writeLine?: (line: string) => void) {
        this.writeLine = writeLine ?? ((line) => {
            process.stderr.write(`${line}\n`);
        });
    }

    async write(documents: TaskLogDocument[]): Promise<SinkWriteReport> {
        for (const doc of documents) {
            this.writeLine(JSON.stringify(doc));
        }
        return { attempted: documents.length, succeeded: documents.length, failed: 0 };
    }
}

interface TaskParams {
    stage: SessionStage;
    taskKey: string;
    status: TaskStatus;
    message: string;
    startedAt: number;
    endedAt: number;
    refs?: Record<string, unknown>;
    error?: TaskLogError | null;
}

const MAX_MESSAGE_CHARS = 10_000;
const MAX_ERROR_CHARS = 8_000;
const MAX_STACK_CHARS = 20_000;
const MAX_REFS_BYTES = 50_000;

/**
 * Structured stage and task log of one cohort session. Sink failures are reported on
 * stderr and never interrupt the session.
 */
export class SessionRunLogger {
    private readonly sink: RunLogSink;
    private readonly sessionId: string;
    private readonly studyId: string;
    private seq = 0;

    constructor(params: { sink: RunLogSink; sessionId: string; studyId: string }) {
        this.sink = params.sink;
        this.sessionId = params.sessionId;
        this.studyId = params.studyId;
    }

    async writeTask(params: Omit<TaskParams, 'startedAt' | 'endedAt'> & { startedAt?: number; endedAt?: number }): Promise<void> {
        await this.writeTaskInternal({
            ...params,
            startedAt: params.startedAt ?? Date.now(),
            endedAt: params.endedAt ?? Date.now(),
        });
    }

    async writeStageStart(params: { stage: SessionStage; startedAt: number; refs?: Record<string, unknown> }): Promise<void> {
        await this.writeTaskInternal({
            stage: params.stage,
            taskKey: `${params.stage.toLowerCase()}.stage.start`,
            status: 'STARTED',
            message: `${params.stage} stage started`,
            startedAt: params.startedAt,
            endedAt: params.startedAt,
            refs: params.refs ?? {},
            error: null,
        });
    }

    async writeStageTerminal(params: {
        stage: SessionStage;
        status: StageTerminalStatus;
        startedAt: number;
        endedAt: number;
        refs?: Record<string, unknown>;
        error?: TaskLogError | null;
    }): Promise<void> {
        await this.writeTaskInternal({
            stage: params.stage,
            taskKey: `${params.stage.toLowerCase()}.stage.end`,
            status: params.status,
            message: `${params.stage} stage ${params.status.toLowerCase()}`,
            startedAt: params.startedAt,
            endedAt: params.endedAt,
            refs: params.refs ?? {},
            error: params.error ?? null,
        });
    }

    private async writeTaskInternal(params: TaskParams): Promise<void> {
        this.seq += 1;
        const taskId = sha256([this.sessionId, params.stage, params.taskKey, String(this.seq)].join('|'));

        const now = Date.now();
        const endedAt = Math.max(params.endedAt, params.startedAt);
        const errorSource = params.error ?? { code: 'NONE', message: 'none' };

        const doc: TaskLogDocument = {
            sessionId: this.sessionId,
            studyId: this.studyId,
            seq: this.seq,
            stage: params.stage,
            taskKey: params.taskKey,
            taskId,
            status: params.status,
            startedAt: new Date(params.startedAt).toISOString(),
            endedAt: new Date(endedAt).toISOString(),
            durationMs: Math.max(0, endedAt - params.startedAt),
            message: truncate(params.message, MAX_MESSAGE_CHARS),
            refs: boundedRefs(params.refs, MAX_REFS_BYTES),
            error: {
                code: errorSource.code,
                message: truncate(errorSource.message, MAX_ERROR_CHARS),
                stack: truncate(errorSource.stack, MAX_STACK_CHARS),
                type: errorSource.type ?? 'Error',
            },
            createdAt: new Date(now).toISOString(),
        };

        try {
            const report = await this.sink.write([doc]);
            if (report.failed > 0) {
                console.error(`[SessionRunLogger] Task log write failed for ${params.taskKey}. First error: ${report.firstFailure?.reason}`);
            }
        } catch (error) {
            console.error(`[SessionRunLogger] Critical error writing task log for ${params.taskKey}:`, error);
        }
    }
}

export function truncate(value: string | undefined | null, max: number): string {
    const text = value ?? '';
    if (text.length > max) {
        return `${text.substring(0, max)}...[truncated ${text.length - max} chars]`;
    }
    return text;
}

function boundedRefs(value: Record<string, unknown> | undefined, maxBytes: number): Record<string, unknown> {
    if (!value) {
        return {};
    }
    const text = JSON.stringify(value);
    if (text.length > maxBytes) {
        return { _truncated: true, originalBytes: text.length };
    }
    return value;
}

export function toLogError(error: unknown): TaskLogError {
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'string'
            ? error.code
            : 'kind' in error && typeof error.kind === 'string' ? error.kind : 'UNKNOWN';
        return { code, message: error.message, stack: error.stack, type: error.name };
    }
    return { code: 'UNKNOWN', message: String(error), type: typeof error };
}
