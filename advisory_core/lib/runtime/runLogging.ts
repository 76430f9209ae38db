import { createHash } from 'node:crypto';

import { DEFAULT_INDEX_NAMES } from '../config';

export const PIPELINE_VERSION = '1.0';

export type RunStatus = 'RUNNING' | 'SUCCEEDED' | 'FAILED';
export type TaskStatus = 'STARTED' | 'SUCCEEDED' | 'FAILED';
export type TaskStage = 'VALIDATE' | 'AGGREGATE' | 'DECIDE' | 'WRITE';
export type StageTerminalStatus = Extract<TaskStatus, 'SUCCEEDED' | 'FAILED'>;

export interface RunLogEntry {
    id: string;
    document: Record<string, unknown>;
}

export interface RunLogWriteReport {
    attempted: number;
    succeeded: number;
    failed: number;
    firstFailure?: {
        id: string;
        status: number;
        reason: string;
    } | null;
}

export interface RunLogClient {
    bulkUpsert(
        index: string,
        entries: RunLogEntry[],
        options?: { refresh?: 'true' | 'false' | 'wait_for' }
    ): Promise<RunLogWriteReport>;
}

export interface TaskError {
    code: string;
    message: string;
    stack?: string;
    type?: string;
}

export function sha256(input: string): string {
    return createHash('sha256').update(input).digest('hex');
}

export function toTaskError(error: unknown): TaskError {
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : 'UNEXPECTED';
        return { code, message: error.message, stack: error.stack, type: error.name };
    }

    return { code: 'UNEXPECTED', message: String(error), type: 'Error' };
}

/**
 * Run header and per-stage task documents for one pipeline run. Log writes never fail the run:
 * problems are reported on stderr and swallowed here.
 */
export class RunLogger {
    private readonly client: RunLogClient;
    private readonly runId: string;
    private readonly executionMode: 'es' | 'memory';
    private readonly pipelineVersion: string;
    private readonly runsIndex: string;
    private readonly tasklogsIndex: string;
    private readonly clock: () => number;
    private seq = 0;

    constructor(params: {
        client: RunLogClient;
        runId: string;
        executionMode: 'es' | 'memory';
        pipelineVersion?: string;
        indices?: { runs: string; tasklogs: string };
        clock?: () => number;
    }) {
        this.client = params.client;
        this.runId = params.runId;
        this.executionMode = params.executionMode;
        this.pipelineVersion = params.pipelineVersion ?? PIPELINE_VERSION;
        this.runsIndex = params.indices?.runs ?? DEFAULT_INDEX_NAMES.runs;
        this.tasklogsIndex = params.indices?.tasklogs ?? DEFAULT_INDEX_NAMES.tasklogs;
        this.clock = params.clock ?? Date.now;
    }

    async writeRun(params: {
        status: RunStatus;
        startedAt: number;
        endedAt: number | null;
        stageSummary: Record<string, unknown>;
        counts: Record<string, unknown>;
        errorSummary: TaskError | null;
    }): Promise<void> {
        const now = this.clock();
        const endedAt = params.endedAt === null ? null : Math.max(params.endedAt, params.startedAt);

        const document = {
            runId: this.runId,
            executionMode: this.executionMode,
            pipelineVersion: this.pipelineVersion,
            status: params.status,
            startedAt: new Date(params.startedAt).toISOString(),
            endedAt: endedAt === null ? null : new Date(endedAt).toISOString(),
            stageSummary: params.stageSummary,
            counts: params.counts,
            errorSummary: params.errorSummary,
            updatedAt: new Date(now).toISOString(),
        };

        try {
            const report = await this.client.bulkUpsert(this.runsIndex, [{ id: this.runId, document }], { refresh: 'wait_for' });
            if (report.failed > 0) {
                console.error(`[RunLogger] Failed to write run header for runId=${this.runId}. First failure:`, report.firstFailure);
            }
        } catch (error) {
            console.error(`[RunLogger] Error writing run header for runId=${this.runId}:`, error);
        }
    }

    async writeStageStart(stage: TaskStage, startedAt: number): Promise<void> {
        await this.writeTask({
            stage,
            taskKey: `${stage.toLowerCase()}.stage.start`,
            status: 'STARTED',
            message: `${stage} stage started`,
            startedAt,
            endedAt: startedAt,
            error: null,
        });
    }

    async writeStageTerminal(params: {
        stage: TaskStage;
        status: StageTerminalStatus;
        startedAt: number;
        endedAt: number;
        error?: TaskError | null;
    }): Promise<void> {
        await this.writeTask({
            stage: params.stage,
            taskKey: `${params.stage.toLowerCase()}.stage.end`,
            status: params.status,
            message: `${params.stage} stage ${params.status.toLowerCase()}`,
            startedAt: params.startedAt,
            endedAt: params.endedAt,
            error: params.error ?? null,
        });
    }

    private async writeTask(params: {
        stage: TaskStage;
        taskKey: string;
        status: TaskStatus;
        message: string;
        startedAt: number;
        endedAt: number;
        error: TaskError | null;
    }): Promise<void> {
        this.seq += 1;
        const taskId = sha256([this.runId, params.stage, params.taskKey].join('|'));
        const endedAt = Math.max(params.endedAt, params.startedAt);
        const errorSource = params.error ?? { code: 'NONE', message: 'none' };

        const document = {
            runId: this.runId,
            seq: this.seq,
            stage: params.stage,
            taskKey: params.taskKey,
            taskId,
            status: params.status,
            startedAt: new Date(params.startedAt).toISOString(),
            endedAt: new Date(endedAt).toISOString(),
            durationMs: endedAt - params.startedAt,
            message: truncate(params.message, 10000),
            error: {
                code: errorSource.code,
                message: truncate(errorSource.message, 8000),
                stack: truncate(errorSource.stack, 20000),
                type: errorSource.type ?? 'Error',
            },
            createdAt: new Date(this.clock()).toISOString(),
        };

        try {
            const report = await this.client.bulkUpsert(this.tasklogsIndex, [{ id: taskId, document }], { refresh: 'wait_for' });
            if (report.failed > 0) {
                console.error(`[RunLogger] Task log write failed for ${params.taskKey}. First error: ${report.firstFailure?.reason}`);
            }
        } catch (error) {
            console.error(`[RunLogger] Error writing task log for ${params.taskKey}:`, error);
        }
    }
}

function truncate(value: string | undefined | null, max: number): string {
    const text = value ?? '';
    if (text.length > max) {
        return `${text.substring(0, max)}...[truncated ${text.length - max} chars]`;
    }

    return text;
}
