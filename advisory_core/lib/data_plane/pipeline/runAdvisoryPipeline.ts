import { DEFAULT_PIPELINE_CONFIG } from '../../config';
import { DecisionEngine, trustedReasonCodes } from '../../decisioning';
import type { DecisionEvaluation } from '../../decisioning';
import { StateHistoryManager, hasChanged } from '../../history';
import type { AdvisoryIdentity } from '../../identity';
import { aggregateObservations } from '../../observations';
import type { AdvisoryState, ObservationGroup } from '../../observations';
import { RunMetrics, combineObservers } from '../../reporting';
import type { RunObserver } from '../../reporting';
import { AuthorityRanking, resolveConflicts } from '../../resolution';
import { toTaskError } from '../../runtime/runLogging';
import type { RunLogger, TaskStage } from '../../runtime/runLogging';
import { runWithConcurrency } from './concurrency';
import type { AdvisoryOutcome, AdvisoryPipelineOptions, PipelineRunSummary } from './types';

type DecidedAdvisory = {
    identity: AdvisoryIdentity;
    evaluation: DecisionEvaluation;
    resolutionNotes: string[];
};

/**
 * One pass over a batch: aggregate, resolve and decide every advisory, then write decisions
 * through the history manager in advisory id order. Configuration and store reachability are
 * checked before anything is written; a write that cannot be committed aborts the run.
 */
export async function runAdvisoryPipeline(options: AdvisoryPipelineOptions): Promise<PipelineRunSummary> {
    const config = options.config ?? DEFAULT_PIPELINE_CONFIG;
    const clock = options.clock ?? (() => new Date());
    const dryRun = options.dryRun === true;
    const metrics = new RunMetrics(options.runId);
    const observer = combineObservers(metrics, options.observer);
    const logger = options.logger ?? null;
    const runStartedAt = clock().getTime();

    await logger?.writeRun({
        status: 'RUNNING',
        startedAt: runStartedAt,
        endedAt: null,
        stageSummary: {},
        counts: {},
        errorSummary: null,
    });

    try {
        const { ranking, engine } = await inStage(logger, clock, 'VALIDATE', async () => ({
            ranking: new AuthorityRanking(config.authority),
            engine: new DecisionEngine({ rules: config.rules, templates: config.templates }),
        }));

        await options.store.ping();

        const aggregation = await inStage(logger, clock, 'AGGREGATE', async () => aggregateObservations(options.observations, {
            vulnerabilityWideSources: ranking.sourcesWithRole('registry'),
        }));
        aggregation.dropped.forEach((dropped) => observer.onDropped?.(dropped));

        const groups = Array.from(aggregation.groups.values())
            .sort((left, right) => left.identity.advisoryId.localeCompare(right.identity.advisoryId));

        const decided = await inStage(logger, clock, 'DECIDE', () => runWithConcurrency(
            groups,
            config.concurrency.decisions,
            async (group) => decideGroup(group, ranking, engine),
        ));
        decided.forEach((item) => reportDecisionNotes(item, observer));

        const manager = new StateHistoryManager({
            store: options.store,
            clock,
            maxWriteAttempts: config.history.maxWriteAttempts,
            trustedReasonCodes: trustedReasonCodes(config.rules),
        });

        const outcomes = await inStage(logger, clock, 'WRITE', () => runWithConcurrency(
            decided,
            config.concurrency.writes,
            async (item) => {
                try {
                    return await applyDecision(item, manager, options.runId, dryRun, observer);
                } catch (error) {
                    observer.onError?.(error, item.identity.advisoryId);
                    throw error;
                }
            },
        ));

        const summary: PipelineRunSummary = {
            runId: options.runId,
            dryRun,
            observations: options.observations.length,
            advisories: outcomes.length,
            dropped: aggregation.droppedCount,
            written: outcomes.filter((outcome) => outcome.written).length,
            unchanged: outcomes.filter((outcome) => !outcome.written).length,
            outcomes,
            metrics: metrics.toSummary(),
        };

        console.log(
            `[AdvisoryPipeline] Run ${options.runId}: ${summary.advisories} advisories, ${summary.written} `
            + `${dryRun ? 'would change' : 'written'}, ${summary.dropped} observations dropped.`,
        );

        await logger?.writeRun({
            status: 'SUCCEEDED',
            startedAt: runStartedAt,
            endedAt: clock().getTime(),
            stageSummary: { advisories: summary.advisories, written: summary.written },
            counts: { ...summary.metrics.byState },
            errorSummary: null,
        });

        return summary;
    } catch (error) {
        console.error(`[AdvisoryPipeline] Run ${options.runId} failed:`, error);

        await logger?.writeRun({
            status: 'FAILED',
            startedAt: runStartedAt,
            endedAt: clock().getTime(),
            stageSummary: {},
            counts: {},
            errorSummary: toTaskError(error),
        });

        throw error;
    }
}

function decideGroup(group: ObservationGroup, ranking: AuthorityRanking, engine: DecisionEngine): DecidedAdvisory {
    const advisory = resolveConflicts(group, ranking);

    return {
        identity: group.identity,
        evaluation: engine.evaluate(advisory),
        resolutionNotes: advisory.resolutionNotes,
    };
}

function reportDecisionNotes(item: DecidedAdvisory, observer: RunObserver): void {
    const advisoryId = item.identity.advisoryId;
    const { decision, missingPlaceholders } = item.evaluation;

    if (missingPlaceholders.length > 0) {
        observer.onQualityNote?.({
            advisoryId,
            kind: 'MISSING_PLACEHOLDER',
            message: `Explanation for ${decision.reasonCode} rendered unknown for: ${missingPlaceholders.join(', ')}`,
        });
    }

    for (const note of item.resolutionNotes) {
        observer.onQualityNote?.({ advisoryId, kind: 'RESOLUTION_TIE', message: note });
    }
}

async function applyDecision(
    item: DecidedAdvisory,
    manager: StateHistoryManager,
    runId: string,
    dryRun: boolean,
    observer: RunObserver,
): Promise<AdvisoryOutcome> {
    const advisoryId = item.identity.advisoryId;
    const { decision } = item.evaluation;

    let written: boolean;
    let previousState: AdvisoryState | null;

    if (dryRun) {
        const current = await manager.getCurrent(advisoryId);
        written = current === null || hasChanged(current, decision);
        previousState = current?.state ?? null;
    } else {
        const result = await manager.record(decision, item.identity, runId);
        written = result.written;
        previousState = result.previous?.state ?? null;

        if (result.transition?.requiresReview) {
            observer.onQualityNote?.({
                advisoryId,
                kind: 'REGRESSION_REVIEW',
                message: `${result.transition.from} -> ${result.transition.to} via ${decision.reasonCode} needs review`,
            });
        }
    }

    observer.onDecision?.(advisoryId, decision, written, previousState);

    return {
        advisoryId,
        previousState,
        state: decision.state,
        reasonCode: decision.reasonCode,
        written,
    };
}

async function inStage<T>(
    logger: RunLogger | null,
    clock: () => Date,
    stage: TaskStage,
    work: () => Promise<T>,
): Promise<T> {
    if (!logger) {
        return work();
    }

    const startedAt = clock().getTime();
    await logger.writeStageStart(stage, startedAt);

    try {
        const result = await work();
        await logger.writeStageTerminal({ stage, status: 'SUCCEEDED', startedAt, endedAt: clock().getTime() });
        return result;
    } catch (error) {
        await logger.writeStageTerminal({
            stage,
            status: 'FAILED',
            startedAt,
            endedAt: clock().getTime(),
            error: toTaskError(error),
        });
        throw error;
    }
}
