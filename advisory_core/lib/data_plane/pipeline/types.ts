import type { PipelineConfig } from '../../config';
import type { HistoryStore } from '../../history';
import type { AdvisoryState, SourceObservation } from '../../observations';
import type { RunMetricsSummary, RunObserver } from '../../reporting';
import type { RunLogger } from '../../runtime/runLogging';

export interface AdvisoryPipelineOptions {
    observations: readonly SourceObservation[];
    runId: string;
    store: HistoryStore;
    config?: PipelineConfig;
    observer?: RunObserver;
    clock?: () => Date;
    logger?: RunLogger;
    /** Decide and compare against the current state without writing. */
    dryRun?: boolean;
}

export interface AdvisoryOutcome {
    advisoryId: string;
    previousState: AdvisoryState | null;
    state: AdvisoryState;
    reasonCode: string;
    written: boolean;
}

export interface PipelineRunSummary {
    runId: string;
    dryRun: boolean;
    observations: number;
    advisories: number;
    dropped: number;
    written: number;
    unchanged: number;
    outcomes: AdvisoryOutcome[];
    metrics: RunMetricsSummary;
}
