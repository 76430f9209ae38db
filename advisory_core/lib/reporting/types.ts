import type { Decision } from '../decisioning';
import type { AdvisoryState, DroppedObservation } from '../observations';

export type QualityNoteKind =
    | 'INVALID_OBSERVATION'
    | 'MISSING_PLACEHOLDER'
    | 'RESOLUTION_TIE'
    | 'REGRESSION_REVIEW';

export interface QualityNote {
    advisoryId: string | null;
    kind: QualityNoteKind;
    message: string;
}

/**
 * Run callbacks. The pipeline calls them as it goes; implementations accumulate or forward
 * without owning report formatting.
 */
export interface RunObserver {
    onDropped?(dropped: DroppedObservation): void;
    onDecision?(advisoryId: string, decision: Decision, written: boolean, previousState: AdvisoryState | null): void;
    onQualityNote?(note: QualityNote): void;
    onError?(error: unknown, advisoryId: string | null): void;
}

export interface StateTransition {
    advisoryId: string;
    from: AdvisoryState | null;
    to: AdvisoryState;
}

export interface RunMetricsSummary {
    runId: string;
    decisions: number;
    written: number;
    unchanged: number;
    dropped: number;
    regressions: number;
    byReasonCode: Record<string, number>;
    byState: Record<string, number>;
    byRule: Record<string, number>;
    droppedByReason: Record<string, number>;
    transitions: StateTransition[];
    qualityNotes: QualityNote[];
    errors: string[];
}

export interface QualityCheckResult {
    checkName: string;
    passed: boolean;
    message: string;
    details: Record<string, number>;
}
