import { isFinalState } from '../decisioning';
import type { Decision } from '../decisioning';
import type { AdvisoryState, DroppedObservation } from '../observations';
import type { QualityNote, RunMetricsSummary, RunObserver, StateTransition } from './types';

/**
 * Accumulates per-run counts from observer callbacks. Counts come only from the decision and the
 * written flag of each history write.
 */
export class RunMetrics implements RunObserver {
    private readonly runId: string;
    private decisions = 0;
    private written = 0;
    private regressions = 0;
    private readonly byReasonCode = new Map<string, number>();
    private readonly byState = new Map<string, number>();
    private readonly byRule = new Map<string, number>();
    private readonly droppedByReason = new Map<string, number>();
    private readonly transitions: StateTransition[] = [];
    private readonly qualityNotes: QualityNote[] = [];
    private readonly errors: string[] = [];
    private dropped = 0;

    constructor(runId: string) {
        this.runId = runId;
    }

    onDropped(dropped: DroppedObservation): void {
        this.dropped += 1;
        increment(this.droppedByReason, dropped.reason);
    }

    onDecision(advisoryId: string, decision: Decision, written: boolean, previousState: AdvisoryState | null): void {
        this.decisions += 1;
        increment(this.byReasonCode, decision.reasonCode);
        increment(this.byState, decision.state);
        increment(this.byRule, decision.decisionRuleId);

        if (!written) {
            return;
        }

        this.written += 1;
        this.transitions.push({ advisoryId, from: previousState, to: decision.state });

        if (previousState !== null && isFinalState(previousState) && decision.stateType === 'non_final') {
            this.regressions += 1;
        }
    }

    onQualityNote(note: QualityNote): void {
        this.qualityNotes.push(note);
    }

    onError(error: unknown, advisoryId: string | null): void {
        const message = error instanceof Error ? error.message : String(error);
        this.errors.push(advisoryId ? `${advisoryId}: ${message}` : message);
    }

    toSummary(): RunMetricsSummary {
        return {
            runId: this.runId,
            decisions: this.decisions,
            written: this.written,
            unchanged: this.decisions - this.written,
            dropped: this.dropped,
            regressions: this.regressions,
            byReasonCode: toSortedRecord(this.byReasonCode),
            byState: toSortedRecord(this.byState),
            byRule: toSortedRecord(this.byRule),
            droppedByReason: toSortedRecord(this.droppedByReason),
            transitions: [...this.transitions].sort((left, right) => left.advisoryId.localeCompare(right.advisoryId)),
            qualityNotes: [...this.qualityNotes],
            errors: [...this.errors],
        };
    }
}

/** Forwards every callback to each observer in order. */
export function combineObservers(...observers: Array<RunObserver | null | undefined>): RunObserver {
    const active = observers.filter((observer): observer is RunObserver => Boolean(observer));

    return {
        onDropped: (dropped) => active.forEach((observer) => observer.onDropped?.(dropped)),
        onDecision: (advisoryId, decision, written, previousState) => active.forEach(
            (observer) => observer.onDecision?.(advisoryId, decision, written, previousState),
        ),
        onQualityNote: (note) => active.forEach((observer) => observer.onQualityNote?.(note)),
        onError: (error, advisoryId) => active.forEach((observer) => observer.onError?.(error, advisoryId)),
    };
}

function increment(counts: Map<string, number>, key: string): void {
    counts.set(key, (counts.get(key) ?? 0) + 1);
}

function toSortedRecord(counts: Map<string, number>): Record<string, number> {
    return Array.from(counts.entries())
        .sort(([left], [right]) => left.localeCompare(right))
        .reduce<Record<string, number>>((acc, [key, value]) => {
            acc[key] = value;
            return acc;
        }, {});
}
