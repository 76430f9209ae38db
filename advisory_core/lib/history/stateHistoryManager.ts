import { DEFAULT_RULES, assessTransition, trustedReasonCodes } from '../decisioning';
import type { Decision, TransitionAssessment } from '../decisioning';
import { generateHistoryRecordId, identityFromAdvisoryId } from '../identity';
import type { AdvisoryIdentity } from '../identity';
import { HistoryWriteConflictError } from './errors';
import { KeyedLock } from './keyedLock';
import type { AdvisoryHistoryDocument, AdvisoryStateRecord, HistoryStore, HistoryWriteResult } from './types';

export const DEFAULT_MAX_WRITE_ATTEMPTS = 3;

export interface StateHistoryManagerOptions {
    store: HistoryStore;
    clock?: () => Date;
    maxWriteAttempts?: number;
    trustedReasonCodes?: ReadonlySet<string>;
}

/**
 * SCD2 writer over a HistoryStore. A new version is appended only when state, fixed version,
 * confidence or reason code differ from the current one. Writes for one advisory are serialized
 * in-process and checked against the store revision across processes.
 */
export class StateHistoryManager {
    private readonly store: HistoryStore;
    private readonly clock: () => Date;
    private readonly maxWriteAttempts: number;
    private readonly trusted: ReadonlySet<string>;
    private readonly lock = new KeyedLock();

    constructor(options: StateHistoryManagerOptions) {
        this.store = options.store;
        this.clock = options.clock ?? (() => new Date());
        this.maxWriteAttempts = Math.max(1, options.maxWriteAttempts ?? DEFAULT_MAX_WRITE_ATTEMPTS);
        this.trusted = options.trustedReasonCodes ?? trustedReasonCodes(DEFAULT_RULES);
    }

    async apply(decision: Decision, advisoryId: string, runId: string): Promise<boolean> {
        const result = await this.record(decision, identityFromAdvisoryId(advisoryId), runId);
        return result.written;
    }

    async record(decision: Decision, identity: AdvisoryIdentity, runId: string): Promise<HistoryWriteResult> {
        return this.lock.run(identity.advisoryId, () => this.recordWithRetry(decision, identity, runId));
    }

    async getCurrent(advisoryId: string): Promise<AdvisoryStateRecord | null> {
        const stored = await this.store.read(advisoryId);
        return stored ? currentRecordOf(stored.document) : null;
    }

    /** Version in effect at `at`: `effectiveFrom <= at < effectiveTo`, or open-ended. */
    async getAt(advisoryId: string, at: Date | string): Promise<AdvisoryStateRecord | null> {
        const stored = await this.store.read(advisoryId);
        if (!stored) {
            return null;
        }

        const instant = typeof at === 'string' ? Date.parse(at) : at.getTime();

        return stored.document.records.find((record) => {
            const from = Date.parse(record.effectiveFrom);
            const to = record.effectiveTo === null ? Number.POSITIVE_INFINITY : Date.parse(record.effectiveTo);
            return from <= instant && instant < to;
        }) ?? null;
    }

    async getHistory(advisoryId: string): Promise<AdvisoryStateRecord[]> {
        const stored = await this.store.read(advisoryId);
        return stored ? [...stored.document.records] : [];
    }

    private async recordWithRetry(decision: Decision, identity: AdvisoryIdentity, runId: string): Promise<HistoryWriteResult> {
        for (let attempt = 1; attempt <= this.maxWriteAttempts; attempt += 1) {
            const stored = await this.store.read(identity.advisoryId);
            const previous = stored ? currentRecordOf(stored.document) : null;

            if (previous && !hasChanged(previous, decision)) {
                return {
                    advisoryId: identity.advisoryId,
                    written: false,
                    previous,
                    current: previous,
                    transition: null,
                    attempts: attempt,
                };
            }

            const effectiveFrom = this.effectiveFrom(previous);
            const next = buildRecord(decision, identity, runId, effectiveFrom);
            const document = appendVersion(stored?.document ?? null, identity.advisoryId, next);

            const outcome = await this.store.commit(document, stored?.revision ?? null);
            if (outcome === 'committed') {
                const transition = assessTransition(previous?.state ?? null, decision.state, {
                    reasonCode: decision.reasonCode,
                    trustedReasonCodes: this.trusted,
                });
                this.reportTransition(identity.advisoryId, transition);

                return {
                    advisoryId: identity.advisoryId,
                    written: true,
                    previous,
                    current: next,
                    transition,
                    attempts: attempt,
                };
            }

            console.warn(
                `[StateHistoryManager] Write conflict for ${identity.advisoryId} (attempt ${attempt}/${this.maxWriteAttempts}); re-reading.`,
            );
        }

        throw new HistoryWriteConflictError(identity.advisoryId, this.maxWriteAttempts);
    }

    private effectiveFrom(previous: AdvisoryStateRecord | null): string {
        const now = this.clock();
        if (previous && now.getTime() < Date.parse(previous.effectiveFrom)) {
            return previous.effectiveFrom;
        }

        return now.toISOString();
    }

    private reportTransition(advisoryId: string, transition: TransitionAssessment): void {
        if (transition.kind !== 'regression') {
            return;
        }

        console.warn(
            `[StateHistoryManager] Regression for ${advisoryId}: ${transition.from} -> ${transition.to}`
            + (transition.requiresReview ? ' (requires review)' : ' (trusted authority)'),
        );
    }
}

export function currentRecordOf(document: AdvisoryHistoryDocument): AdvisoryStateRecord | null {
    if (document.currentIndex === null) {
        return null;
    }

    return document.records[document.currentIndex] ?? null;
}

export function hasChanged(current: AdvisoryStateRecord, decision: Decision): boolean {
    return current.state !== decision.state
        || current.fixedVersion !== decision.fixedVersion
        || current.confidence !== decision.confidence
        || current.reasonCode !== decision.reasonCode;
}

function buildRecord(decision: Decision, identity: AdvisoryIdentity, runId: string, effectiveFrom: string): AdvisoryStateRecord {
    return {
        recordId: generateHistoryRecordId({ advisoryId: identity.advisoryId, runId, effectiveFrom }),
        advisoryId: identity.advisoryId,
        component: identity.component,
        vulnerabilityId: identity.vulnerabilityId,
        state: decision.state,
        stateType: decision.stateType,
        fixedVersion: decision.fixedVersion,
        confidence: decision.confidence,
        reasonCode: decision.reasonCode,
        explanation: decision.explanation,
        evidence: { ...decision.evidence },
        decisionRuleId: decision.decisionRuleId,
        contributingSources: [...decision.contributingSources],
        dissentingSources: [...decision.dissentingSources],
        effectiveFrom,
        effectiveTo: null,
        isCurrent: true,
        runId,
    };
}

/** New arena with the current version closed at the new version's start. Input is not mutated. */
function appendVersion(
    existing: AdvisoryHistoryDocument | null,
    advisoryId: string,
    next: AdvisoryStateRecord,
): AdvisoryHistoryDocument {
    const records = (existing?.records ?? []).map((record, index) => (
        index === existing?.currentIndex
            ? { ...record, effectiveTo: next.effectiveFrom, isCurrent: false }
            : record
    ));

    return {
        advisoryId,
        records: [...records, next],
        currentIndex: records.length,
    };
}
