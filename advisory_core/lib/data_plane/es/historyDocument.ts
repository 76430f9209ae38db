import { z } from 'zod';

import { HistoryStoreError } from '../../history';
import type { AdvisoryHistoryDocument } from '../../history';
import { ADVISORY_STATES } from '../../observations';

const EvidenceValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(z.string())]);

const AdvisoryStateRecordSchema = z.object({
    recordId: z.string(),
    advisoryId: z.string(),
    component: z.string().nullable(),
    vulnerabilityId: z.string(),
    state: z.enum(ADVISORY_STATES),
    stateType: z.enum(['final', 'non_final']),
    fixedVersion: z.string().nullable(),
    confidence: z.enum(['high', 'medium', 'low']),
    reasonCode: z.string(),
    explanation: z.string(),
    evidence: z.record(z.string(), EvidenceValueSchema),
    decisionRuleId: z.string(),
    contributingSources: z.array(z.string()),
    dissentingSources: z.array(z.string()),
    effectiveFrom: z.string(),
    effectiveTo: z.string().nullable(),
    isCurrent: z.boolean(),
    runId: z.string(),
});

const StoredHistorySourceSchema = z.object({
    advisoryId: z.string(),
    currentIndex: z.number().int().nullable(),
    records: z.array(AdvisoryStateRecordSchema),
});

/** Index document: the arena plus flattened current-version fields for querying. */
export function encodeHistoryDocument(document: AdvisoryHistoryDocument): Record<string, unknown> {
    const current = document.currentIndex === null ? null : document.records[document.currentIndex] ?? null;

    return {
        advisoryId: document.advisoryId,
        vulnerabilityId: current?.vulnerabilityId ?? null,
        component: current?.component ?? null,
        currentIndex: document.currentIndex,
        versionCount: document.records.length,
        currentState: current?.state ?? null,
        currentStateType: current?.stateType ?? null,
        currentReasonCode: current?.reasonCode ?? null,
        currentConfidence: current?.confidence ?? null,
        currentFixedVersion: current?.fixedVersion ?? null,
        currentEffectiveFrom: current?.effectiveFrom ?? null,
        currentRunId: current?.runId ?? null,
        records: document.records,
    };
}

export function decodeHistoryDocument(id: string, source: unknown): AdvisoryHistoryDocument {
    const parsed = StoredHistorySourceSchema.safeParse(source);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        const detail = first ? `${first.path.join('.')}: ${first.message}` : 'invalid document';
        throw new HistoryStoreError('INVALID_DOCUMENT', `History document ${id} is invalid. ${detail}`);
    }

    return {
        advisoryId: parsed.data.advisoryId,
        currentIndex: parsed.data.currentIndex,
        records: parsed.data.records,
    };
}
