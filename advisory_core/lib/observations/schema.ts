import { z } from 'zod';

import { ObservationValidationError } from './errors';
import { ADVISORY_STATES } from './types';
import type { ObservationIssue, ParsedObservationBatch, SourceObservation } from './types';

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: 'must be an ISO-8601 timestamp',
});

const optionalText = z.string().nullable().optional();

export const SourceObservationSchema = z.object({
    sourceId: z.string().trim().min(1),
    component: optionalText,
    vulnerabilityId: optionalText,
    observedAt: isoTimestamp,
    sourceUpdatedAt: isoTimestamp.nullable().optional(),

    overrideStatus: z.enum(ADVISORY_STATES).nullable().optional(),
    overrideReason: optionalText,
    rejectionStatus: optionalText,
    fixAvailable: z.boolean().nullable().optional(),
    fixedVersion: optionalText,
    severityScore: z.number().min(0).max(10).nullable().optional(),
    notes: optionalText,

    rawPayload: z.record(z.string(), z.unknown()).optional(),
});

export const ObservationBatchSchema = z.object({
    runId: z.string().trim().min(1).optional(),
    observations: z.array(z.unknown()),
});

/**
 * Validates a normalized batch record by record. A malformed record is reported as an issue and
 * skipped; only a batch that is not an array of records at all is rejected.
 */
export function parseObservationBatch(input: unknown): ParsedObservationBatch {
    const records = extractRecords(input);

    const observations: SourceObservation[] = [];
    const issues: ObservationIssue[] = [];

    records.forEach((record, position) => {
        const parsed = SourceObservationSchema.safeParse(record);
        if (parsed.success) {
            observations.push(parsed.data);
            return;
        }

        for (const issue of parsed.error.issues) {
            issues.push({
                position,
                path: issue.path.join('.'),
                message: issue.message,
            });
        }
    });

    return { observations, issues };
}

function extractRecords(input: unknown): unknown[] {
    if (Array.isArray(input)) {
        return input;
    }

    const batch = ObservationBatchSchema.safeParse(input);
    if (!batch.success) {
        throw new ObservationValidationError(
            'INVALID_BATCH',
            'Observation batch must be an array or an object with an observations array.',
        );
    }

    return batch.data.observations;
}
