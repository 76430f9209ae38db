import { IdentityGenerationError } from './errors';
import { buildCanonicalHash } from './canonicalHash';
import type { AdvisoryIdentity, AdvisoryIdentityInput, HistoryRecordIdentityInput } from './types';

type UnknownRecord = Record<string, unknown>;

const COMPONENT_SEPARATOR = ':';

/**
 * The single canonicalization of an advisory identity. The aggregator, the resolver, the history
 * manager and the publication layer all key advisories through this function.
 */
export function canonicalizeAdvisoryIdentity(input: AdvisoryIdentityInput): AdvisoryIdentity {
    const record = expectRecord(input);

    const vulnerabilityId = expectRequiredString(record.vulnerabilityId, 'vulnerabilityId').toUpperCase();
    const component = normalizeNullableString(record.component, 'component');

    return {
        advisoryId: component === null ? vulnerabilityId : `${component}${COMPONENT_SEPARATOR}${vulnerabilityId}`,
        component,
        vulnerabilityId,
    };
}

export function tryCanonicalizeAdvisoryIdentity(input: AdvisoryIdentityInput): AdvisoryIdentity | null {
    try {
        return canonicalizeAdvisoryIdentity(input);
    } catch (error) {
        if (error instanceof IdentityGenerationError) {
            return null;
        }

        throw error;
    }
}

/**
 * Recovers the identity behind a canonical advisory id. The component is everything before the
 * last separator; ids that are not already canonical are rejected.
 */
export function identityFromAdvisoryId(advisoryId: string): AdvisoryIdentity {
    const trimmed = expectRequiredString(advisoryId, 'advisoryId');
    const separator = trimmed.lastIndexOf(COMPONENT_SEPARATOR);

    const identity = separator <= 0
        ? canonicalizeAdvisoryIdentity({ vulnerabilityId: trimmed })
        : canonicalizeAdvisoryIdentity({
            component: trimmed.slice(0, separator),
            vulnerabilityId: trimmed.slice(separator + 1),
        });

    if (identity.advisoryId !== advisoryId) {
        throw new IdentityGenerationError(
            'INVALID_IDENTITY_INPUT',
            `advisoryId ${advisoryId} is not canonical; expected ${identity.advisoryId}.`,
            'advisoryId',
        );
    }

    return identity;
}

export function generateHistoryRecordId(input: HistoryRecordIdentityInput): string {
    const record = expectRecord(input);

    const advisoryId = expectRequiredString(record.advisoryId, 'advisoryId');
    const runId = expectRequiredString(record.runId, 'runId');
    const effectiveFrom = expectRequiredString(record.effectiveFrom, 'effectiveFrom');

    return buildCanonicalHash({
        kind: 'advisory_state',
        advisoryId,
        runId,
        effectiveFrom,
    });
}

function expectRecord(value: unknown): UnknownRecord {
    if (!isRecord(value)) {
        throw new IdentityGenerationError('INVALID_IDENTITY_INPUT', 'Identity input must be an object.');
    }

    return value;
}

function isRecord(value: unknown): value is UnknownRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRequiredString(value: unknown, field: string): string {
    if (typeof value !== 'string') {
        throw new IdentityGenerationError('MISSING_REQUIRED_FIELD', `${field} must be a non-empty string.`, field);
    }

    const trimmed = value.trim();
    if (trimmed.length === 0) {
        throw new IdentityGenerationError('MISSING_REQUIRED_FIELD', `${field} must be a non-empty string.`, field);
    }

    return trimmed;
}

function normalizeNullableString(value: unknown, field: string): string | null {
    if (value === null || value === undefined) {
        return null;
    }

    if (typeof value !== 'string') {
        throw new IdentityGenerationError('INVALID_IDENTITY_INPUT', `${field} must be string, null, or undefined.`, field);
    }

    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}
