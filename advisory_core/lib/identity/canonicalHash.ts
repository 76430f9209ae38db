import { createHash } from 'node:crypto';

import { IdentityGenerationError } from './errors';
import type { CanonicalHashInput } from './types';

type UnknownRecord = Record<string, unknown>;

export function buildCanonicalHash(input: CanonicalHashInput): string {
    if (!isRecord(input)) {
        throw new IdentityGenerationError('INVALID_IDENTITY_INPUT', 'Canonical hash input must be an object.');
    }

    const canonical = stableStringify(input);
    return createHash('sha256').update(canonical, 'utf8').digest('hex');
}

export function stableStringify(input: unknown, spaces = 0): string {
    const canonicalized = canonicalize(input);
    return JSON.stringify(canonicalized, null, spaces);
}

function canonicalize(value: unknown): unknown {
    if (value === undefined) {
        return null;
    }

    if (value === null || typeof value !== 'object') {
        return value;
    }

    if (Array.isArray(value)) {
        return value.map((entry) => canonicalize(entry));
    }

    if (!isRecord(value)) {
        return value;
    }

    const asRecord = value;
    const sortedKeys = Object.keys(asRecord).sort((left, right) => left.localeCompare(right));

    return sortedKeys.reduce<UnknownRecord>((acc, key) => {
        acc[key] = canonicalize(asRecord[key]);
        return acc;
    }, {});
}

function isRecord(value: unknown): value is UnknownRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
