import { z } from 'zod';

import { ObservationValidationError } from './errors';
import { SOURCE_IDS } from './sources';
import { ADVISORY_STATES } from './types';
import type { AdvisoryState, SourceObservation } from './types';

/*
 * Raw record shapes of the four feeds and their normalization into SourceObservation. Fetching
 * and file parsing happen upstream; these functions only map one decoded record.
 */

export const OverrideCsvRowSchema = z.object({
    cve_id: z.string(),
    package: z.string(),
    status: z.string().optional(),
    fixed_version: z.string().optional(),
    internal_status: z.string().optional(),
    updated_at: z.string().optional(),
});

export const RegistryRecordSchema = z.object({
    cve: z.object({
        id: z.string(),
        vulnStatus: z.string().optional(),
        lastModified: z.string().optional(),
        descriptions: z.array(z.object({ lang: z.string(), value: z.string() })).optional(),
        metrics: z.object({
            cvssMetricV31: z.array(z.object({
                cvssData: z.object({ baseScore: z.number().optional() }),
            })).optional(),
        }).optional(),
    }),
});

export const EcosystemAdvisorySchema = z.object({
    id: z.string(),
    aliases: z.array(z.string()).optional(),
    modified: z.string().optional(),
    summary: z.string().optional(),
    affected: z.array(z.object({
        package: z.object({
            name: z.string().optional(),
            ecosystem: z.string().optional(),
        }).optional(),
        ranges: z.array(z.object({
            events: z.array(z.record(z.string(), z.string())),
        })).optional(),
    })).optional(),
});

export const CorpusRowSchema = z.object({
    package: z.string(),
    cve_id: z.string(),
    fixed_version: z.string().nullable().optional(),
});

export type OverrideCsvRow = z.infer<typeof OverrideCsvRowSchema>;
export type RegistryRecord = z.infer<typeof RegistryRecordSchema>;
export type EcosystemAdvisory = z.infer<typeof EcosystemAdvisorySchema>;
export type CorpusRow = z.infer<typeof CorpusRowSchema>;

export function normalizeOverrideRow(input: unknown, observedAt: string): SourceObservation | null {
    const row = parseFeedRecord(OverrideCsvRowSchema, input, 'override row');

    const vulnerabilityId = normalizeText(row.cve_id);
    const component = normalizeText(row.package);
    if (!vulnerabilityId || !component || !vulnerabilityId.toUpperCase().startsWith('CVE-')) {
        return null;
    }

    const internalStatus = normalizeText(row.internal_status);

    return {
        sourceId: SOURCE_IDS.override,
        component,
        vulnerabilityId,
        observedAt,
        sourceUpdatedAt: normalizeText(row.updated_at),
        overrideStatus: toAdvisoryState(row.status),
        overrideReason: internalStatus,
        fixedVersion: normalizeText(row.fixed_version),
        notes: internalStatus ? `Internal classification: ${internalStatus}` : null,
        rawPayload: { ...row },
    };
}

export function normalizeRegistryRecord(input: unknown, observedAt: string): SourceObservation | null {
    const record = parseFeedRecord(RegistryRecordSchema, input, 'registry record');

    const vulnerabilityId = normalizeText(record.cve.id);
    if (!vulnerabilityId) {
        return null;
    }

    const descriptions = record.cve.descriptions ?? [];
    const english = descriptions.find((entry) => entry.lang === 'en') ?? descriptions[0];

    return {
        sourceId: SOURCE_IDS.registry,
        component: null,
        vulnerabilityId,
        observedAt,
        sourceUpdatedAt: normalizeText(record.cve.lastModified),
        rejectionStatus: record.cve.vulnStatus === 'Rejected' ? 'rejected' : 'none',
        severityScore: record.cve.metrics?.cvssMetricV31?.[0]?.cvssData.baseScore ?? null,
        notes: english ? english.value : null,
        rawPayload: { ...record },
    };
}

/**
 * One ecosystem advisory yields one observation per affected package. Advisories without a CVE
 * alias are skipped: the rest of the pipeline keys on CVE ids.
 */
export function normalizeEcosystemAdvisory(input: unknown, observedAt: string): SourceObservation[] {
    const advisory = parseFeedRecord(EcosystemAdvisorySchema, input, 'ecosystem advisory');

    const vulnerabilityId = (advisory.aliases ?? []).find((alias) => alias.startsWith('CVE-'));
    if (!vulnerabilityId) {
        return [];
    }

    const observations: SourceObservation[] = [];
    for (const affected of advisory.affected ?? []) {
        const component = normalizeText(affected.package?.name);
        if (!component) {
            continue;
        }

        const fixedVersion = findFixedVersion(affected.ranges ?? []);

        observations.push({
            sourceId: SOURCE_IDS.fixFeed,
            component,
            vulnerabilityId,
            observedAt,
            sourceUpdatedAt: normalizeText(advisory.modified),
            fixAvailable: fixedVersion !== null,
            fixedVersion,
            notes: normalizeText(advisory.summary),
            rawPayload: { vuln: advisory, affected },
        });
    }

    return observations;
}

export function normalizeCorpusRow(input: unknown, observedAt: string): SourceObservation | null {
    const row = parseFeedRecord(CorpusRowSchema, input, 'corpus row');

    const vulnerabilityId = normalizeText(row.cve_id);
    const component = normalizeText(row.package);
    if (!vulnerabilityId || !component || !vulnerabilityId.toUpperCase().startsWith('CVE-')) {
        return null;
    }

    const fixedVersion = normalizeText(row.fixed_version);

    return {
        sourceId: SOURCE_IDS.corpus,
        component,
        vulnerabilityId,
        observedAt,
        fixAvailable: fixedVersion ? true : null,
        fixedVersion,
        rawPayload: { ...row },
    };
}

function findFixedVersion(ranges: Array<{ events: Array<Record<string, string>> }>): string | null {
    for (const range of ranges) {
        for (const event of range.events) {
            const fixed = normalizeText(event.fixed);
            if (fixed) {
                return fixed;
            }
        }
    }

    return null;
}

function toAdvisoryState(value: string | undefined): AdvisoryState | null {
    const normalized = normalizeText(value)?.toLowerCase();
    if (!normalized) {
        return null;
    }

    return ADVISORY_STATES.find((state) => state === normalized) ?? null;
}

function parseFeedRecord<T>(schema: z.ZodType<T>, input: unknown, label: string): T {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        const detail = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'invalid record';
        throw new ObservationValidationError('INVALID_FEED_RECORD', `Invalid ${label}. ${detail}`);
    }

    return parsed.data;
}

function normalizeText(value: string | null | undefined): string | null {
    if (typeof value !== 'string') {
        return null;
    }

    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}
