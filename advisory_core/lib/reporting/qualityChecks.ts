import { isBefore, parseISO, subDays } from 'date-fns';

import { ADVISORY_STATES } from '../observations';
import type { PublishedAdvisoryState } from '../publication';
import type { QualityCheckResult } from './types';

export interface QualityCheckOptions {
    now?: Date;
    stalledAfterDays?: number;
    stalledWarningThreshold?: number;
}

const CVE_PATTERN = /^CVE-\d{4}-\d{4,}$/;

const DEFAULT_STALLED_AFTER_DAYS = 90;
const DEFAULT_STALLED_WARNING_THRESHOLD = 10;

export function runQualityChecks(
    rows: readonly PublishedAdvisoryState[],
    options: QualityCheckOptions = {},
): QualityCheckResult[] {
    return [
        checkStates(rows),
        checkExplanations(rows),
        checkFixedVersions(rows),
        checkVulnerabilityIds(rows),
        checkStalled(rows, options),
    ];
}

function checkStates(rows: readonly PublishedAdvisoryState[]): QualityCheckResult {
    const known: readonly string[] = ADVISORY_STATES;
    const missing = rows.filter((row) => !known.includes(row.state)).length;

    return {
        checkName: 'no_missing_states',
        passed: missing === 0,
        message: missing > 0 ? `${missing} advisories without a valid state` : 'All advisories have state',
        details: { missingCount: missing },
    };
}

function checkExplanations(rows: readonly PublishedAdvisoryState[]): QualityCheckResult {
    const missing = rows.filter((row) => row.explanation.trim().length === 0).length;

    return {
        checkName: 'explanation_completeness',
        passed: missing === 0,
        message: missing > 0 ? `${missing} advisories missing explanation` : 'All advisories have explanations',
        details: { missingCount: missing },
    };
}

function checkFixedVersions(rows: readonly PublishedAdvisoryState[]): QualityCheckResult {
    const missing = rows.filter((row) => row.state === 'fixed' && (row.fixedVersion ?? '').trim().length === 0).length;

    return {
        checkName: 'fixed_has_version',
        passed: missing === 0,
        message: missing > 0 ? `${missing} fixed advisories without version` : 'All fixed advisories have version',
        details: { missingCount: missing },
    };
}

/** Only ids that claim to be CVEs are checked; other vulnerability namespaces pass through. */
function checkVulnerabilityIds(rows: readonly PublishedAdvisoryState[]): QualityCheckResult {
    const invalid = rows.filter((row) => row.vulnerabilityId.startsWith('CVE') && !CVE_PATTERN.test(row.vulnerabilityId)).length;

    return {
        checkName: 'cve_format',
        passed: invalid === 0,
        message: invalid > 0 ? `${invalid} invalid CVE formats` : 'All CVE IDs valid',
        details: { invalidCount: invalid },
    };
}

function checkStalled(rows: readonly PublishedAdvisoryState[], options: QualityCheckOptions): QualityCheckResult {
    const days = options.stalledAfterDays ?? DEFAULT_STALLED_AFTER_DAYS;
    const threshold = options.stalledWarningThreshold ?? DEFAULT_STALLED_WARNING_THRESHOLD;
    const cutoff = subDays(options.now ?? new Date(), days);

    const stalled = rows.filter((row) => row.stateType === 'non_final' && isBefore(parseISO(row.effectiveFrom), cutoff)).length;

    return {
        checkName: 'stalled_non_final',
        passed: stalled < threshold,
        message: `${stalled} advisories in a non-final state for more than ${days} days`,
        details: { stalledCount: stalled, threshold },
    };
}
