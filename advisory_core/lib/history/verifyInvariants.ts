import type { HistoryInvariantReport, HistoryInvariantViolation, HistoryStore } from './types';

/**
 * Audits every advisory in a store: at most one current version, which is open-ended, and every
 * closed version ends no later than the current one starts.
 */
export async function verifyHistoryInvariants(store: HistoryStore): Promise<HistoryInvariantReport> {
    const advisoryIds = await store.listAdvisoryIds();
    const violations: HistoryInvariantViolation[] = [];

    for (const advisoryId of advisoryIds) {
        const stored = await store.read(advisoryId);
        if (!stored) {
            continue;
        }

        const { records, currentIndex } = stored.document;
        const currentPositions = records
            .map((record, index) => (record.isCurrent ? index : -1))
            .filter((index) => index >= 0);

        if (currentPositions.length > 1) {
            violations.push({
                advisoryId,
                kind: 'MULTIPLE_CURRENT',
                recordId: null,
                message: `${currentPositions.length} records are marked current.`,
            });
        }

        const expectedIndex = currentPositions.length === 1 ? currentPositions[0] : null;
        if (currentPositions.length <= 1 && expectedIndex !== currentIndex) {
            violations.push({
                advisoryId,
                kind: 'CURRENT_INDEX_MISMATCH',
                recordId: null,
                message: `currentIndex is ${String(currentIndex)} but the current record is at ${String(expectedIndex)}.`,
            });
        }

        const current = expectedIndex === null ? null : records[expectedIndex];
        if (current && current.effectiveTo !== null) {
            violations.push({
                advisoryId,
                kind: 'CURRENT_NOT_OPEN',
                recordId: current.recordId,
                message: 'Current record has an effectiveTo.',
            });
        }

        for (const record of records) {
            if (record.isCurrent) {
                continue;
            }

            if (record.effectiveTo === null) {
                violations.push({
                    advisoryId,
                    kind: 'CLOSED_NOT_ENDED',
                    recordId: record.recordId,
                    message: 'Closed record has no effectiveTo.',
                });
                continue;
            }

            if (current && Date.parse(record.effectiveTo) > Date.parse(current.effectiveFrom)) {
                violations.push({
                    advisoryId,
                    kind: 'CLOSED_AFTER_CURRENT',
                    recordId: record.recordId,
                    message: `Closed record ends at ${record.effectiveTo}, after the current record starts at ${current.effectiveFrom}.`,
                });
            }
        }
    }

    return {
        ok: violations.length === 0,
        advisoriesChecked: advisoryIds.length,
        violations,
    };
}
