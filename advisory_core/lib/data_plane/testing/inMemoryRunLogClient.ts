import type { RunLogClient, RunLogEntry, RunLogWriteReport } from '../../runtime/runLogging';

type UnknownRecord = Record<string, unknown>;

type StoredDoc = {
    id: string;
    source: UnknownRecord;
};

export class InMemoryRunLogClient implements RunLogClient {
    private readonly indexStore = new Map<string, Map<string, UnknownRecord>>();

    readonly operationHistory: Array<{ index: string; id: string }> = [];

    failIds = new Set<string>();
    throwOnBulk = false;

    async bulkUpsert(
        index: string,
        entries: RunLogEntry[],
        _options: { refresh?: 'true' | 'false' | 'wait_for' } = {},
    ): Promise<RunLogWriteReport> {
        if (this.throwOnBulk) {
            throw new Error('bulk unavailable');
        }

        let succeeded = 0;
        let firstFailure: RunLogWriteReport['firstFailure'] = null;

        for (const entry of entries) {
            this.operationHistory.push({ index, id: entry.id });

            if (this.failIds.has(entry.id)) {
                firstFailure = firstFailure ?? { id: entry.id, status: 409, reason: 'conflict' };
                continue;
            }

            this.getBucket(index).set(entry.id, structuredClone(entry.document));
            succeeded += 1;
        }

        return {
            attempted: entries.length,
            succeeded,
            failed: entries.length - succeeded,
            firstFailure,
        };
    }

    list(index: string): StoredDoc[] {
        const bucket = this.indexStore.get(index);
        if (!bucket) {
            return [];
        }

        return Array.from(bucket.entries())
            .map(([id, source]) => ({ id, source: structuredClone(source) }))
            .sort((left, right) => left.id.localeCompare(right.id));
    }

    get(index: string, id: string): UnknownRecord | null {
        const doc = this.indexStore.get(index)?.get(id);
        return doc ? structuredClone(doc) : null;
    }

    count(index: string): number {
        return this.indexStore.get(index)?.size ?? 0;
    }

    clear(): void {
        this.indexStore.clear();
        this.operationHistory.length = 0;
    }

    private getBucket(index: string): Map<string, UnknownRecord> {
        let bucket = this.indexStore.get(index);
        if (!bucket) {
            bucket = new Map();
            this.indexStore.set(index, bucket);
        }

        return bucket;
    }
}
