import { HistoryStoreError, currentRecordOf } from '../../history';
import type {
    AdvisoryHistoryDocument,
    AdvisoryStateRecord,
    CommitOutcome,
    HistoryStore,
    StoreRevision,
    StoredHistory,
} from '../../history';
import { decodeHistoryDocument, encodeHistoryDocument } from './historyDocument';
import type { ElasticsearchHistoryStoreOptions, HistoryDocumentClient } from './types';

const DEFAULT_SCAN_PAGE_SIZE = 500;

/**
 * One document per advisory, keyed by advisory id. Commits are guarded by `if_seq_no` /
 * `if_primary_term`, so closing the previous version and appending the next one is a single
 * conditional write.
 */
export class ElasticsearchHistoryStore implements HistoryStore {
    private readonly client: HistoryDocumentClient;
    private readonly index: string;
    private readonly scanPageSize: number;

    constructor(options: ElasticsearchHistoryStoreOptions) {
        this.client = options.client;
        this.index = options.index;
        this.scanPageSize = options.scanPageSize ?? DEFAULT_SCAN_PAGE_SIZE;
    }

    async read(advisoryId: string): Promise<StoredHistory | null> {
        const found = await this.guard(`read ${advisoryId}`, () => this.client.get(this.index, advisoryId));
        if (!found) {
            return null;
        }

        return {
            document: decodeHistoryDocument(found.id, found.source),
            revision: { seqNo: found.seqNo, primaryTerm: found.primaryTerm },
        };
    }

    async commit(document: AdvisoryHistoryDocument, expected: StoreRevision | null): Promise<CommitOutcome> {
        const outcome = await this.guard(`commit ${document.advisoryId}`, () => this.client.write(
            this.index,
            document.advisoryId,
            encodeHistoryDocument(document),
            expected,
        ));

        return outcome === 'written' ? 'committed' : 'conflict';
    }

    async listCurrent(): Promise<AdvisoryStateRecord[]> {
        const documents = await this.scanDocuments();

        return documents
            .map((document) => currentRecordOf(document))
            .filter((record): record is AdvisoryStateRecord => record !== null)
            .sort((left, right) => left.advisoryId.localeCompare(right.advisoryId));
    }

    async listAdvisoryIds(): Promise<string[]> {
        const documents = await this.scanDocuments();
        return documents.map((document) => document.advisoryId).sort((left, right) => left.localeCompare(right));
    }

    async ping(): Promise<void> {
        let reachable: boolean;
        try {
            reachable = await this.client.ping();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new HistoryStoreError('STORE_UNAVAILABLE', `Elasticsearch is unreachable: ${message}`, { cause: error });
        }

        if (!reachable) {
            throw new HistoryStoreError('STORE_UNAVAILABLE', 'Elasticsearch did not answer ping.');
        }
    }

    private async scanDocuments(): Promise<AdvisoryHistoryDocument[]> {
        const hits = await this.guard('scan', () => this.client.scan(this.index, this.scanPageSize));
        return hits.map((hit) => decodeHistoryDocument(hit.id, hit.source));
    }

    private async guard<T>(operation: string, work: () => Promise<T>): Promise<T> {
        try {
            return await work();
        } catch (error) {
            if (error instanceof HistoryStoreError) {
                throw error;
            }

            const message = error instanceof Error ? error.message : String(error);
            throw new HistoryStoreError('STORE_REQUEST_FAILED', `History store ${operation} failed: ${message}`, { cause: error });
        }
    }
}
