import type { StoreRevision } from '../../history';

export interface VersionedDocument {
    id: string;
    source: unknown;
    seqNo: number;
    primaryTerm: number;
}

export type DocumentWriteOutcome = 'written' | 'conflict';

/** The document operations the history store needs from Elasticsearch. */
export interface HistoryDocumentClient {
    get(index: string, id: string): Promise<VersionedDocument | null>;
    /** `expected` null creates the document and conflicts if it exists. */
    write(index: string, id: string, document: Record<string, unknown>, expected: StoreRevision | null): Promise<DocumentWriteOutcome>;
    scan(index: string, pageSize: number): Promise<VersionedDocument[]>;
    ping(): Promise<boolean>;
}

export interface ElasticsearchConnectionOptions {
    esUrl?: string | null;
    apiKey?: string | null;
    username?: string | null;
    password?: string | null;
}

export interface ElasticsearchHistoryStoreOptions {
    client: HistoryDocumentClient;
    index: string;
    scanPageSize?: number;
}
