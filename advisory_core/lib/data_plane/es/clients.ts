import { Client, errors } from '@elastic/elasticsearch';
import type { estypes } from '@elastic/elasticsearch';

import { PipelineConfigError } from '../../config';
import type { RunLogClient, RunLogEntry, RunLogWriteReport } from '../../runtime/runLogging';
import type { ElasticsearchClientLike } from '../mappings';
import type { ElasticsearchConnectionOptions, HistoryDocumentClient, VersionedDocument } from './types';

export function createElasticsearchClient(options: ElasticsearchConnectionOptions): Client {
    if (!options.esUrl) {
        throw new PipelineConfigError('MISSING_CREDENTIALS', 'ES_URL is required for the Elasticsearch store.');
    }

    if (options.apiKey) {
        return new Client({ node: options.esUrl, auth: { apiKey: options.apiKey } });
    }

    if (options.username && options.password) {
        return new Client({ node: options.esUrl, auth: { username: options.username, password: options.password } });
    }

    throw new PipelineConfigError(
        'MISSING_CREDENTIALS',
        'Elasticsearch credentials missing. Set ES_API_KEY or ES_USERNAME and ES_PASSWORD.',
    );
}

export function historyDocumentClientOf(client: Client): HistoryDocumentClient {
    return {
        get: async (index, id) => {
            const response = await client.get<unknown>({ index, id }, { ignore: [404] });
            if (!response.found || response._seq_no === undefined || response._primary_term === undefined) {
                return null;
            }

            return {
                id: response._id,
                source: response._source,
                seqNo: response._seq_no,
                primaryTerm: response._primary_term,
            };
        },
        write: async (index, id, document, expected) => {
            try {
                await client.index({
                    index,
                    id,
                    document,
                    refresh: 'wait_for',
                    ...(expected
                        ? { if_seq_no: expected.seqNo, if_primary_term: expected.primaryTerm }
                        : { op_type: 'create' as const }),
                });
                return 'written';
            } catch (error) {
                if (error instanceof errors.ResponseError && error.statusCode === 409) {
                    return 'conflict';
                }
                throw error;
            }
        },
        scan: async (index, pageSize) => scanIndex(client, index, pageSize),
        ping: async () => client.ping(),
    };
}

async function scanIndex(client: Client, index: string, pageSize: number): Promise<VersionedDocument[]> {
    const documents: VersionedDocument[] = [];
    let searchAfter: estypes.SortResults | undefined;

    for (;;) {
        let response: estypes.SearchResponse<unknown>;
        try {
            response = await client.search<unknown>({
                index,
                size: pageSize,
                seq_no_primary_term: true,
                sort: [{ advisoryId: 'asc' }],
                query: { match_all: {} },
                ...(searchAfter ? { search_after: searchAfter } : {}),
            });
        } catch (error) {
            if (error instanceof errors.ResponseError && error.statusCode === 404) {
                return documents;
            }
            throw error;
        }

        const hits = response.hits.hits;
        for (const hit of hits) {
            if (typeof hit._id !== 'string') {
                continue;
            }

            documents.push({
                id: hit._id,
                source: hit._source,
                seqNo: hit._seq_no ?? 0,
                primaryTerm: hit._primary_term ?? 0,
            });
        }

        const last = hits[hits.length - 1];
        if (hits.length < pageSize || !last?.sort) {
            return documents;
        }
        searchAfter = last.sort;
    }
}

export function runLogClientOf(client: Client): RunLogClient {
    return {
        bulkUpsert: async (index, entries, options = {}) => bulkUpsert(client, index, entries, options.refresh ?? 'wait_for'),
    };
}

async function bulkUpsert(
    client: Client,
    index: string,
    entries: RunLogEntry[],
    refresh: 'true' | 'false' | 'wait_for',
): Promise<RunLogWriteReport> {
    if (entries.length === 0) {
        return { attempted: 0, succeeded: 0, failed: 0, firstFailure: null };
    }

    const operations: Array<Record<string, unknown>> = [];
    for (const entry of entries) {
        operations.push({ index: { _index: index, _id: entry.id } });
        operations.push(entry.document);
    }

    const response = await client.bulk({ refresh, operations });

    let succeeded = 0;
    let firstFailure: RunLogWriteReport['firstFailure'] = null;
    response.items.forEach((item, position) => {
        const result = item.index;
        if (result && result.status < 300) {
            succeeded += 1;
            return;
        }

        if (!firstFailure) {
            firstFailure = {
                id: result?._id ?? entries[position]?.id ?? 'unknown',
                status: result?.status ?? 0,
                reason: result?.error?.reason ?? result?.error?.type ?? 'unknown bulk failure',
            };
        }
    });

    return {
        attempted: entries.length,
        succeeded,
        failed: entries.length - succeeded,
        firstFailure,
    };
}

export function indicesClientOf(client: Client): ElasticsearchClientLike {
    return {
        indices: {
            exists: async (params) => client.indices.exists(params),
            create: async (params) => client.indices.create(params),
            getMapping: async (params) => client.indices.getMapping(params),
        },
    };
}
