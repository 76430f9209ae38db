import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { PipelineConfigError } from '../../lib/config';
import { runDeterminismCli } from '../../lib/data_plane/cli/determinismCli';
import { runPipelineCli } from '../../lib/data_plane/cli/pipelineCli';

function writeBatch(records: unknown[]): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'advisory-cli-'));
    const file = path.join(dir, 'observations.json');
    fs.writeFileSync(file, JSON.stringify(records), 'utf8');
    return file;
}

const RECORDS = [
    { sourceId: 'nvd', component: 'lodash', vulnerabilityId: 'CVE-2024-0001', observedAt: '2024-03-01T00:00:00Z', severityScore: 7.5 },
    { sourceId: 'osv', component: 'lodash', vulnerabilityId: 'CVE-2024-0001', observedAt: '2024-03-01T00:00:00Z', fixAvailable: true, fixedVersion: '4.17.21' },
    { sourceId: 'nvd', vulnerabilityId: 'CVE-2024-0002', observedAt: 'yesterday' },
];

describe('pipeline CLI', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('runs a batch against the in-memory store and reports skipped records', async () => {
        const file = writeBatch(RECORDS);

        const { summary, output } = await runPipelineCli(['--observations', file, '--run-id', 'cli-run'], {});

        expect(summary.observations).toBe(2);
        expect(summary.outcomes).toEqual([{
            advisoryId: 'lodash:CVE-2024-0001',
            previousState: null,
            state: 'fixed',
            reasonCode: 'UPSTREAM_FIX',
            written: true,
        }]);
        expect(summary.metrics.qualityNotes).toEqual([{
            advisoryId: null,
            kind: 'INVALID_OBSERVATION',
            message: 'Observation 2 skipped. observedAt: must be an ISO-8601 timestamp',
        }]);
        expect(JSON.parse(output)).toMatchObject({ runId: 'cli-run', written: 1 });
    });

    it('produces the same output for the same input', async () => {
        const file = writeBatch(RECORDS);
        const args = ['--observations', file, '--run-id', 'cli-run'];

        const first = await runPipelineCli(args, {});
        const second = await runPipelineCli(args, {});

        expect(first.output).toBe(second.output);
    });

    it('marks a dry run in the summary', async () => {
        const { summary } = await runPipelineCli(['--observations', writeBatch(RECORDS), '--dry-run'], {});

        expect(summary.dryRun).toBe(true);
        expect(summary.written).toBe(1);
    });

    it('rejects bad arguments before running', async () => {
        await expect(runPipelineCli([], {})).rejects.toThrow('Missing required flag --observations');
        await expect(runPipelineCli(['--observations'], {})).rejects.toThrow('Missing value for --observations');
        await expect(runPipelineCli(['--observations', 'x.json', '--store', 'redis'], {})).rejects.toThrow('--store must be memory or es.');
        await expect(runPipelineCli(['--observations', '/nonexistent/batch.json'], {})).rejects.toThrow(
            'Observation file not found: /nonexistent/batch.json',
        );
    });

    it('requires a cluster URL for the Elasticsearch store', async () => {
        await expect(runPipelineCli(['--observations', writeBatch(RECORDS), '--store', 'es'], {}))
            .rejects.toBeInstanceOf(PipelineConfigError);
    });
});

describe('determinism CLI', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('exits 0 when a rerun changes nothing', async () => {
        const result = await runDeterminismCli(['--observations', writeBatch(RECORDS), '--run-id', 'check'], {});

        expect(result.exitCode).toBe(0);
        expect(JSON.parse(result.output)).toMatchObject({
            passed: true,
            failures: [],
            firstRunWritten: 1,
            secondRunWritten: 0,
        });
    });
});
