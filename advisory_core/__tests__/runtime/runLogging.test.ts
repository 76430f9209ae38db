import { InMemoryRunLogClient } from '../../lib/data_plane/testing/inMemoryRunLogClient';
import { RunLogger, sha256, toTaskError } from '../../lib/runtime/runLogging';

function setup() {
    const client = new InMemoryRunLogClient();
    const logger = new RunLogger({ client, runId: 'run-1', executionMode: 'memory', clock: () => 5000 });
    return { client, logger };
}

describe('RunLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('upserts the run header under the run id', async () => {
        const { client, logger } = setup();

        await logger.writeRun({ status: 'RUNNING', startedAt: 1000, endedAt: null, stageSummary: {}, counts: {}, errorSummary: null });
        await logger.writeRun({ status: 'SUCCEEDED', startedAt: 1000, endedAt: 500, stageSummary: { written: 2 }, counts: { fixed: 2 }, errorSummary: null });

        expect(client.count('advisory_runs')).toBe(1);
        expect(client.get('advisory_runs', 'run-1')).toEqual({
            runId: 'run-1',
            executionMode: 'memory',
            pipelineVersion: '1.0',
            status: 'SUCCEEDED',
            startedAt: '1970-01-01T00:00:01.000Z',
            endedAt: '1970-01-01T00:00:01.000Z',
            stageSummary: { written: 2 },
            counts: { fixed: 2 },
            errorSummary: null,
            updatedAt: '1970-01-01T00:00:05.000Z',
        });
    });

    it('keys stage tasks deterministically and numbers them in order', async () => {
        const { client, logger } = setup();

        await logger.writeStageStart('VALIDATE', 1000);
        await logger.writeStageTerminal({ stage: 'VALIDATE', status: 'SUCCEEDED', startedAt: 1000, endedAt: 1250 });

        const startId = sha256('run-1|VALIDATE|validate.stage.start');
        const endId = sha256('run-1|VALIDATE|validate.stage.end');

        expect(client.get('advisory_tasklogs', startId)).toMatchObject({ seq: 1, status: 'STARTED', message: 'VALIDATE stage started', durationMs: 0 });
        expect(client.get('advisory_tasklogs', endId)).toMatchObject({
            seq: 2,
            taskId: endId,
            status: 'SUCCEEDED',
            message: 'VALIDATE stage succeeded',
            durationMs: 250,
            error: { code: 'NONE', message: 'none', stack: '', type: 'Error' },
        });
    });

    it('truncates long error messages', async () => {
        const { client, logger } = setup();

        await logger.writeStageTerminal({
            stage: 'WRITE',
            status: 'FAILED',
            startedAt: 1000,
            endedAt: 1000,
            error: { code: 'WRITE_CONFLICT', message: 'x'.repeat(8005) },
        });

        const doc = client.get('advisory_tasklogs', sha256('run-1|WRITE|write.stage.end'));
        expect(doc?.error).toEqual({
            code: 'WRITE_CONFLICT',
            message: `${'x'.repeat(8000)}...[truncated 5 chars]`,
            stack: '',
            type: 'Error',
        });
    });

    it('reports failed writes without throwing', async () => {
        const { client, logger } = setup();
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        client.failIds.add('run-1');

        await logger.writeRun({ status: 'RUNNING', startedAt: 1000, endedAt: null, stageSummary: {}, counts: {}, errorSummary: null });

        expect(error).toHaveBeenCalledWith(
            '[RunLogger] Failed to write run header for runId=run-1. First failure:',
            { id: 'run-1', status: 409, reason: 'conflict' },
        );
    });

    it('swallows a client that throws', async () => {
        const { client, logger } = setup();
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        client.throwOnBulk = true;

        await expect(logger.writeStageStart('DECIDE', 1000)).resolves.toBeUndefined();
        expect(error).toHaveBeenCalledWith('[RunLogger] Error writing task log for decide.stage.start:', expect.any(Error));
    });
});

describe('toTaskError', () => {
    it('keeps the code of coded errors', () => {
        const error = Object.assign(new Error('store offline'), { code: 'STORE_UNAVAILABLE' });

        expect(toTaskError(error)).toMatchObject({ code: 'STORE_UNAVAILABLE', message: 'store offline', type: 'Error' });
    });

    it('describes thrown non-errors', () => {
        expect(toTaskError('boom')).toEqual({ code: 'UNEXPECTED', message: 'boom', type: 'Error' });
    });
});
