import {
    configureInlineLimits,
    getDeadLetterJobs,
    getQueueStatus,
    retryDeadLetterJob,
    shutdownEventQueue,
    submitBatch,
    submitEvent
} from '../src/services/eventQueue';
import { ingestBatch, ingestEvent, IngestResult } from '../src/services/routingService';
import { QueueFullError } from '../src/utils/appError';
import { flushAsync } from './helpers/fixtures';

jest.mock('../src/services/observabilityService', () => ({
    logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() }
}));

jest.mock('../src/services/routingService', () => ({
    ingestEvent: jest.fn(),
    ingestBatch: jest.fn(),
    recordRejection: jest.fn()
}));

const mockedIngest = jest.mocked(ingestEvent);
const mockedIngestBatch = jest.mocked(ingestBatch);

const APPLIED: IngestResult = { status: 'applied', commands: [] };

function deferred<T>() {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((res) => {
        resolve = res;
    });
    return { promise, resolve };
}

describe('Event Queue (inline mode)', () => {
    beforeEach(() => {
        mockedIngest.mockReset();
        mockedIngestBatch.mockReset();
        configureInlineLimits({ maxInFlight: 1, maxDepth: 1 });
    });

    it('should hold one waiter and refuse work beyond the depth', async () => {
        const gate = deferred<IngestResult>();
        mockedIngest.mockReturnValueOnce(gate.promise).mockResolvedValue(APPLIED);

        const first = submitEvent({ n: 1 });
        const second = submitEvent({ n: 2 });
        const third = submitEvent({ n: 3 });

        await expect(third).rejects.toBeInstanceOf(QueueFullError);
        await expect(third).rejects.toThrow('Ingestion queue full (1 waiting)');
        expect(await getQueueStatus()).toMatchObject({ mode: 'inline', activeCount: 1, waitingCount: 1 });
        expect(mockedIngest).toHaveBeenCalledTimes(1);

        gate.resolve(APPLIED);

        await expect(first).resolves.toEqual(APPLIED);
        await expect(second).resolves.toEqual(APPLIED);
        expect(mockedIngest).toHaveBeenCalledTimes(2);
        expect(mockedIngest).toHaveBeenLastCalledWith({ n: 2 });
        expect(await getQueueStatus()).toMatchObject({ activeCount: 0, waitingCount: 0 });
    });

    it('should release the slot when ingestion throws', async () => {
        mockedIngest.mockRejectedValueOnce(new Error('boom')).mockResolvedValue(APPLIED);

        await expect(submitEvent({ n: 1 })).rejects.toThrow('boom');
        await expect(submitEvent({ n: 2 })).resolves.toEqual(APPLIED);
        expect((await getQueueStatus()).lastError).toBe('boom');
    });

    it('should run a batch inline with nothing queued', async () => {
        mockedIngestBatch.mockResolvedValue({
            results: [APPLIED],
            summary: { total: 1, applied: 1, duplicate: 0, rejected: 0, failed: 0, transitions: 0 }
        });

        const result = await submitBatch([{ n: 1 }]);

        expect(mockedIngestBatch).toHaveBeenCalledWith([{ n: 1 }]);
        expect(result.summary).toEqual({ total: 1, applied: 1, duplicate: 0, rejected: 0, failed: 0, transitions: 0, queued: 0 });
    });

    it('should have no dead-letter set without a queue', async () => {
        expect(await getDeadLetterJobs()).toEqual([]);
        expect(await retryDeadLetterJob('event-1')).toBe(false);
    });

    it('should wait for in-flight events on shutdown', async () => {
        const gate = deferred<IngestResult>();
        mockedIngest.mockReturnValueOnce(gate.promise);

        const pending = submitEvent({ n: 1 });
        let stopped = false;
        const shutdown = shutdownEventQueue().then(() => {
            stopped = true;
        });

        await flushAsync();
        expect(stopped).toBe(false);

        gate.resolve(APPLIED);
        await pending;
        await shutdown;

        expect(stopped).toBe(true);
        expect((await getQueueStatus()).isRunning).toBe(false);
    });
});
