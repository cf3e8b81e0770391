import { ZodError } from 'zod';
import * as eventController from '../src/controllers/eventController';
import * as leadSignalController from '../src/controllers/leadSignalController';
import { identityFromLeadKey } from '../src/controllers/leadSignalController';
import { asyncHandler } from '../src/middleware/asyncHandler';
import { errorHandler, notFoundHandler } from '../src/middleware/errorHandler';
import { eventBatchSchema, validateBody } from '../src/middleware/validation';
import { submitBatch, submitEvent } from '../src/services/eventQueue';
import { InMemorySignalStore, setSignalStore } from '../src/services/signalStore';
import { InvalidEventError, QueueFullError, SweepInProgressError } from '../src/utils/appError';
import { Platform, RoutingCommandType } from '../src/types';
import { flushAsync } from './helpers/fixtures';
import { mockRequest, mockResponse } from './helpers/http';

jest.mock('../src/services/observabilityService', () => ({
    logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() }
}));

jest.mock('../src/services/eventQueue', () => ({
    submitEvent: jest.fn(),
    submitBatch: jest.fn()
}));

const mockedSubmitEvent = jest.mocked(submitEvent);
const mockedSubmitBatch = jest.mocked(submitBatch);

describe('Event Controller', () => {
    beforeEach(() => {
        mockedSubmitEvent.mockReset();
        mockedSubmitBatch.mockReset();
    });

    it('should answer 422 with details for a rejected event', async () => {
        mockedSubmitEvent.mockResolvedValue({
            status: 'rejected',
            reason: 'Event has no lead identity',
            details: ['lead_id or email is required'],
            commands: []
        });
        const { res, status, json } = mockResponse();

        await eventController.submitEvent(mockRequest({ body: { event_type: 'email_opened' } }), res);

        expect(status).toHaveBeenCalledWith(422);
        expect(json).toHaveBeenCalledWith({
            success: false,
            error: 'Event has no lead identity',
            code: 'INVALID_EVENT',
            retryable: false,
            details: ['lead_id or email is required']
        });
    });

    it.each([
        ['applied', 200],
        ['duplicate', 200],
        ['failed', 503]
    ] as const)('should answer a %s event with %p', async (outcome, code) => {
        mockedSubmitEvent.mockResolvedValue({ status: outcome, commands: [] });
        const { res, status } = mockResponse();

        await eventController.submitEvent(mockRequest(), res);

        expect(status).toHaveBeenCalledWith(code);
    });

    it('should answer 202 for a queued event', async () => {
        const queued = { status: 'queued', jobId: 'event-abc', dedupKey: 'src:outreach_platform:open-1', commands: [] } as const;
        mockedSubmitEvent.mockResolvedValue({ ...queued, commands: [] });
        const { res, status, json } = mockResponse();

        await eventController.submitEvent(mockRequest(), res);

        expect(status).toHaveBeenCalledWith(202);
        expect(json).toHaveBeenCalledWith({ success: true, data: { ...queued, commands: [] } });
    });

    it('should answer 202 only when a whole batch was queued', async () => {
        const summary = { total: 2, applied: 0, duplicate: 0, rejected: 0, failed: 0, transitions: 0, queued: 2 };
        mockedSubmitBatch.mockResolvedValueOnce({ results: [], summary });
        mockedSubmitBatch.mockResolvedValueOnce({ results: [], summary: { ...summary, applied: 1, queued: 1 } });

        const queued = mockResponse();
        await eventController.submitBatch(mockRequest({ body: { events: [{}, {}] } }), queued.res);
        const mixed = mockResponse();
        await eventController.submitBatch(mockRequest({ body: { events: [{}, {}] } }), mixed.res);

        expect(queued.status).toHaveBeenCalledWith(202);
        expect(mixed.status).toHaveBeenCalledWith(200);
    });
});

describe('Lead Signal Controller', () => {
    beforeEach(() => {
        setSignalStore(new InMemorySignalStore());
    });

    it('should read a lead key as an email or a lead id', () => {
        expect(identityFromLeadKey(' Ada@Example.com ')).toEqual({ email: 'ada@example.com' });
        expect(identityFromLeadKey('lead-9')).toEqual({ leadId: 'lead-9' });
    });

    it('should assign a lead and return its commands', async () => {
        const { res, status, json } = mockResponse();

        await leadSignalController.assign(
            mockRequest({
                method: 'POST',
                params: { leadKey: 'lead-9' },
                body: { platform: 'outreach', actor: 'ops@example.com' }
            }),
            res
        );

        expect(status).toHaveBeenCalledWith(200);
        const body = json.mock.calls[0][0];
        expect(body.success).toBe(true);
        expect(body.data.changed).toBe(true);
        expect(body.data.transition).toMatchObject({ from_platform: Platform.NONE, to_platform: Platform.OUTREACH });
        expect(body.data.commands.map((c: { type: string }) => c.type)).toEqual([RoutingCommandType.ENROLL_IN_OUTREACH]);
    });

    it('should refuse to override a lead to none', async () => {
        const { res } = mockResponse();

        await expect(
            leadSignalController.override(
                mockRequest({ params: { leadKey: 'lead-9' }, body: { platform: 'none', actor: 'ops@example.com' } }),
                res
            )
        ).rejects.toBeInstanceOf(ZodError);
    });

    it('should forward controller failures to the error handler', async () => {
        const next = jest.fn();
        const handler = asyncHandler(leadSignalController.override);

        handler(mockRequest({ params: { leadKey: 'lead-9' }, body: {} }), mockResponse().res, next);
        await flushAsync();

        expect(next).toHaveBeenCalledTimes(1);
        expect(next.mock.calls[0][0]).toBeInstanceOf(ZodError);
    });
});

describe('Error Handler', () => {
    it('should ask the client to retry when the queue is full', () => {
        const { res, status, json, setHeader } = mockResponse();

        errorHandler(new QueueFullError(1000), mockRequest(), res, jest.fn());

        expect(setHeader).toHaveBeenCalledWith('Retry-After', '5');
        expect(status).toHaveBeenCalledWith(503);
        expect(json).toHaveBeenCalledWith({
            success: false,
            error: 'Ingestion queue full (1000 waiting)',
            code: 'QUEUE_FULL',
            retryable: true
        });
    });

    it('should answer 409 while a reconciliation sweep is running', () => {
        const { res, status, json } = mockResponse();

        errorHandler(new SweepInProgressError(), mockRequest(), res, jest.fn());

        expect(status).toHaveBeenCalledWith(409);
        expect(json).toHaveBeenCalledWith({
            success: false,
            error: 'A reconciliation sweep is already running',
            code: 'SWEEP_IN_PROGRESS',
            retryable: true
        });
    });

    it('should include validator details for an invalid event', () => {
        const { res, status, json } = mockResponse();

        errorHandler(new InvalidEventError('Malformed event', ['source: Required']), mockRequest(), res, jest.fn());

        expect(status).toHaveBeenCalledWith(422);
        expect(json).toHaveBeenCalledWith({
            success: false,
            error: 'Malformed event',
            code: 'INVALID_EVENT',
            retryable: false,
            details: ['source: Required']
        });
    });

    it('should map schema failures to 400', () => {
        const { res, status, json } = mockResponse();
        const parsed = eventBatchSchema.safeParse({ events: 'nope' });
        if (parsed.success) throw new Error('expected a schema failure');

        errorHandler(parsed.error, mockRequest(), res, jest.fn());

        expect(status).toHaveBeenCalledWith(400);
        expect(json.mock.calls[0][0]).toMatchObject({ code: 'VALIDATION_FAILED', details: [{ field: 'events' }] });
    });

    it('should hide unexpected errors behind a 500', () => {
        const { res, status, json } = mockResponse();

        errorHandler(new Error('undefined is not a function'), mockRequest(), res, jest.fn());

        expect(status).toHaveBeenCalledWith(500);
        expect(json).toHaveBeenCalledWith({
            success: false,
            error: 'Internal Server Error',
            code: 'INTERNAL',
            retryable: false
        });
    });

    it('should name the missing route', () => {
        const { res, status, json } = mockResponse();

        notFoundHandler(mockRequest({ method: 'GET', path: '/api/nope' }), res);

        expect(status).toHaveBeenCalledWith(404);
        expect(json.mock.calls[0][0].error).toBe('Route GET /api/nope not found');
    });
});

describe('validateBody', () => {
    it('should reject an empty batch before it reaches the controller', () => {
        const { res, status, json } = mockResponse();
        const next = jest.fn();

        validateBody(eventBatchSchema)(mockRequest({ body: { events: [] } }), res, next);

        expect(next).not.toHaveBeenCalled();
        expect(status).toHaveBeenCalledWith(400);
        expect(json).toHaveBeenCalledWith({
            success: false,
            error: 'Validation failed',
            code: 'VALIDATION_FAILED',
            retryable: false,
            details: [{ field: 'events', message: 'events must contain at least one event' }]
        });
    });

    it('should pass a valid batch through', () => {
        const next = jest.fn();

        validateBody(eventBatchSchema)(mockRequest({ body: { events: [{}] } }), mockResponse().res, next);

        expect(next).toHaveBeenCalledTimes(1);
    });
});
