/**
 * Request Validation Middleware
 *
 * Uses Zod schemas to validate request bodies and query parameters.
 * Returns structured 400 errors with field-level details on validation
 * failure. Engagement events themselves are validated by the event
 * validator (422), not here: these schemas only check the envelope.
 */

import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { Platform } from '../types';
import { errorResponse } from '../utils/response';

// ============================================================================
// VALIDATION MIDDLEWARE
// ============================================================================

function issueDetails(error: z.ZodError): Array<{ field: string; message: string }> {
    return error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message
    }));
}

/**
 * Validate request body against a Zod schema.
 */
export function validateBody(schema: z.ZodType) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const result = schema.safeParse(req.body);
        if (!result.success) {
            errorResponse(res, 400, {
                error: 'Validation failed',
                code: 'VALIDATION_FAILED',
                retryable: false,
                details: issueDetails(result.error)
            });
            return;
        }
        req.body = result.data;
        next();
    };
}

/**
 * Validate query parameters against a Zod schema. Controllers parse the
 * query again with the same schema to get typed values.
 */
export function validateQuery(schema: z.ZodType) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const result = schema.safeParse(req.query);
        if (!result.success) {
            errorResponse(res, 400, {
                error: 'Invalid query parameters',
                code: 'VALIDATION_FAILED',
                retryable: false,
                details: issueDetails(result.error)
            });
            return;
        }
        next();
    };
}

// ============================================================================
// SCHEMAS: Ingestion
// ============================================================================

export const MAX_BATCH_SIZE = 500;

export const eventEnvelopeSchema = z.record(z.string(), z.unknown());

export const eventBatchSchema = z.object({
    events: z
        .array(z.unknown())
        .min(1, 'events must contain at least one event')
        .max(MAX_BATCH_SIZE, `events must contain at most ${MAX_BATCH_SIZE} events`)
});

// ============================================================================
// SCHEMAS: Operator actions
// ============================================================================

const routedPlatformSchema = z.enum([Platform.OUTREACH, Platform.HYBRID, Platform.CRM]);

export const platformChangeSchema = z.object({
    platform: routedPlatformSchema,
    actor: z.string().trim().min(1, 'actor is required').max(200),
    note: z.string().trim().max(1000).optional()
});

export const reconcileSchema = z.object({
    batchSize: z.number().int().positive().max(1000).optional(),
    cursor: z.string().min(1).nullable().optional(),
    asOf: z.coerce.date().optional()
});

// ============================================================================
// SCHEMAS: Queries
// ============================================================================

export const limitQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).default(50)
});

export const eligibleQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(500).default(100),
    cursor: z.string().min(1).optional(),
    asOf: z.coerce.date().optional()
});
