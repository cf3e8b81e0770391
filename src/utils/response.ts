/**
 * API Response Helpers
 *
 * Every body the API sends has one of two shapes:
 * Success: { success: true, data }
 * Error:   { success: false, error, code, retryable, ...extra }
 */

import { Response } from 'express';

interface SuccessBody<T> {
    success: true;
    data: T;
}

export interface ErrorBody {
    error: string;
    code: string;
    retryable: boolean;
    details?: unknown[];
    retryAfter?: number;
}

export function successResponse<T>(res: Response, data: T, statusCode = 200): Response<SuccessBody<T>> {
    return res.status(statusCode).json({ success: true, data });
}

export function errorResponse(res: Response, statusCode: number, body: ErrorBody): Response {
    return res.status(statusCode).json({ success: false, ...body });
}
