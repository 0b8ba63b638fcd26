/**
 * API Response Helpers
 *
 * Every JSON answer uses one envelope:
 * Success: { success: true, data }
 * Error:   { success: false, error, ...details }
 */

import { Response } from 'express';

export interface SuccessBody<T> {
    success: true;
    data: T;
}

export interface ErrorBody {
    success: false;
    error: string;
    [detail: string]: unknown;
}

export function successResponse<T>(res: Response, data: T, statusCode = 200): Response<SuccessBody<T>> {
    return res.status(statusCode).json({
        success: true,
        data
    });
}

export function errorResponse(
    res: Response,
    statusCode: number,
    error: string,
    details: Record<string, unknown> = {}
): Response<ErrorBody> {
    return res.status(statusCode).json({
        success: false,
        error,
        ...details
    });
}
