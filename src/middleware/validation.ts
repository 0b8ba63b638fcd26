/**
 * Request Validation Middleware
 *
 * Uses Zod schemas to validate request bodies and route params.
 * Returns structured 400 errors with field-level details on validation failure.
 */

import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ALLOWED_INTERVALS, ChannelType } from '../types';
import { AppError } from '../utils/appError';
import { errorResponse } from '../utils/response';

// ============================================================================
// VALIDATION MIDDLEWARE
// ============================================================================

function formatIssues(error: z.ZodError): { field: string; message: string }[] {
    return error.issues.map(issue => ({
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
            errorResponse(res, 400, 'Validation failed', { details: formatIssues(result.error) });
            return;
        }
        req.body = result.data;
        next();
    };
}

/**
 * Validate route params against a Zod schema.
 */
export function validateParams(schema: z.ZodType) {
    return (req: Request, res: Response, next: NextFunction): void => {
        const result = schema.safeParse(req.params);
        if (!result.success) {
            errorResponse(res, 400, 'Invalid route parameters', { details: formatIssues(result.error) });
            return;
        }
        next();
    };
}

/**
 * Parse already-validated input inside a controller. A failure here means
 * the route is missing its validator.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new AppError(`Invalid request: ${result.error.issues.map(issue => issue.message).join('; ')}`, 400);
    }
    return result.data;
}

// ============================================================================
// SCHEMAS: Params
// ============================================================================

export const idParamSchema = z.object({
    id: z.coerce.number().int().positive('Id must be a positive integer')
});

export const channelTypeSchema = z.nativeEnum(ChannelType, {
    errorMap: () => ({ message: `Channel type must be one of ${Object.values(ChannelType).join(', ')}` })
});

export const channelParamsSchema = z.object({
    type: channelTypeSchema
});

export const channelIdParamsSchema = channelParamsSchema.extend({
    id: z.coerce.number().int().positive('Id must be a positive integer')
});

// ============================================================================
// SCHEMAS: Domains
// ============================================================================

const intervalSchema = z
    .number()
    .int()
    .refine(value => ALLOWED_INTERVALS.some(allowed => allowed === value), {
        message: `Interval must be one of ${ALLOWED_INTERVALS.join(', ')}`
    });

const domainNameSchema = z.string().trim().min(1, 'Domain name is required').max(300);
const regionSchema = z.string().trim().min(1, 'Region is required').max(32);

export const addDomainSchema = z.object({
    name: domainNameSchema,
    region: regionSchema.optional(),
    interval: intervalSchema.optional()
});

export const addDomainsBatchSchema = z.object({
    domains: z
        .array(z.object({ name: domainNameSchema, region: regionSchema }))
        .min(1, 'At least one domain is required')
        .max(100, 'At most 100 domains per batch'),
    interval: intervalSchema.optional()
});

export const updateDomainSchema = z
    .object({
        active: z.boolean().optional(),
        interval: intervalSchema.optional(),
        region: regionSchema.optional()
    })
    .refine(patch => patch.active !== undefined || patch.interval !== undefined || patch.region !== undefined, {
        message: 'Provide at least one of active, interval, region'
    });

export const setActiveForAllSchema = z.object({
    active: z.boolean()
});

export const deleteDomainsBatchSchema = z.object({
    ids: z
        .array(z.number().int().positive())
        .min(1, 'At least one domain id is required')
        .max(100, 'At most 100 domains per batch')
});

// ============================================================================
// SCHEMAS: Channel configs
// ============================================================================

const channelConfigFields = {
    name: z.string().trim().max(100).optional(),
    language: z.string().trim().min(2).max(10).optional(),
    active: z.boolean().optional(),
    notifyOnDown: z.boolean().optional(),
    notifyOnUp: z.boolean().optional(),
    monitorRegions: z.array(regionSchema).max(20).optional()
};

export const createChannelConfigSchema = z.object({
    address: z.string().trim().min(1, 'Address is required').max(320),
    ...channelConfigFields
});

export const updateChannelConfigSchema = z
    .object({
        address: z.string().trim().min(1).max(320).optional(),
        ...channelConfigFields
    })
    .refine(patch => Object.values(patch).some(value => value !== undefined), {
        message: 'Provide at least one field to update'
    });
