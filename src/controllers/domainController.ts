/**
 * Domain Controller
 *
 * Handles API requests for a user's monitored domains.
 */

import { Request, Response } from 'express';
import { getUserId } from '../middleware/userContext';
import {
    addDomainSchema,
    addDomainsBatchSchema,
    deleteDomainsBatchSchema,
    idParamSchema,
    parseOrThrow,
    setActiveForAllSchema,
    updateDomainSchema,
} from '../middleware/validation';
import { DomainService } from '../services/domainService';
import { successResponse } from '../utils/response';

export function createDomainController(domainService: DomainService) {
    return {
        /**
         * GET /api/domains
         */
        listDomains: async (req: Request, res: Response) => {
            const domains = await domainService.listDomains(getUserId(req));
            successResponse(res, domains);
        },

        /**
         * GET /api/domains/limit
         */
        getDomainLimit: async (req: Request, res: Response) => {
            const limit = await domainService.getDomainLimit(getUserId(req));
            successResponse(res, limit);
        },

        /**
         * POST /api/domains
         * Responds before remote monitors exist; they are created in the background.
         */
        addDomain: async (req: Request, res: Response) => {
            const body = parseOrThrow(addDomainSchema, req.body);
            const domain = await domainService.addDomain(getUserId(req), body);
            successResponse(res, domain, 201);
        },

        /**
         * POST /api/domains/batch
         */
        addDomainsBatch: async (req: Request, res: Response) => {
            const body = parseOrThrow(addDomainsBatchSchema, req.body);
            const result = await domainService.addDomainsBatch(getUserId(req), body.domains, body.interval);
            successResponse(res, result, result.added > 0 ? 201 : 200);
        },

        /**
         * PATCH /api/domains/:id
         */
        updateDomain: async (req: Request, res: Response) => {
            const { id } = parseOrThrow(idParamSchema, req.params);
            const patch = parseOrThrow(updateDomainSchema, req.body);
            const domain = await domainService.updateDomain(getUserId(req), id, patch);
            successResponse(res, domain);
        },

        /**
         * PATCH /api/domains
         * Pause or resume every domain of the user.
         */
        setActiveForAll: async (req: Request, res: Response) => {
            const { active } = parseOrThrow(setActiveForAllSchema, req.body);
            const result = await domainService.setActiveForAll(getUserId(req), active);
            successResponse(res, result);
        },

        /**
         * DELETE /api/domains/:id
         */
        deleteDomain: async (req: Request, res: Response) => {
            const { id } = parseOrThrow(idParamSchema, req.params);
            await domainService.deleteDomain(getUserId(req), id);
            successResponse(res, { id });
        },

        /**
         * POST /api/domains/batch-delete
         */
        deleteDomainsBatch: async (req: Request, res: Response) => {
            const { ids } = parseOrThrow(deleteDomainsBatchSchema, req.body);
            const result = await domainService.deleteDomainsBatch(getUserId(req), ids);
            successResponse(res, result);
        },

        /**
         * DELETE /api/domains
         */
        deleteAllDomains: async (req: Request, res: Response) => {
            const result = await domainService.deleteAllDomains(getUserId(req));
            successResponse(res, result);
        },
    };
}

export type DomainController = ReturnType<typeof createDomainController>;
