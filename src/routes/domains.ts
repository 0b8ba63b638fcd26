import { Router } from 'express';
import { DomainController } from '../controllers/domainController';
import { asyncHandler } from '../middleware/asyncHandler';
import {
    addDomainSchema,
    addDomainsBatchSchema,
    deleteDomainsBatchSchema,
    idParamSchema,
    setActiveForAllSchema,
    updateDomainSchema,
    validateBody,
    validateParams,
} from '../middleware/validation';

export function createDomainRouter(controller: DomainController): Router {
    const router = Router();

    /**
     * GET /api/domains
     */
    router.get('/', asyncHandler(controller.listDomains));

    /**
     * GET /api/domains/limit
     * Domain limit and current usage
     */
    router.get('/limit', asyncHandler(controller.getDomainLimit));

    /**
     * POST /api/domains
     * Body: { name, region?, interval? }
     */
    router.post('/', validateBody(addDomainSchema), asyncHandler(controller.addDomain));

    /**
     * POST /api/domains/batch
     * Body: { domains: [{ name, region }], interval? }
     */
    router.post('/batch', validateBody(addDomainsBatchSchema), asyncHandler(controller.addDomainsBatch));

    /**
     * POST /api/domains/batch-delete
     * Body: { ids: number[] }
     */
    router.post('/batch-delete', validateBody(deleteDomainsBatchSchema), asyncHandler(controller.deleteDomainsBatch));

    /**
     * PATCH /api/domains
     * Body: { active }
     */
    router.patch('/', validateBody(setActiveForAllSchema), asyncHandler(controller.setActiveForAll));

    router.patch('/:id', validateParams(idParamSchema), validateBody(updateDomainSchema), asyncHandler(controller.updateDomain));

    router.delete('/:id', validateParams(idParamSchema), asyncHandler(controller.deleteDomain));

    router.delete('/', asyncHandler(controller.deleteAllDomains));

    return router;
}
