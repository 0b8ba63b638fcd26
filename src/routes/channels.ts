import { Router } from 'express';
import { ChannelConfigController } from '../controllers/channelConfigController';
import { asyncHandler } from '../middleware/asyncHandler';
import {
    channelIdParamsSchema,
    channelParamsSchema,
    createChannelConfigSchema,
    updateChannelConfigSchema,
    validateBody,
    validateParams,
} from '../middleware/validation';

export function createChannelRouter(controller: ChannelConfigController): Router {
    const router = Router();

    /**
     * GET /api/channels/:type
     * :type is telegram or email
     */
    router.get('/:type', validateParams(channelParamsSchema), asyncHandler(controller.list));

    router.post(
        '/:type',
        validateParams(channelParamsSchema),
        validateBody(createChannelConfigSchema),
        asyncHandler(controller.create)
    );

    router.patch(
        '/:type/:id',
        validateParams(channelIdParamsSchema),
        validateBody(updateChannelConfigSchema),
        asyncHandler(controller.update)
    );

    router.delete('/:type/:id', validateParams(channelIdParamsSchema), asyncHandler(controller.remove));

    /**
     * POST /api/channels/:type/:id/test
     * Sends the test template; not suppressed, not recorded
     */
    router.post('/:type/:id/test', validateParams(channelIdParamsSchema), asyncHandler(controller.sendTest));

    return router;
}
