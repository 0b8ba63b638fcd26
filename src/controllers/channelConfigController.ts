/**
 * Channel Config Controller
 *
 * Handles API requests for notification endpoints. The channel type comes
 * from the route (`/api/channels/:type`).
 */

import { Request, Response } from 'express';
import { getUserId } from '../middleware/userContext';
import {
    channelIdParamsSchema,
    channelParamsSchema,
    createChannelConfigSchema,
    parseOrThrow,
    updateChannelConfigSchema,
} from '../middleware/validation';
import { ChannelConfigService } from '../services/channelConfigService';
import { successResponse } from '../utils/response';

export function createChannelConfigController(channelConfigService: ChannelConfigService) {
    return {
        list: async (req: Request, res: Response) => {
            const { type } = parseOrThrow(channelParamsSchema, req.params);
            const configs = await channelConfigService.list(getUserId(req), type);
            successResponse(res, configs);
        },

        create: async (req: Request, res: Response) => {
            const { type } = parseOrThrow(channelParamsSchema, req.params);
            const body = parseOrThrow(createChannelConfigSchema, req.body);
            const config = await channelConfigService.create(getUserId(req), type, body);
            successResponse(res, config, 201);
        },

        update: async (req: Request, res: Response) => {
            const { type, id } = parseOrThrow(channelIdParamsSchema, req.params);
            const patch = parseOrThrow(updateChannelConfigSchema, req.body);
            const config = await channelConfigService.update(getUserId(req), type, id, patch);
            successResponse(res, config);
        },

        remove: async (req: Request, res: Response) => {
            const { type, id } = parseOrThrow(channelIdParamsSchema, req.params);
            await channelConfigService.remove(getUserId(req), type, id);
            successResponse(res, { id });
        },

        /**
         * POST /api/channels/:type/:id/test
         */
        sendTest: async (req: Request, res: Response) => {
            const { type, id } = parseOrThrow(channelIdParamsSchema, req.params);
            await channelConfigService.sendTest(getUserId(req), type, id);
            successResponse(res, { sent: true });
        },
    };
}

export type ChannelConfigController = ReturnType<typeof createChannelConfigController>;
