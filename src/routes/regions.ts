import { Request, Response, Router } from 'express';
import { RegionResolver } from '../services/regionResolver';
import { successResponse } from '../utils/response';

export function createRegionRouter(regionResolver: RegionResolver): Router {
    const router = Router();

    /**
     * GET /api/regions
     */
    router.get('/', (req: Request, res: Response) => {
        successResponse(res, {
            regions: regionResolver.knownRegions(),
            defaultRegion: regionResolver.defaultRegion,
        });
    });

    return router;
}
