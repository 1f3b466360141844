/**
 * Cache Router
 *
 * Admin view of the catalog snapshot cache.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import { FLUSH_CATEGORIES } from '../config/index.js';
import type { Container } from '../container.js';

const FlushSchema = z.object({
    category: z.enum(FLUSH_CATEGORIES).default('all'),
});

export function createCacheRouter(container: Container): Router {
    const router: Router = Router();

    /** @route GET /api/cache/stats */
    router.get('/stats', asyncHandler(async (_req: Request, res: Response) => {
        res.json({
            ...container.cache.getStats(),
            catalogSync: container.catalogSync.getStatus(),
        });
    }));

    /** @route POST /api/cache/flush */
    router.post('/flush', typedRoute(FlushSchema, async (_req, res, body) => {
        res.json(container.cache.flush(body.category));
    }));

    /**
     * Check the catalog marker now instead of waiting for the next tick.
     * Returns 409 when a check is already running.
     * @route POST /api/cache/sync
     */
    router.post('/sync', asyncHandler(async (_req: Request, res: Response) => {
        const result = await container.catalogSync.triggerSync();
        if (!result) {
            res.status(409).json({ error: 'Catalog sync already in progress' });
            return;
        }
        res.json(result);
    }));

    return router;
}
