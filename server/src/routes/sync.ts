/**
 * Sync Router
 *
 * Pending POS mirror and stock ledger work parked in the outbox.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/asyncHandler.js';
import type { Container } from '../container.js';

const ListQuerySchema = z.object({
    limit: z.coerce.number().int().positive().max(500).optional(),
});

export function createSyncRouter(container: Container): Router {
    const router: Router = Router();

    /** @route GET /api/sync/outbox?limit=N */
    router.get('/outbox', asyncHandler(async (req: Request, res: Response) => {
        const query = ListQuerySchema.parse(req.query);
        const entries = await container.outbox.listPending(query.limit);
        res.json({
            entries,
            count: entries.length,
            reconciler: container.reconciler.getStatus(),
        });
    }));

    /** @route POST /api/sync/outbox/reconcile */
    router.post('/outbox/reconcile', asyncHandler(async (_req: Request, res: Response) => {
        const result = await container.reconciler.triggerReconcile();
        if (!result) {
            res.status(409).json({ error: 'Outbox reconcile already in progress' });
            return;
        }
        res.json(result);
    }));

    return router;
}
