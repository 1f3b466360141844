/**
 * Health Router
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { Container } from '../container.js';

export function createHealthRouter(container: Container): Router {
    const router: Router = Router();

    /** @route GET /api/health */
    router.get('/', (_req: Request, res: Response) => {
        const posMirror = container.circuit.getStatus();
        res.json({
            status: posMirror.state === 'closed' ? 'ok' : 'degraded',
            posMirror,
            workers: {
                catalogSync: container.catalogSync.getStatus(),
                outboxReconciler: container.reconciler.getStatus(),
            },
        });
    });

    return router;
}
