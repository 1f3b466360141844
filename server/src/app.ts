/**
 * Express application
 *
 * Built from a container so tests can mount the whole HTTP surface over a
 * memory store without starting workers or opening a port.
 */

import express from 'express';
import type { Express } from 'express';
import type { Container } from './container.js';
import { errorHandler } from './middleware/errorHandler.js';
import { requestLogger } from './utils/logger.js';
import { createCheckoutRouter } from './routes/checkout.js';
import { createOrdersRouter } from './routes/orders.js';
import { createCacheRouter } from './routes/cache.js';
import { createSyncRouter } from './routes/sync.js';
import { createHealthRouter } from './routes/health.js';
import { createCartsRouter } from './routes/carts.js';

export function createApp(container: Container): Express {
    const app = express();

    app.use(express.json({ limit: '1mb' }));
    app.use(requestLogger);

    app.use('/api/health', createHealthRouter(container));
    app.use('/api/checkout', createCheckoutRouter(container));
    app.use('/api/orders', createOrdersRouter(container));
    app.use('/api/cache', createCacheRouter(container));
    app.use('/api/sync', createSyncRouter(container));
    app.use('/api/carts', createCartsRouter(container));

    app.use((_req, res) => {
        res.status(404).json({ error: 'Not found' });
    });

    // Must stay last
    app.use(errorHandler);

    return app;
}

export { createContainer } from './container.js';
export type { Container, ContainerOptions } from './container.js';
