/**
 * Async Handler & Typed Route Middleware
 *
 * asyncHandler - wraps async route handlers so rejections reach the error handler
 * typedRoute   - Zod body validation + asyncHandler in one call
 * typedParamsRoute / typedRouteWithParams - the same for route params
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { z } from 'zod';

// ============================================
// Core types
// ============================================

type AsyncRequestHandler = (
    req: Request,
    res: Response,
    next: NextFunction
) => Promise<void>;

type TypedHandler<TBody> = (req: Request, res: Response, body: TBody) => Promise<void>;

type TypedParamsHandler<TParams, TBody> = (
    req: Request,
    res: Response,
    input: { params: TParams; body: TBody }
) => Promise<void>;

// ============================================
// asyncHandler - for unvalidated routes
// ============================================

export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        fn(req, res, next).catch(next);
    };
}

// ============================================
// typedRoute - Zod body validation + asyncHandler
// ============================================

function sendValidationError(res: Response, error: z.ZodError, fallback: string): void {
    res.status(400).json({
        error: error.issues[0]?.message || fallback,
        details: error.issues.map((issue: z.ZodIssue) => ({
            path: issue.path.join('.'),
            message: issue.message,
        })),
    });
}

/**
 * Validates the body before the handler runs; a failing body gets a 400
 * with every issue listed.
 *
 * @example
 * router.post('/flush', typedRoute(FlushSchema, async (req, res, body) => {
 *     res.json(cache.flush(body.category));
 * }));
 */
export function typedRoute<T extends z.ZodTypeAny>(
    schema: T,
    handler: TypedHandler<z.output<T>>,
): RequestHandler {
    return asyncHandler(async (req, res) => {
        const result = schema.safeParse(req.body);
        if (!result.success) {
            sendValidationError(res, result.error, 'Validation failed');
            return;
        }
        await handler(req, res, result.data);
    });
}

/**
 * Validates route params only.
 *
 * @example
 * router.get('/:id', typedParamsRoute(IdParams, async (req, res, params) => {
 *     res.json(await orders.getOrder(params.id));
 * }));
 */
export function typedParamsRoute<TParams extends z.ZodTypeAny>(
    paramsSchema: TParams,
    handler: TypedHandler<z.output<TParams>>,
): RequestHandler {
    return asyncHandler(async (req, res) => {
        const result = paramsSchema.safeParse(req.params);
        if (!result.success) {
            sendValidationError(res, result.error, 'Invalid params');
            return;
        }
        await handler(req, res, result.data);
    });
}

/**
 * Like typedRoute but also validates params.
 *
 * @example
 * router.patch('/:id/status', typedRouteWithParams(IdParams, StatusBody, async (req, res, { params, body }) => {
 *     res.json(await orders.updateOrderStatus(params.id, body.status));
 * }));
 */
export function typedRouteWithParams<TParams extends z.ZodTypeAny, TBody extends z.ZodTypeAny>(
    paramsSchema: TParams,
    bodySchema: TBody,
    handler: TypedParamsHandler<z.output<TParams>, z.output<TBody>>,
): RequestHandler {
    return asyncHandler(async (req, res) => {
        const paramsResult = paramsSchema.safeParse(req.params);
        if (!paramsResult.success) {
            sendValidationError(res, paramsResult.error, 'Invalid params');
            return;
        }

        const bodyResult = bodySchema.safeParse(req.body);
        if (!bodyResult.success) {
            sendValidationError(res, bodyResult.error, 'Validation failed');
            return;
        }
        await handler(req, res, { params: paramsResult.data, body: bodyResult.data });
    });
}

export default asyncHandler;
