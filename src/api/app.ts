import { Hono } from 'hono';
import { logger } from '@/shared/utils/logger';
import { wideEventMiddleware } from '@/shared/middleware/wide-event.middleware';
import type { AppEnv } from '@/shared/types/wide-event.types';

interface ErrorBody {
    status: 'error';
    error: string;
}

const errorBody = (error: string): ErrorBody => ({ status: 'error', error });

/**
 * Bare application with the request log line and JSON error responses.
 * Routes are mounted by the caller.
 */
export function createApp() {
    const app = new Hono<AppEnv>();

    app.use('/*', wideEventMiddleware());

    app.onError((err, c) => {
        logger.error({
            event: 'http.unhandled_error',
            method: c.req.method,
            path: c.req.path,
            error: { name: err.name, message: err.message, stack: err.stack },
        }, `Unhandled error on ${c.req.method} ${c.req.path}`);

        return c.json(errorBody('Internal server error'), 500);
    });

    app.notFound((c) => c.json(errorBody('Not found'), 404));

    return app;
}
