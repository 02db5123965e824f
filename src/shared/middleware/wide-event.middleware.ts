import { randomUUID } from 'crypto';
import type { Context } from 'hono';
import { createMiddleware } from 'hono/factory';
import { trace } from '@opentelemetry/api';
import { logger } from '@/shared/utils/logger';
import type { AppEnv, WideEvent } from '@/shared/types/wide-event.types';

/**
 * Emits one log line per HTTP request.
 *
 * Routes enrich the event through `getWideEvent(c)` while the request runs
 * (update id and kind, handler timing); the line is written once the
 * response status is known, or the error has propagated.
 */
export function wideEventMiddleware() {
    return createMiddleware<AppEnv>(async (c, next) => {
        const startedAt = Date.now();
        const wideEvent = openEvent(c);
        c.set('wideEvent', wideEvent);

        try {
            await next();
            wideEvent.http.status_code = c.res.status;
            wideEvent.outcome = outcomeFor(c.res.status, wideEvent.outcome);
        } catch (error) {
            wideEvent.http.status_code = 500;
            wideEvent.outcome = 'error';
            wideEvent.error = describeError(error);
            throw error;
        } finally {
            wideEvent.duration_ms = Date.now() - startedAt;
            logger.info(wideEvent, `${wideEvent.http.method} ${wideEvent.http.path} ${wideEvent.outcome}`);
        }
    });
}

/**
 * Undefined when the middleware is not mounted in front of the route
 */
export function getWideEvent(c: Context<AppEnv>): WideEvent | undefined {
    return c.get('wideEvent');
}

function openEvent(c: Context<AppEnv>): WideEvent {
    const event: WideEvent = {
        timestamp: new Date().toISOString(),
        request_id: randomUUID(),
        service: process.env.OTEL_SERVICE_NAME || 'botwire',
        version: process.env.npm_package_version || '1.0.0',
        http: {
            method: c.req.method,
            path: c.req.path,
            user_agent: c.req.header('user-agent') || 'unknown',
        },
        outcome: 'success',
        duration_ms: 0,
    };

    const spanContext = trace.getActiveSpan()?.spanContext();
    if (spanContext) {
        event.trace_id = spanContext.traceId;
        event.span_id = spanContext.spanId;
    }
    if (process.env.DEPLOYMENT_ID) {
        event.deployment_id = process.env.DEPLOYMENT_ID;
    }
    if (process.env.REGION) {
        event.region = process.env.REGION;
    }

    return event;
}

// A route may already have set 'ignored'; that survives a 2xx status
function outcomeFor(status: number, current: WideEvent['outcome']): WideEvent['outcome'] {
    if (status >= 500) {
        return 'error';
    }
    if (status >= 400) {
        return 'rejected';
    }
    return current;
}

function describeError(error: unknown): NonNullable<WideEvent['error']> {
    if (!(error instanceof Error)) {
        return { type: 'UnknownError', message: String(error), retriable: false };
    }

    const described: NonNullable<WideEvent['error']> = {
        type: error.name,
        message: error.message,
        retriable: false,
    };
    if (error.stack) {
        described.stack = error.stack;
    }
    return described;
}
