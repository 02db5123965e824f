import pino, { type LoggerOptions } from 'pino';
import type { LogContext } from '../types/common.types';

const prettyTransport = {
    target: 'pino-pretty',
    options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
    },
};

/**
 * JSON lines in production, pino-pretty when NODE_ENV=development.
 * The token appears in every Bot API URL, so anything named `token` is redacted.
 */
function createLogger() {
    const options: LoggerOptions = {
        level: process.env.LOG_LEVEL || 'info',
        base: { env: process.env.NODE_ENV },
        redact: ['token', '*.token', 'bot.token'],
        timestamp: pino.stdTimeFunctions.isoTime,
    };

    if (process.env.NODE_ENV === 'development') {
        return pino({ ...options, transport: prettyTransport });
    }

    return pino(options);
}

export const logger = createLogger();

/**
 * One line per update taken from either source
 */
export function logUpdateReceived(payload: {
    source: 'webhook' | 'polling';
    updateId: number;
    kind?: string | undefined;
}) {
    logger.info({
        event: 'update.received',
        source: payload.source,
        updateId: payload.updateId,
        kind: payload.kind,
    }, 'Update received');
}

/**
 * Log a dispatched Bot API call
 */
export function logApiCall(data: {
    method: string;
    httpMethod: 'GET' | 'POST';
    outcome: 'decoded' | 'json' | 'raw' | 'transport_error';
    ok?: boolean | undefined;
    latencyMs: number;
    errorCode?: number | string | undefined;
    error?: string | undefined;
}) {
    if (data.outcome === 'transport_error') {
        logger.warn({
            event: 'bot_api.call.transport_failed',
            method: data.method,
            httpMethod: data.httpMethod,
            errorCode: data.errorCode,
            error: data.error,
            latencyMs: data.latencyMs,
        }, `Bot API ${data.method} failed at transport level`);
        return;
    }

    if (data.outcome === 'raw' || data.outcome === 'json') {
        logger.warn({
            event: 'bot_api.call.malformed_response',
            method: data.method,
            httpMethod: data.httpMethod,
            bodyType: data.outcome === 'json' ? 'json' : 'text',
            latencyMs: data.latencyMs,
        }, `Bot API ${data.method} returned something other than an API envelope`);
        return;
    }

    logger.debug({
        event: data.ok ? 'bot_api.call.success' : 'bot_api.call.rejected',
        method: data.method,
        httpMethod: data.httpMethod,
        ok: data.ok,
        errorCode: data.errorCode,
        latencyMs: data.latencyMs,
    }, `Bot API ${data.method} completed`);
}

/**
 * Log long-poll batch
 */
export function logPollBatch(data: {
    offset: number;
    limit: number;
    timeoutSeconds: number;
    received: number;
    confirmedOffset?: number | undefined;
}) {
    logger.debug({
        event: 'polling.batch',
        offset: data.offset,
        limit: data.limit,
        timeoutSeconds: data.timeoutSeconds,
        received: data.received,
        confirmedOffset: data.confirmedOffset,
    }, `Fetched ${data.received} update(s)`);
}

/**
 * Errors that were caught and not rethrown, such as a failed handler
 */
export function logError(error: Error, context?: LogContext) {
    logger.error({
        event: 'error',
        error: {
            message: error.message,
            name: error.name,
            stack: error.stack,
        },
        ...context,
    }, error.message);
}
