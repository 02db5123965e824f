import { type Span, SpanStatusCode, trace, context } from '@opentelemetry/api';

/**
 * Span helpers shared by the dispatcher and the poller.
 *
 * `trace.getTracer` hands back a no-op tracer until ./tracing starts the SDK,
 * so these helpers are safe to call from tests.
 */

export type SpanAttributeValue = string | number | boolean;

export const tracer = trace.getTracer(
    process.env.OTEL_SERVICE_NAME || 'botwire',
    process.env.npm_package_version || '1.0.0'
);

/**
 * Run `fn` as the active span named `spanName`.
 * A thrown error is recorded on the span and rethrown unchanged.
 */
export async function withSpan<T>(
    spanName: string,
    fn: (span: Span) => Promise<T>,
    attributes?: Record<string, SpanAttributeValue>
): Promise<T> {
    const span = tracer.startSpan(spanName, attributes ? { attributes } : undefined);
    const active = trace.setSpan(context.active(), span);

    try {
        const result = await context.with(active, () => fn(span));
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
    } catch (error) {
        markFailed(span, error);
        throw error;
    } finally {
        span.end();
    }
}

/**
 * Set every attribute that has a value; `null` and `undefined` are skipped.
 */
export function addSpanAttributes(
    span: Span,
    attributes: Record<string, SpanAttributeValue | null | undefined>
): void {
    for (const [key, value] of Object.entries(attributes)) {
        if (value === null || value === undefined) {
            continue;
        }
        span.setAttribute(key, value);
    }
}

function markFailed(span: Span, error: unknown): void {
    if (error instanceof Error) {
        span.recordException(error);
        span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
        return;
    }

    const message = String(error);
    span.recordException({ name: 'UnknownError', message });
    span.setStatus({ code: SpanStatusCode.ERROR, message });
}
