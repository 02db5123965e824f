import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { PinoInstrumentation } from '@opentelemetry/instrumentation-pino';

/**
 * OpenTelemetry Tracing Configuration
 *
 * Initializes the OpenTelemetry SDK with an OTLP exporter when
 * OTEL_EXPORTER_OTLP_ENDPOINT is set. Import this module first from the
 * entry point so auto-instrumentation patches modules before they load.
 */

// Get configuration from environment
const OTEL_ENDPOINT = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
const SERVICE_NAME = process.env.OTEL_SERVICE_NAME || 'botwire';

function startTracing(endpoint: string): NodeSDK {
    // Configure OTLP exporter
    const traceExporter = new OTLPTraceExporter({
        url: `${endpoint}/v1/traces`,
        headers: {},
    });

    const sdk = new NodeSDK({
        serviceName: SERVICE_NAME,
        traceExporter,
        instrumentations: [
            // Pino instrumentation for log-trace correlation
            new PinoInstrumentation({
                logHook: (span, record) => {
                    record['trace_id'] = span.spanContext().traceId;
                    record['span_id'] = span.spanContext().spanId;
                    record['trace_flags'] = span.spanContext().traceFlags;
                },
            }),
            getNodeAutoInstrumentations({
                '@opentelemetry/instrumentation-http': {
                    enabled: true,
                },
                '@opentelemetry/instrumentation-undici': {
                    enabled: true,
                },
                '@opentelemetry/instrumentation-fs': {
                    enabled: false,
                },
                // Added manually above
                '@opentelemetry/instrumentation-pino': {
                    enabled: false,
                },
            }),
        ],
    });

    sdk.start();

    console.log(`[OpenTelemetry] Tracing initialized for service: ${SERVICE_NAME}`);
    console.log(`[OpenTelemetry] Exporting traces to: ${endpoint}`);

    // Graceful shutdown
    process.on('SIGTERM', () => {
        sdk
            .shutdown()
            .then(() => console.log('[OpenTelemetry] Tracing terminated'))
            .catch((error: unknown) => console.error('[OpenTelemetry] Error terminating tracing', error))
            .finally(() => process.exit(0));
    });

    return sdk;
}

export const sdk = OTEL_ENDPOINT ? startTracing(OTEL_ENDPOINT) : undefined;
