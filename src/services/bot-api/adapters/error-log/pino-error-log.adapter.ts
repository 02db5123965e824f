import type { Logger } from 'pino';
import { logger as defaultLogger } from '@/shared/utils/logger';
import { apiResponseSchema, isApiSuccess, isTransportFailure, type ApiResult } from '../../types';
import type { CallContext, ErrorLogSink } from './error-log.interface';

/** Parameters that may carry large or binary content */
const OMITTED_PARAMS = new Set(['photo', 'document', 'audio', 'video', 'voice', 'animation', 'sticker', 'certificate']);

/**
 * Error log sink writing failed calls to the structured log
 *
 * Records calls the API rejected, calls that never got a response, and
 * responses that were not API envelopes. Successful calls are ignored.
 */
export class PinoErrorLog implements ErrorLogSink {
    constructor(private readonly logger: Logger = defaultLogger) {}

    record(result: ApiResult, context: CallContext): void {
        if (isApiSuccess(result)) {
            return;
        }

        this.logger.error({
            event: 'bot_api.call.failed',
            method: context.method,
            params: summarizeParams(context.params),
            updateId: context.update?.update_id,
            ...describeFailure(result),
        }, `Bot API ${context.method} failed`);
    }
}

function describeFailure(result: ApiResult): Record<string, unknown> {
    if (typeof result === 'string') {
        return { kind: 'malformed_response', body: result.slice(0, 500) };
    }
    if (isTransportFailure(result)) {
        return { kind: 'transport_failure', errorCode: result.error_code, errorMessage: result.error_message };
    }

    const envelope = apiResponseSchema.safeParse(result);
    if (envelope.success && !envelope.data.ok) {
        return { kind: 'api_error', errorCode: envelope.data.error_code, description: envelope.data.description };
    }

    return { kind: 'unexpected_json', body: JSON.stringify(result).slice(0, 500) };
}

function summarizeParams(params: CallContext['params']): Record<string, unknown> {
    return Object.fromEntries(
        Object.entries(params).map(([key, value]) => [key, OMITTED_PARAMS.has(key) ? '[omitted]' : value])
    );
}
