import type { Update } from '../../update/update.schema';
import type { ApiResult, ParameterBag } from '../../types';

/**
 * What was being attempted when a result came back
 */
export interface CallContext {
    method: string;
    params: ParameterBag;
    /** Update being handled at the time, if any */
    update?: Update | undefined;
}

/**
 * Error Log Sink Interface
 *
 * Receives the outcome of every dispatched call. Implementations decide what
 * counts as worth recording. A sink that throws or rejects does not affect
 * the call's result.
 */
export interface ErrorLogSink {
    record(result: ApiResult, context: CallContext): void | Promise<void>;
}
