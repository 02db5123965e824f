/**
 * Shape of the per-request log line written by the wide-event middleware.
 * Field names are snake_case so the line can be queried as-is, e.g. every
 * failed callback_query for one chat, or webhook calls with a slow handler.
 */

export interface WideEvent {
    // request
    timestamp: string;
    request_id: string;
    trace_id?: string;
    span_id?: string;
    service: string;
    version?: string;
    deployment_id?: string;
    region?: string;

    // http
    http: {
        method: string;
        path: string;
        status_code?: number;
        user_agent?: string;
    };

    // outcome
    outcome: 'success' | 'error' | 'rejected' | 'ignored';
    duration_ms: number;

    // set by the webhook route
    update?: {
        id?: number;
        kind?: string;
        chat_id?: number;
        user_id?: number;
        /** Why the update was acknowledged without handling */
        ignored_reason?: 'invalid_body' | 'unclassifiable';
    };

    // set by the webhook route after the handler ran
    handler?: {
        duration_ms: number;
        success: boolean;
    };

    // set when the request threw
    error?: {
        type: string;
        message: string;
        code?: string;
        retriable: boolean;
        stack?: string;
    };
}

/**
 * Hono environment shared by the app and its routes
 */
export type AppEnv = {
    Variables: {
        wideEvent: WideEvent;
    };
};
