/**
 * Common TypeScript types used across the botwire application
 */

/**
 * Proxy protocol supported by the HTTP transport
 */
export type ProxyType = 'http' | 'https';

/**
 * Outbound proxy settings
 *
 * When any field is set, every Bot API call is routed through the proxy.
 */
export interface ProxyConfig {
    /** Proxy protocol (default: http) */
    type?: ProxyType | undefined;
    /** Proxy host, with or without a scheme (e.g. proxy.internal or http://proxy.internal) */
    url?: string | undefined;
    /** Proxy port */
    port?: number | undefined;
    /** Credentials in user:password form */
    auth?: string | undefined;
}

/**
 * Log context for structured logging
 */
export interface LogContext {
    /** Request ID for tracing */
    requestId?: string;
    /** Update ID currently being handled */
    updateId?: number;
    /** Bot API method name */
    method?: string;
    /** Additional context */
    [key: string]: unknown;
}

/**
 * Application health check response
 */
export interface HealthCheckResponse {
    /** Overall status */
    status: 'healthy' | 'degraded' | 'unhealthy';
    /** Current timestamp */
    timestamp: string;
    /** Uptime in seconds */
    uptime: number;
    /** Adapter health statuses */
    adapters: {
        botApi: 'connected' | 'disconnected' | 'error';
    };
}
