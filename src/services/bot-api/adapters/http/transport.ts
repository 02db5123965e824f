import { Agent, ProxyAgent, type Dispatcher } from 'undici';
import type { ProxyConfig } from '@/shared/types/common.types';

/**
 * HTTP transport shared by every Bot API call
 *
 * Certificate verification is turned off for the API connection and the
 * proxy tunnel. This mirrors long-standing behaviour of bot deployments
 * behind intercepting proxies and is a known weakness.
 */

export type FetchFunction = (input: Request | URL | string, init?: RequestInit) => Promise<Response>;

/**
 * True when at least one proxy field is set
 */
export function hasProxy(proxy: ProxyConfig | undefined): proxy is ProxyConfig {
    return proxy !== undefined && Object.values(proxy).some((value) => value !== undefined && value !== '');
}

/**
 * Build the proxy URI from its parts: scheme from `type`, host from `url`
 * (a scheme already present in `url` wins), port appended when given.
 */
export function buildProxyUri(proxy: ProxyConfig): string {
    const scheme = proxy.type ?? 'http';
    const host = proxy.url ?? 'localhost';
    const base = /^[a-z]+:\/\//i.test(host) ? host : `${scheme}://${host}`;
    return proxy.port !== undefined ? `${base.replace(/\/+$/, '')}:${proxy.port}` : base;
}

/**
 * Create the connection pool used for Bot API calls
 */
export function createTransportAgent(proxy: ProxyConfig | undefined, connectTimeoutMs: number): Dispatcher {
    const tls = { rejectUnauthorized: false };

    if (!hasProxy(proxy)) {
        return new Agent({ connect: { ...tls, timeout: connectTimeoutMs } });
    }

    return new ProxyAgent({
        uri: buildProxyUri(proxy),
        token: proxy.auth ? `Basic ${Buffer.from(proxy.auth).toString('base64')}` : undefined,
        requestTls: tls,
        proxyTls: tls,
        connect: { timeout: connectTimeoutMs },
    });
}

/**
 * Bind the global fetch to a dispatcher
 */
export function createBotFetch(agent: Dispatcher): FetchFunction {
    return (input, init) => fetch(input, { ...init, dispatcher: agent });
}
