import ky, { TimeoutError, type KyInstance, type Options } from 'ky';
import { access, stat, writeFile } from 'fs/promises';
import { constants, openAsBlob } from 'fs';
import { basename } from 'path';
import { logger, logApiCall } from '@/shared/utils/logger';
import { addSpanAttributes, withSpan } from '@/shared/utils/tracing-utils';
import type { ProxyConfig } from '@/shared/types/common.types';
import { TransportError } from '../../errors';
import {
    apiResponseSchema,
    toApiResult,
    type DispatchResult,
    type JsonValue,
    type ParameterBag,
    type TransportFailure,
} from '../../types';
import type { ErrorLogSink } from '../error-log/error-log.interface';
import type { RequestDispatcher, SendOptions } from './http.interface';
import { createBotFetch, createTransportAgent } from './transport';

export const DEFAULT_API_BASE_URL = 'https://api.telegram.org';
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface KyDispatcherOptions {
    token: string;
    apiBaseUrl?: string | undefined;
    /** Request timeout in milliseconds */
    timeoutMs?: number | undefined;
    proxy?: ProxyConfig | undefined;
    /** Receives every call outcome; failures are what it is meant to catch */
    errorLog?: ErrorLogSink | undefined;
    /** Replaces the proxy-aware fetch (tests inject an in-process fake here) */
    fetch?: Options['fetch'];
}

/**
 * Bot API Request Dispatcher
 *
 * One ky instance per bot token. HTTP errors are not thrown: the API answers
 * 4xx with an `ok: false` envelope, which is a result like any other.
 * API Docs: https://core.telegram.org/bots/api#making-requests
 */
export class KyDispatcher implements RequestDispatcher {
    private client: KyInstance;
    private fileClient: KyInstance;
    private rawClient: KyInstance;
    private readonly token: string;
    private readonly timeoutMs: number;
    private readonly errorLog: ErrorLogSink | undefined;

    constructor(options: KyDispatcherOptions) {
        const apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
        this.token = options.token;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.errorLog = options.errorLog;

        const fetchImpl = options.fetch ?? createBotFetch(createTransportAgent(options.proxy, this.timeoutMs));

        this.rawClient = ky.create({
            fetch: fetchImpl,
            timeout: this.timeoutMs,
            retry: 0,
            throwHttpErrors: false,
            hooks: {
                beforeRequest: [
                    (request) => {
                        logger.trace({
                            event: 'bot_api.http.request',
                            httpMethod: request.method,
                            path: maskToken(new URL(request.url).pathname, this.token),
                        }, 'Bot API request');
                    },
                ],
            },
        });

        this.client = this.rawClient.extend({ prefixUrl: `${apiBaseUrl}/bot${options.token}` });
        this.fileClient = this.rawClient.extend({ prefixUrl: `${apiBaseUrl}/file/bot${options.token}` });
    }

    /**
     * Call a Bot API method
     */
    async send(
        method: string,
        params: ParameterBag,
        usePost = true,
        options: SendOptions = {}
    ): Promise<DispatchResult> {
        const httpMethod = usePost ? 'POST' : 'GET';

        const result = await withSpan('bot_api.send', async (span) => {
            const startTime = Date.now();
            const outcome = await this.perform(method, params, usePost, options.timeoutMs ?? this.timeoutMs);

            addSpanAttributes(span, {
                'bot_api.outcome': outcome.kind,
                'bot_api.ok': envelopeOk(outcome),
            });

            logApiCall({
                method,
                httpMethod,
                outcome: outcome.kind,
                ok: envelopeOk(outcome),
                latencyMs: Date.now() - startTime,
                errorCode: failureCode(outcome),
                error: outcome.kind === 'transport_error' ? outcome.data.error_message : undefined,
            });

            return outcome;
        }, { 'bot_api.method': method, 'http.method': httpMethod });

        await this.recordOutcome(result, method, params, options);

        return result;
    }

    /**
     * Download a file from the file endpoint
     */
    async download(filePath: string, destination: string): Promise<void> {
        let response: Response;
        try {
            response = await this.fileClient.get(filePath.replace(/^\/+/, ''));
        } catch (error) {
            throw new TransportError(`Failed to download ${filePath}`, undefined, error);
        }

        if (!response.ok) {
            throw new TransportError(`Failed to download ${filePath}: HTTP ${response.status}`, response.status);
        }

        try {
            await writeFile(destination, new Uint8Array(await response.arrayBuffer()));
        } catch (error) {
            throw new TransportError(`Failed to write ${destination}`, undefined, error);
        }

        logger.debug({
            event: 'bot_api.file.downloaded',
            filePath,
            destination,
        }, 'File downloaded');
    }

    /**
     * POST a JSON document to an arbitrary URL
     */
    async postJson(url: string, payload: unknown): Promise<unknown> {
        let response: Response;
        try {
            response = await this.rawClient.post(url, { json: payload });
        } catch (error) {
            throw new TransportError(`Request to ${url} failed`, undefined, error);
        }

        if (!response.ok) {
            throw new TransportError(`Request to ${url} failed: HTTP ${response.status}`, response.status);
        }

        const body = await response.text();
        return decodeJson(body) ?? body;
    }

    private async perform(
        method: string,
        params: ParameterBag,
        usePost: boolean,
        timeoutMs: number
    ): Promise<DispatchResult> {
        let status: number;
        let body: string;
        try {
            const response = usePost
                ? await this.client.post(method, await buildPostRequest(params, timeoutMs))
                : await this.client.get(method, { timeout: timeoutMs, ...withQuery(buildQuery(params)) });
            status = response.status;
            body = await response.text();
        } catch (error) {
            const data: TransportFailure = {
                ok: false,
                error_code: transportErrorCode(error),
                error_message: transportErrorMessage(error, this.token),
            };
            return { kind: 'transport_error', body: JSON.stringify(data), data };
        }

        const decoded = decodeJson(body);
        if (decoded === undefined) {
            return { kind: 'raw', status, body };
        }

        const envelope = apiResponseSchema.safeParse(decoded);
        if (!envelope.success) {
            return { kind: 'json', status, body, data: decoded };
        }

        return { kind: 'decoded', status, body, data: envelope.data };
    }

    private async recordOutcome(
        result: DispatchResult,
        method: string,
        params: ParameterBag,
        options: SendOptions
    ): Promise<void> {
        if (!this.errorLog) {
            return;
        }

        try {
            await this.errorLog.record(toApiResult(result), { method, params, update: options.update });
        } catch (error) {
            logger.warn({
                event: 'bot_api.error_log.failed',
                method,
                error: error instanceof Error ? error.message : 'Unknown error',
            }, 'Error log sink failed');
        }
    }
}

/**
 * Encode one parameter value for transmission, or undefined to skip it
 */
export function encodeValue(value: unknown): string | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value === 'string') {
        return value;
    }
    if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
        return String(value);
    }
    return JSON.stringify(value);
}

function buildQuery(params: ParameterBag): URLSearchParams {
    const query = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
        const encoded = encodeValue(value);
        if (encoded !== undefined) {
            query.append(key, encoded);
        }
    }
    return query;
}

/** An empty query string is left off the URL */
function withQuery(query: URLSearchParams): Pick<Options, 'searchParams'> {
    return query.toString() === '' ? {} : { searchParams: query };
}

/**
 * POST requests carry chat_id in the query string and everything else as
 * multipart/form-data
 */
async function buildPostRequest(params: ParameterBag, timeoutMs: number): Promise<Options> {
    const { chat_id: chatId, ...rest } = params;
    const form = new FormData();

    for (const [key, value] of Object.entries(rest)) {
        if (value instanceof Blob) {
            form.append(key, value, 'name' in value && typeof value.name === 'string' ? value.name : key);
            continue;
        }

        if (key === 'certificate' && typeof value === 'string' && (await isReadableFile(value))) {
            form.append(key, await openAsBlob(value), basename(value));
            continue;
        }

        const encoded = encodeValue(value);
        if (encoded !== undefined) {
            form.append(key, encoded);
        }
    }

    const query = buildQuery({ chat_id: chatId });

    return {
        body: form,
        timeout: timeoutMs,
        ...withQuery(query),
    };
}

async function isReadableFile(path: string): Promise<boolean> {
    try {
        const info = await stat(path);
        await access(path, constants.R_OK);
        return info.isFile();
    } catch {
        return false;
    }
}

function decodeJson(body: string): JsonValue | undefined {
    try {
        const value: JsonValue = JSON.parse(body);
        return value;
    } catch {
        return undefined;
    }
}

function envelopeOk(outcome: DispatchResult): boolean | undefined {
    return outcome.kind === 'decoded' || outcome.kind === 'transport_error' ? outcome.data.ok : undefined;
}

function failureCode(outcome: DispatchResult): number | string | undefined {
    if (outcome.kind === 'transport_error') {
        return outcome.data.error_code;
    }
    if (outcome.kind === 'decoded' && !outcome.data.ok) {
        return outcome.data.error_code;
    }
    return undefined;
}

function transportErrorCode(error: unknown): string {
    if (error instanceof TimeoutError) {
        return 'ETIMEDOUT';
    }
    if (error instanceof Error) {
        const cause = error.cause;
        if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
            return cause.code;
        }
    }
    return 'ETRANSPORT';
}

/**
 * ky puts the request URL in some messages (TimeoutError, HTTPError), and the
 * URL carries the token
 */
function transportErrorMessage(error: unknown, token: string): string {
    if (!(error instanceof Error)) {
        return maskToken(String(error), token);
    }
    const message = error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
    return maskToken(message, token);
}

function maskToken(text: string, token: string): string {
    return token === '' ? text : text.split(token).join('<token>');
}
