import type { Update } from '../../update/update.schema';
import type { DispatchResult, ParameterBag } from '../../types';

/**
 * Per-call dispatch options
 */
export interface SendOptions {
    /** Overrides the dispatcher's request timeout (long polling needs more) */
    timeoutMs?: number;
    /** Update being handled when the call was made, passed on to the error log */
    update?: Update | undefined;
}

/**
 * Request Dispatcher Interface
 *
 * Performs one HTTP round-trip per Bot API call. Transport and decoding
 * failures come back as results, never as exceptions.
 */
export interface RequestDispatcher {
    /**
     * Call a Bot API method
     *
     * @param method - Method name (e.g. sendMessage)
     * @param params - Method arguments; undefined and null values are not sent
     * @param usePost - POST as multipart/form-data (default), or GET with a query string
     */
    send(method: string, params: ParameterBag, usePost?: boolean, options?: SendOptions): Promise<DispatchResult>;

    /**
     * Download a file from the file endpoint to a local path
     *
     * @param filePath - file_path returned by getFile
     * @throws {TransportError} If the download fails
     */
    download(filePath: string, destination: string): Promise<void>;

    /**
     * POST a JSON document to an arbitrary URL
     *
     * @throws {TransportError} On network failure or a non-2xx status
     */
    postJson(url: string, payload: unknown): Promise<unknown>;
}
