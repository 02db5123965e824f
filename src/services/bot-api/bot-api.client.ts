import type { Options } from 'ky';
import { ZodError } from 'zod';
import { logger } from '@/shared/utils/logger';
import { validateProxyConfig } from '@/shared/utils/validators';
import type { ProxyConfig } from '@/shared/types/common.types';
import { InvalidArgumentError } from './errors';
import type { RequestDispatcher } from './adapters/http/http.interface';
import { KyDispatcher } from './adapters/http/ky-dispatcher.adapter';
import type { ErrorLogSink } from './adapters/error-log/error-log.interface';
import { PinoErrorLog } from './adapters/error-log/pino-error-log.adapter';
import { flattenReactions } from './markup/reaction.builder';
import { UpdatePoller } from './polling/update-poller.service';
import { UpdateContext } from './update/update-context.service';
import { toApiResult, type ApiResult, type ParameterBag } from './types';

export interface BotApiClientOptions {
    /** Bot token from @BotFather */
    token: string;
    /** API root (default: https://api.telegram.org) */
    apiBaseUrl?: string | undefined;
    /** Public URL of this bot's webhook, used by setWebhook and runCommand */
    webhookUrl?: string | undefined;
    /** Record failed calls to the log (default: true) */
    logErrors?: boolean | undefined;
    proxy?: ProxyConfig | undefined;
    /** Request timeout in milliseconds */
    timeoutMs?: number | undefined;
    /** Replaces the HTTP dispatcher */
    dispatcher?: RequestDispatcher | undefined;
    /** Replaces the default error log sink */
    errorLog?: ErrorLogSink | undefined;
    /** Replaces the proxy-aware fetch of the default dispatcher */
    fetch?: Options['fetch'];
}

/**
 * Bot API Client
 *
 * Entry point of the library. Sends Bot API calls through the dispatcher
 * and reads the update being handled through `context`.
 *
 * Every call returns an ApiResult: the decoded envelope, a transport
 * failure payload, other decoded JSON, or the raw body when the response
 * was not JSON.
 * Methods without a dedicated wrapper go through `endpoint()`.
 *
 * @example
 * const bot = new BotApiClient({ token: process.env.BOT_TOKEN ?? '' });
 * bot.context.loadFromTransportBody(body);
 * await bot.sendMessage({ chat_id: bot.context.chatId(), text: 'pong' });
 */
export class BotApiClient {
    readonly context: UpdateContext;
    private readonly dispatcher: RequestDispatcher;
    private readonly poller: UpdatePoller;
    private readonly options: BotApiClientOptions;
    private webhookUrl: string | undefined;

    constructor(options: BotApiClientOptions, context: UpdateContext = new UpdateContext()) {
        if (!options.token) {
            throw new InvalidArgumentError('Bot token is required', 'token');
        }

        this.options = options;
        this.context = context;
        this.webhookUrl = options.webhookUrl;
        this.dispatcher = options.dispatcher ?? new KyDispatcher({
            token: options.token,
            apiBaseUrl: options.apiBaseUrl,
            timeoutMs: options.timeoutMs,
            proxy: checkProxy(options.proxy),
            errorLog: options.errorLog ?? ((options.logErrors ?? true) ? new PinoErrorLog() : undefined),
            fetch: options.fetch,
        });
        this.poller = new UpdatePoller(this.dispatcher, this.context, { requestTimeoutMs: options.timeoutMs });
    }

    /**
     * Client sharing this one's dispatcher but reading another update
     */
    withContext(context: UpdateContext): BotApiClient {
        return new BotApiClient(
            { ...this.options, webhookUrl: this.webhookUrl, dispatcher: this.dispatcher },
            context
        );
    }

    /**
     * Call any Bot API method
     *
     * @param method - Method name as documented (e.g. sendPoll)
     * @param usePost - false sends a GET with a query string
     */
    async endpoint(method: string, params: ParameterBag = {}, usePost = true): Promise<ApiResult> {
        const result = await this.dispatcher.send(method, params, usePost, { update: this.context.getUpdate() });
        return toApiResult(result);
    }

    // --- Updates ---

    /**
     * Fetch updates by long polling; see UpdatePoller.poll
     */
    getUpdates(offset = 0, limit = 100, timeoutSeconds = 0, advanceOffset = true): Promise<ApiResult> {
        return this.poller.poll(offset, limit, timeoutSeconds, advanceOffset);
    }

    /**
     * Load entry `index` of the last getUpdates batch into the context
     */
    serveUpdate(index: number): void {
        this.poller.serveUpdate(index);
    }

    updateCount(): number {
        return this.poller.updateCount();
    }

    /**
     * Register the webhook. Without `url` the configured webhook URL is used;
     * an explicit `url` becomes the configured one.
     */
    setWebhook(params: ParameterBag = {}): Promise<ApiResult> {
        const { url } = params;
        if (url === undefined || url === null) {
            return this.endpoint('setWebhook', { ...params, url: this.webhookUrl });
        }
        if (typeof url === 'string') {
            this.webhookUrl = url;
        }
        return this.endpoint('setWebhook', params);
    }

    deleteWebhook(params: ParameterBag = {}): Promise<ApiResult> {
        return this.endpoint('deleteWebhook', params);
    }

    getWebhookInfo(): Promise<ApiResult> {
        return this.endpoint('getWebhookInfo', {}, false);
    }

    // --- Bot ---

    getMe(): Promise<ApiResult> {
        return this.endpoint('getMe', {}, false);
    }

    logOut(): Promise<ApiResult> {
        return this.endpoint('logOut', {}, false);
    }

    close(): Promise<ApiResult> {
        return this.endpoint('close', {}, false);
    }

    // --- Messages ---

    sendMessage(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('sendMessage', params);
    }

    forwardMessage(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('forwardMessage', params);
    }

    copyMessage(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('copyMessage', params);
    }

    sendPhoto(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('sendPhoto', params);
    }

    sendDocument(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('sendDocument', params);
    }

    sendLocation(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('sendLocation', params);
    }

    sendChatAction(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('sendChatAction', params);
    }

    editMessageText(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('editMessageText', params);
    }

    editMessageReplyMarkup(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('editMessageReplyMarkup', params);
    }

    deleteMessage(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('deleteMessage', params);
    }

    pinChatMessage(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('pinChatMessage', params);
    }

    unpinChatMessage(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('unpinChatMessage', params);
    }

    /**
     * Change the reactions on a message.
     *
     * `reaction` is a list of reaction groups (see reactionTypeEmoji) and is
     * flattened before sending.
     *
     * @throws {InvalidArgumentError} If reaction is missing or not an array
     */
    setMessageReaction(params: ParameterBag): Promise<ApiResult> {
        const reaction = flattenReactions(params.reaction);
        return this.endpoint('setMessageReaction', { ...params, reaction });
    }

    // --- Chat administration ---

    banChatMember(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('banChatMember', params);
    }

    unbanChatMember(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('unbanChatMember', params);
    }

    approveChatJoinRequest(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('approveChatJoinRequest', params);
    }

    declineChatJoinRequest(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('declineChatJoinRequest', params);
    }

    // --- Queries ---

    answerCallbackQuery(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('answerCallbackQuery', params);
    }

    answerInlineQuery(params: ParameterBag): Promise<ApiResult> {
        return this.endpoint('answerInlineQuery', params);
    }

    // --- Files ---

    getFile(fileId: string): Promise<ApiResult> {
        return this.endpoint('getFile', { file_id: fileId });
    }

    /**
     * Save a file to disk
     *
     * @param filePath - file_path from a getFile result
     * @throws {TransportError} If the download fails
     */
    downloadFile(filePath: string, destination: string): Promise<void> {
        return this.dispatcher.download(filePath, destination);
    }

    // --- Testing helpers ---

    /**
     * Replay a command against this bot's own webhook, as if the sender of
     * the current message had typed it.
     *
     * @returns The webhook's response body
     * @throws {InvalidArgumentError} Without a webhook URL or a current message update
     * @throws {TransportError} If the webhook cannot be reached
     */
    async runCommand(command: string): Promise<unknown> {
        const url = this.webhookUrl;
        if (!url) {
            throw new InvalidArgumentError('runCommand needs a webhook URL', 'webhookUrl');
        }

        const update = this.context.getUpdate();
        const message = update?.message;
        if (update === undefined || message === undefined) {
            throw new InvalidArgumentError('runCommand needs a current message update', 'update');
        }

        const commandLength = command.split(/\s/, 1)[0]?.length ?? 0;
        const payload = {
            update_id: update.update_id + 1,
            message: {
                message_id: (message.message_id ?? 0) + 1,
                from: message.from,
                chat: message.chat,
                date: Math.floor(Date.now() / 1000),
                text: command,
                entities: [{ offset: 0, length: commandLength, type: 'bot_command' }],
            },
        };

        logger.debug({
            event: 'bot_api.run_command',
            updateId: payload.update_id,
            command: command.slice(0, commandLength),
        }, 'Replaying command against webhook');

        return this.dispatcher.postJson(url, payload);
    }
}

function checkProxy(proxy: ProxyConfig | undefined): ProxyConfig | undefined {
    if (proxy === undefined) {
        return undefined;
    }
    try {
        return validateProxyConfig(proxy);
    } catch (error) {
        if (error instanceof ZodError) {
            throw new InvalidArgumentError(
                `Invalid proxy settings: ${error.issues.map((issue) => issue.path.join('.')).join(', ')}`,
                'proxy',
                error
            );
        }
        throw error;
    }
}
