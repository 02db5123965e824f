export { BotApiClient, type BotApiClientOptions } from './bot-api.client';
export { BotApiError, InvalidArgumentError, InvalidUpdateError, TransportError } from './errors';
export {
    isApiSuccess,
    isTransportFailure,
    toApiResult,
    type ApiResponse,
    type ApiResult,
    type DispatchResult,
    type ForceReply,
    type InlineKeyboardButton,
    type InlineKeyboardMarkup,
    type JsonValue,
    type KeyboardButton,
    type ParameterBag,
    type ReactionType,
    type ReplyKeyboardMarkup,
    type ReplyKeyboardRemove,
    type ReplyMarkup,
    type TransportFailure,
} from './types';
export type { RequestDispatcher, SendOptions } from './adapters/http/http.interface';
export { KyDispatcher, type KyDispatcherOptions } from './adapters/http/ky-dispatcher.adapter';
export type { CallContext, ErrorLogSink } from './adapters/error-log/error-log.interface';
export { PinoErrorLog } from './adapters/error-log/pino-error-log.adapter';
export {
    buildForceReply,
    buildInlineKeyboard,
    buildInlineKeyboardButton,
    buildKeyboard,
    buildKeyboardButton,
    buildKeyboardHide,
    buildWebAppButton,
} from './markup/markup.builder';
export { flattenReactions, reactionTypeCustomEmoji, reactionTypeEmoji } from './markup/reaction.builder';
export { UpdatePoller } from './polling/update-poller.service';
export { runPollingLoop } from './polling/polling-loop';
export { UpdateContext } from './update/update-context.service';
export { UPDATE_KINDS, classifyUpdate, type UpdateKind } from './update/update-kinds';
export type { Update } from './update/update.schema';
export { createWebhookRoutes, type UpdateHandler } from './routes/webhook.route';
