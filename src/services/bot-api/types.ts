import { z } from 'zod';

/**
 * Bot API Types
 */

/**
 * Arguments of one outgoing call.
 *
 * Optional fields are left out rather than set to null: a key that is
 * present is transmitted. undefined and null values are skipped on encoding.
 */
export type ParameterBag = Record<string, unknown>;

/**
 * Envelope returned by every Bot API method
 * @see https://core.telegram.org/bots/api#making-requests
 */
export const apiResponseSchema = z.discriminatedUnion('ok', [
    z.object({
        ok: z.literal(true),
        result: z.unknown(),
        description: z.string().optional(),
    }).passthrough(),
    z.object({
        ok: z.literal(false),
        error_code: z.number().optional(),
        description: z.string().optional(),
        parameters: z.object({
            migrate_to_chat_id: z.number().optional(),
            retry_after: z.number().optional(),
        }).optional(),
    }).passthrough(),
]);

export type ApiResponse = z.infer<typeof apiResponseSchema>;

/**
 * Synthetic payload produced when the request never got an HTTP response
 */
export interface TransportFailure {
    ok: false;
    /** Network error code (e.g. ECONNREFUSED, ETIMEDOUT) */
    error_code: string;
    error_message: string;
}

/**
 * Any value JSON.parse can produce
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * What a facade call hands back: the decoded envelope, the transport failure
 * payload, whatever JSON the server sent when it was not an envelope, or the
 * raw body when it was not JSON at all. Use the guards below to tell them apart.
 */
export type ApiResult = ApiResponse | TransportFailure | JsonValue;

/**
 * Outcome of one dispatched call
 */
export type DispatchResult =
    | { kind: 'decoded'; status: number; body: string; data: ApiResponse }
    | { kind: 'json'; status: number; body: string; data: JsonValue }
    | { kind: 'raw'; status: number; body: string }
    | { kind: 'transport_error'; body: string; data: TransportFailure };

/**
 * Collapse a dispatch outcome into the value callers receive
 */
export function toApiResult(result: DispatchResult): ApiResult {
    return result.kind === 'raw' ? result.body : result.data;
}

function isJsonObject(result: ApiResult): result is { [key: string]: JsonValue } | ApiResponse | TransportFailure {
    return typeof result === 'object' && result !== null && !Array.isArray(result);
}

/**
 * True when the call reached the API and the API accepted it
 */
export function isApiSuccess(result: ApiResult): result is Extract<ApiResponse, { ok: true }> {
    return isJsonObject(result) && result.ok === true;
}

/**
 * True when the request never got an HTTP response
 */
export function isTransportFailure(result: ApiResult): result is TransportFailure {
    return isJsonObject(result)
        && result.ok === false
        && typeof result.error_code === 'string'
        && typeof result.error_message === 'string';
}

/**
 * Reaction descriptor
 * @see https://core.telegram.org/bots/api#reactiontype
 */
export const reactionTypeSchema = z.union([
    z.object({ type: z.literal('emoji'), emoji: z.string().min(1) }),
    z.object({ type: z.literal('custom_emoji'), custom_emoji_id: z.string().min(1) }),
    z.object({ type: z.literal('paid') }),
]);

export type ReactionType = z.infer<typeof reactionTypeSchema>;

/**
 * Button of a custom reply keyboard
 * @see https://core.telegram.org/bots/api#keyboardbutton
 */
export type KeyboardButton = {
    text: string;
    request_users?: Record<string, unknown>;
    request_chat?: Record<string, unknown>;
    request_contact?: boolean;
    request_location?: boolean;
    request_poll?: Record<string, unknown>;
    web_app?: { url: string };
};

/**
 * Button of an inline keyboard
 * @see https://core.telegram.org/bots/api#inlinekeyboardbutton
 */
export type InlineKeyboardButton = {
    text: string;
    url?: string;
    callback_data?: string;
    web_app?: { url: string };
    login_url?: Record<string, unknown>;
    switch_inline_query?: string;
    switch_inline_query_current_chat?: string;
    switch_inline_query_chosen_chat?: Record<string, unknown>;
    callback_game?: Record<string, unknown>;
    pay?: boolean;
};

export type ReplyKeyboardMarkup = {
    keyboard: KeyboardButton[][];
    is_persistent: boolean;
    resize_keyboard: boolean;
    one_time_keyboard: boolean;
    input_field_placeholder?: string;
    selective: boolean;
};

export type InlineKeyboardMarkup = {
    inline_keyboard: InlineKeyboardButton[][];
};

export type ReplyKeyboardRemove = {
    remove_keyboard: true;
    selective: boolean;
};

export type ForceReply = {
    force_reply: true;
    input_field_placeholder?: string;
    selective: boolean;
};

/**
 * Exactly one of these is attached to an outgoing message as reply_markup
 */
export type ReplyMarkup = ReplyKeyboardMarkup | InlineKeyboardMarkup | ReplyKeyboardRemove | ForceReply;
