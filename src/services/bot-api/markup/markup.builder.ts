import type {
    ForceReply,
    InlineKeyboardButton,
    InlineKeyboardMarkup,
    KeyboardButton,
    ReplyKeyboardMarkup,
    ReplyKeyboardRemove,
} from '../types';

/**
 * Reply markup builders
 *
 * Markup objects are returned as plain values and JSON-encoded by the
 * dispatcher when passed as `reply_markup`. Markup-level flags are always
 * sent; button descriptors leave out fields that are empty or false.
 * @see https://core.telegram.org/bots/api#replykeyboardmarkup
 */

export interface KeyboardOptions {
    isPersistent?: boolean;
    resizeKeyboard?: boolean;
    oneTimeKeyboard?: boolean;
    /** 1-64 characters; an empty placeholder is left out */
    inputFieldPlaceholder?: string;
    selective?: boolean;
}

export interface InlineButtonOptions {
    url?: string;
    callbackData?: string;
    loginUrl?: Record<string, unknown>;
    /** Sent even when empty: '' opens inline mode with an empty query */
    switchInlineQuery?: string;
    switchInlineQueryCurrentChat?: string;
    switchInlineQueryChosenChat?: Record<string, unknown>;
    callbackGame?: Record<string, unknown>;
    pay?: boolean;
}

export interface KeyboardButtonOptions {
    requestUsers?: Record<string, unknown>;
    requestChat?: Record<string, unknown>;
    requestContact?: boolean;
    requestLocation?: boolean;
    requestPoll?: Record<string, unknown>;
}

/**
 * Custom reply keyboard
 *
 * @param rows - Rows of buttons (strings are shorthand for `{ text }`)
 */
export function buildKeyboard(
    rows: (KeyboardButton | string)[][],
    options: KeyboardOptions = {}
): ReplyKeyboardMarkup {
    const {
        isPersistent = false,
        resizeKeyboard = false,
        oneTimeKeyboard = false,
        inputFieldPlaceholder,
        selective = true,
    } = options;

    return {
        keyboard: rows.map((row) => row.map((button) => (typeof button === 'string' ? { text: button } : button))),
        is_persistent: isPersistent,
        resize_keyboard: resizeKeyboard,
        one_time_keyboard: oneTimeKeyboard,
        ...(inputFieldPlaceholder ? { input_field_placeholder: inputFieldPlaceholder } : {}),
        selective,
    };
}

/**
 * Inline keyboard attached to a message
 */
export function buildInlineKeyboard(rows: InlineKeyboardButton[][]): InlineKeyboardMarkup {
    return { inline_keyboard: rows };
}

export function buildInlineKeyboardButton(text: string, options: InlineButtonOptions = {}): InlineKeyboardButton {
    const button: InlineKeyboardButton = { text };

    if (options.url) button.url = options.url;
    if (options.callbackData) button.callback_data = options.callbackData;
    if (isFilled(options.loginUrl)) button.login_url = options.loginUrl;
    if (options.switchInlineQuery !== undefined) button.switch_inline_query = options.switchInlineQuery;
    if (options.switchInlineQueryCurrentChat !== undefined) {
        button.switch_inline_query_current_chat = options.switchInlineQueryCurrentChat;
    }
    if (isFilled(options.switchInlineQueryChosenChat)) {
        button.switch_inline_query_chosen_chat = options.switchInlineQueryChosenChat;
    }
    if (isFilled(options.callbackGame)) button.callback_game = options.callbackGame;
    if (options.pay) button.pay = true;

    return button;
}

export function buildKeyboardButton(text: string, options: KeyboardButtonOptions = {}): KeyboardButton {
    const button: KeyboardButton = { text };

    if (isFilled(options.requestUsers)) button.request_users = options.requestUsers;
    if (isFilled(options.requestChat)) button.request_chat = options.requestChat;
    if (options.requestContact) button.request_contact = true;
    if (options.requestLocation) button.request_location = true;
    if (isFilled(options.requestPoll)) button.request_poll = options.requestPoll;

    return button;
}

/**
 * Remove the custom keyboard
 */
export function buildKeyboardHide(selective = true): ReplyKeyboardRemove {
    return { remove_keyboard: true, selective };
}

/**
 * Keyboard button that opens a Web App
 */
export function buildWebAppButton(text: string, url: string): KeyboardButton {
    return { text, web_app: { url } };
}

/**
 * Ask the client to show a reply interface
 */
export function buildForceReply(inputFieldPlaceholder = '', selective = true): ForceReply {
    return {
        force_reply: true,
        ...(inputFieldPlaceholder ? { input_field_placeholder: inputFieldPlaceholder } : {}),
        selective,
    };
}

function isFilled(value: Record<string, unknown> | undefined): value is Record<string, unknown> {
    return value !== undefined && Object.keys(value).length > 0;
}
