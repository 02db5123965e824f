import type { ExtractorTable } from './update-kinds';
import type { Chat, Message, User } from './update.schema';

/**
 * Per-field extraction tables.
 *
 * Each table lists the kinds whose payload carries the field and where it
 * lives in that payload. A kind missing from a table extracts to undefined.
 */

function onMessages<R>(fn: (message: Message) => R | undefined) {
    return {
        message: fn,
        edited_message: fn,
        channel_post: fn,
        edited_channel_post: fn,
    };
}

/** Message text, inline query, or callback data */
export const textOf: ExtractorTable<string> = {
    ...onMessages((message) => message.text),
    inline_query: (query) => query.query,
    chosen_inline_result: (result) => result.query,
    callback_query: (query) => query.data,
};

/** The chat the update happened in */
export const chatOf: ExtractorTable<Chat> = {
    ...onMessages((message) => message.chat),
    message_reaction: (reaction) => reaction.chat,
    message_reaction_count: (count) => count.chat,
    my_chat_member: (member) => member.chat,
    chat_member: (member) => member.chat,
    chat_join_request: (request) => request.chat,
    chat_boost: (boost) => boost.chat,
    removed_chat_boost: (removed) => removed.chat,
    callback_query: (query) => query.message?.chat,
    poll_answer: (answer) => answer.voter_chat,
};

/** The user who caused the update */
export const senderOf: ExtractorTable<User> = {
    ...onMessages((message) => message.from),
    inline_query: (query) => query.from,
    chosen_inline_result: (result) => result.from,
    callback_query: (query) => query.from,
    shipping_query: (query) => query.from,
    pre_checkout_query: (query) => query.from,
    my_chat_member: (member) => member.from,
    chat_member: (member) => member.from,
    chat_join_request: (request) => request.from,
    chat_boost: (boost) => boost.boost?.source?.user,
    removed_chat_boost: (removed) => removed.source?.user ?? removed.boost?.source?.user,
    message_reaction: (reaction) => reaction.user,
    poll_answer: (answer) => answer.user,
};

export const messageIdOf: ExtractorTable<number> = {
    ...onMessages((message) => message.message_id),
    message_reaction: (reaction) => reaction.message_id,
    message_reaction_count: (count) => count.message_id,
    callback_query: (query) => query.message?.message_id,
};

/** The message an update is about, when it carries one */
export const messageOf: ExtractorTable<Message> = {
    ...onMessages((message) => message),
    callback_query: (query) => query.message,
};

export const inlineMessageIdOf: ExtractorTable<string> = {
    callback_query: (query) => query.inline_message_id,
    chosen_inline_result: (result) => result.inline_message_id,
};

/** Unix time of the event */
export const dateOf: ExtractorTable<number> = {
    ...onMessages((message) => message.date),
    message_reaction: (reaction) => reaction.date,
    message_reaction_count: (count) => count.date,
    my_chat_member: (member) => member.date,
    chat_member: (member) => member.date,
    chat_join_request: (request) => request.date,
};
