import { z } from 'zod';

/**
 * Update payload schemas
 *
 * Updates arrive loosely shaped: every nested field is optional and unknown
 * fields are kept. Validation only rejects values of the wrong type, so an
 * accessor can rely on `chat.id` being a number whenever it is present.
 *
 * @see https://core.telegram.org/bots/api#update
 */

export const userSchema = z.object({
    id: z.number().optional(),
    is_bot: z.boolean().optional(),
    first_name: z.string().optional(),
    last_name: z.string().optional(),
    username: z.string().optional(),
    language_code: z.string().optional(),
    is_premium: z.boolean().optional(),
}).passthrough();

export const chatSchema = z.object({
    id: z.number().optional(),
    type: z.string().optional(),
    title: z.string().optional(),
    username: z.string().optional(),
    first_name: z.string().optional(),
    last_name: z.string().optional(),
}).passthrough();

export const locationSchema = z.object({
    latitude: z.number(),
    longitude: z.number(),
}).passthrough();

const contactSchema = z.object({
    phone_number: z.string().optional(),
    first_name: z.string().optional(),
    last_name: z.string().optional(),
    user_id: z.number().optional(),
}).passthrough();

const messageEntitySchema = z.object({
    type: z.string(),
    offset: z.number(),
    length: z.number(),
}).passthrough();

const baseMessageSchema = z.object({
    message_id: z.number().optional(),
    message_thread_id: z.number().optional(),
    from: userSchema.optional(),
    sender_chat: chatSchema.optional(),
    chat: chatSchema.optional(),
    date: z.number().optional(),
    text: z.string().optional(),
    caption: z.string().optional(),
    entities: z.array(messageEntitySchema).optional(),
    location: locationSchema.optional(),
    contact: contactSchema.optional(),
    forward_from: userSchema.optional(),
    forward_from_chat: chatSchema.optional(),
}).passthrough();

/** reply_to_message never nests another reply_to_message */
export const messageSchema = baseMessageSchema.extend({
    reply_to_message: baseMessageSchema.optional(),
}).passthrough();

const inlineQuerySchema = z.object({
    id: z.string().optional(),
    from: userSchema.optional(),
    query: z.string().optional(),
    offset: z.string().optional(),
    chat_type: z.string().optional(),
    location: locationSchema.optional(),
}).passthrough();

const chosenInlineResultSchema = z.object({
    result_id: z.string().optional(),
    from: userSchema.optional(),
    query: z.string().optional(),
    inline_message_id: z.string().optional(),
    location: locationSchema.optional(),
}).passthrough();

export const callbackQuerySchema = z.object({
    id: z.string().optional(),
    from: userSchema.optional(),
    message: messageSchema.optional(),
    inline_message_id: z.string().optional(),
    chat_instance: z.string().optional(),
    data: z.string().optional(),
    game_short_name: z.string().optional(),
}).passthrough();

const shippingQuerySchema = z.object({
    id: z.string().optional(),
    from: userSchema.optional(),
    invoice_payload: z.string().optional(),
}).passthrough();

const preCheckoutQuerySchema = z.object({
    id: z.string().optional(),
    from: userSchema.optional(),
    currency: z.string().optional(),
    total_amount: z.number().optional(),
    invoice_payload: z.string().optional(),
}).passthrough();

const chatMemberUpdatedSchema = z.object({
    chat: chatSchema.optional(),
    from: userSchema.optional(),
    date: z.number().optional(),
    old_chat_member: z.object({}).passthrough().optional(),
    new_chat_member: z.object({}).passthrough().optional(),
}).passthrough();

const chatJoinRequestSchema = z.object({
    chat: chatSchema.optional(),
    from: userSchema.optional(),
    user_chat_id: z.number().optional(),
    date: z.number().optional(),
    bio: z.string().optional(),
}).passthrough();

/** Incoming reactions stay open to types added after this schema was written */
const reactionSchema = z.object({
    type: z.string(),
    emoji: z.string().optional(),
    custom_emoji_id: z.string().optional(),
}).passthrough();

const messageReactionUpdatedSchema = z.object({
    chat: chatSchema.optional(),
    message_id: z.number().optional(),
    user: userSchema.optional(),
    actor_chat: chatSchema.optional(),
    date: z.number().optional(),
    old_reaction: z.array(reactionSchema).optional(),
    new_reaction: z.array(reactionSchema).optional(),
}).passthrough();

const reactionCountSchema = z.object({
    type: reactionSchema,
    total_count: z.number(),
});

const messageReactionCountUpdatedSchema = z.object({
    chat: chatSchema.optional(),
    message_id: z.number().optional(),
    date: z.number().optional(),
    reactions: z.array(reactionCountSchema).optional(),
}).passthrough();

const chatBoostSourceSchema = z.object({
    source: z.string().optional(),
    user: userSchema.optional(),
}).passthrough();

const chatBoostSchema = z.object({
    boost_id: z.string().optional(),
    add_date: z.number().optional(),
    expiration_date: z.number().optional(),
    source: chatBoostSourceSchema.optional(),
}).passthrough();

const chatBoostUpdatedSchema = z.object({
    chat: chatSchema.optional(),
    boost: chatBoostSchema.optional(),
}).passthrough();

const chatBoostRemovedSchema = z.object({
    chat: chatSchema.optional(),
    boost_id: z.string().optional(),
    remove_date: z.number().optional(),
    source: chatBoostSourceSchema.optional(),
    boost: chatBoostSchema.optional(),
}).passthrough();

const pollAnswerSchema = z.object({
    poll_id: z.string().optional(),
    voter_chat: chatSchema.optional(),
    user: userSchema.optional(),
    option_ids: z.array(z.number()).optional(),
}).passthrough();

/**
 * Update envelope: a numeric update_id plus at most one kind field
 */
export const updateSchema = z.object({
    update_id: z.number().int(),
    message: messageSchema.optional(),
    edited_message: messageSchema.optional(),
    channel_post: messageSchema.optional(),
    edited_channel_post: messageSchema.optional(),
    message_reaction: messageReactionUpdatedSchema.optional(),
    message_reaction_count: messageReactionCountUpdatedSchema.optional(),
    inline_query: inlineQuerySchema.optional(),
    chosen_inline_result: chosenInlineResultSchema.optional(),
    callback_query: callbackQuerySchema.optional(),
    shipping_query: shippingQuerySchema.optional(),
    pre_checkout_query: preCheckoutQuerySchema.optional(),
    my_chat_member: chatMemberUpdatedSchema.optional(),
    chat_member: chatMemberUpdatedSchema.optional(),
    chat_join_request: chatJoinRequestSchema.optional(),
    chat_boost: chatBoostUpdatedSchema.optional(),
    removed_chat_boost: chatBoostRemovedSchema.optional(),
    poll_answer: pollAnswerSchema.optional(),
}).passthrough();

export type Update = z.infer<typeof updateSchema>;
export type User = z.infer<typeof userSchema>;
export type Chat = z.infer<typeof chatSchema>;
export type Message = z.infer<typeof messageSchema>;
export type Location = z.infer<typeof locationSchema>;
export type CallbackQuery = z.infer<typeof callbackQuerySchema>;
export type Reaction = z.infer<typeof reactionSchema>;
export type ReactionCount = z.infer<typeof reactionCountSchema>;
