import { InvalidUpdateError } from '../errors';
import type { Update } from './update.schema';

/**
 * Update kinds, one per mutually exclusive top-level field of an Update
 * @see https://core.telegram.org/bots/api#update
 */
export const UPDATE_KINDS = [
    'message',
    'edited_message',
    'channel_post',
    'edited_channel_post',
    'message_reaction',
    'message_reaction_count',
    'inline_query',
    'chosen_inline_result',
    'callback_query',
    'shipping_query',
    'pre_checkout_query',
    'my_chat_member',
    'chat_member',
    'chat_join_request',
    'chat_boost',
    'removed_chat_boost',
    'poll_answer',
] as const;

export type UpdateKind = (typeof UPDATE_KINDS)[number];

/**
 * Payload type carried by each kind
 */
export type UpdatePayloads = { [K in UpdateKind]: NonNullable<Update[K]> };

/**
 * One extraction closure per kind that carries the field; kinds left out
 * do not carry it and extract to undefined.
 */
export type ExtractorTable<R> = {
    [K in UpdateKind]?: (payload: UpdatePayloads[K]) => R | undefined;
};

export function isUpdateKind(key: string): key is UpdateKind {
    return (UPDATE_KINDS as readonly string[]).includes(key);
}

/**
 * Determine the kind of an update.
 *
 * Exactly one known kind field must be present. Fields outside the known
 * kinds are ignored, so a payload with only update_id (or only unknown
 * fields) is rejected.
 *
 * @throws InvalidUpdateError when zero or several kind fields are present
 */
export function classifyUpdate(update: Update): UpdateKind {
    const keys = Object.keys(update);
    const present = keys.filter(isUpdateKind).filter((kind) => update[kind] !== undefined);

    if (present.length === 0) {
        throw new InvalidUpdateError('Invalid update: no known update kind present', keys);
    }
    if (present.length > 1) {
        throw new InvalidUpdateError(
            `Invalid update: several update kinds present (${present.join(', ')})`,
            keys
        );
    }

    return present[0];
}

/**
 * Run the extraction closure registered for `kind` against the update's payload
 */
export function extract<K extends UpdateKind, R>(
    update: Update,
    kind: K,
    table: ExtractorTable<R>
): R | undefined {
    const extractor = table[kind];
    const payload = update[kind];

    if (extractor === undefined || payload == null) {
        return undefined;
    }

    return extractor(payload);
}
