import { InvalidArgumentError } from '../errors';
import { reactionTypeSchema, type ReactionType } from '../types';

/**
 * Emoji reactions, one descriptor per emoji
 * @see https://core.telegram.org/bots/api#reactiontypeemoji
 */
export function reactionTypeEmoji(emoji: string | string[]): ReactionType[] {
    return (Array.isArray(emoji) ? emoji : [emoji]).map((value): ReactionType => ({ type: 'emoji', emoji: value }));
}

/**
 * Custom emoji reactions, one descriptor per custom emoji id
 * @see https://core.telegram.org/bots/api#reactiontypecustomemoji
 */
export function reactionTypeCustomEmoji(customEmojiId: string | string[]): ReactionType[] {
    return (Array.isArray(customEmojiId) ? customEmojiId : [customEmojiId]).map((value): ReactionType => ({
        type: 'custom_emoji',
        custom_emoji_id: value,
    }));
}

/**
 * Merge a list of reaction groups into one flat list, keeping order.
 *
 * Each entry is either a single descriptor or an array of them, as returned
 * by the helpers above.
 *
 * @throws {InvalidArgumentError} If the value is not an array or holds something that is not a reaction
 */
export function flattenReactions(reaction: unknown): ReactionType[] {
    if (!Array.isArray(reaction)) {
        throw new InvalidArgumentError('reaction must be an array of reaction descriptors', 'reaction');
    }

    return reaction.flat().map((entry, index) => {
        const parsed = reactionTypeSchema.safeParse(entry);
        if (!parsed.success) {
            throw new InvalidArgumentError(`reaction[${index}] is not a reaction descriptor`, 'reaction');
        }
        return parsed.data;
    });
}
