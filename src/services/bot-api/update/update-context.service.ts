import { logger } from '@/shared/utils/logger';
import { InvalidUpdateError } from '../errors';
import { classifyUpdate, extract, type ExtractorTable, type UpdateKind } from './update-kinds';
import {
    chatOf,
    dateOf,
    inlineMessageIdOf,
    messageIdOf,
    messageOf,
    senderOf,
    textOf,
} from './update.extractors';
import {
    updateSchema,
    type CallbackQuery,
    type Chat,
    type Location,
    type Message,
    type Reaction,
    type ReactionCount,
    type Update,
    type User,
} from './update.schema';

/**
 * Update Context
 *
 * Holds the update currently being handled and answers questions about it.
 * Every accessor classifies the update first, then reads the field from the
 * payload of that kind. Missing nested fields read as undefined.
 *
 * One context serves one update at a time; the webhook host creates a
 * context per request.
 */
export class UpdateContext {
    private update: Update | undefined;

    constructor(update?: unknown) {
        if (update !== undefined) {
            this.setUpdate(update);
        }
    }

    /**
     * Load the update from a raw request body.
     *
     * A body that is not JSON, or not an update, leaves the stored update
     * untouched.
     *
     * @returns The stored update after loading
     */
    loadFromTransportBody(body: string): Update | undefined {
        let parsed: unknown;
        try {
            parsed = JSON.parse(body);
        } catch (error) {
            logger.debug({
                event: 'update.load.invalid_json',
                error: error instanceof Error ? error.message : 'Unknown error',
                bodyLength: body.length,
            }, 'Ignoring body that is not JSON');
            return this.update;
        }

        const result = updateSchema.safeParse(parsed);
        if (!result.success) {
            logger.debug({
                event: 'update.load.invalid_shape',
                issues: result.error.issues.map((issue) => issue.path.join('.')),
            }, 'Ignoring body that is not an update');
            return this.update;
        }

        this.update = result.data;
        return this.update;
    }

    /**
     * Replace the stored update
     *
     * @throws InvalidUpdateError when the value is not an update
     */
    setUpdate(update: unknown): void {
        const result = updateSchema.safeParse(update);
        if (!result.success) {
            throw new InvalidUpdateError(
                `Invalid update: ${result.error.issues[0]?.message ?? 'unexpected shape'}`,
                typeof update === 'object' && update !== null ? Object.keys(update) : [],
                result.error
            );
        }
        this.update = result.data;
    }

    getUpdate(): Update | undefined {
        return this.update;
    }

    updateId(): number | undefined {
        return this.update?.update_id;
    }

    /**
     * @throws InvalidUpdateError when no update is loaded or its kind is ambiguous
     */
    classify(): UpdateKind {
        return classifyUpdate(this.current());
    }

    // --- Common fields ---

    text(): string | undefined {
        return this.read(textOf);
    }

    chatId(): number | undefined {
        return this.read(chatOf)?.id;
    }

    userId(): number | undefined {
        return this.sender()?.id;
    }

    messageId(): number | undefined {
        return this.read(messageIdOf);
    }

    inlineMessageId(): string | undefined {
        return this.read(inlineMessageIdOf);
    }

    date(): number | undefined {
        return this.read(dateOf);
    }

    // --- Sender ---

    firstName(): string | undefined {
        return this.sender()?.first_name;
    }

    lastName(): string | undefined {
        return this.sender()?.last_name;
    }

    fullName(): string {
        return `${this.firstName() ?? ''} ${this.lastName() ?? ''}`.trim();
    }

    username(): string | undefined {
        return this.sender()?.username;
    }

    isPremium(): boolean {
        return this.sender()?.is_premium ?? false;
    }

    isBot(): boolean {
        return this.sender()?.is_bot ?? false;
    }

    /** IETF language tag of the sender's client, 'en' when unknown */
    language(): string {
        return this.sender()?.language_code ?? 'en';
    }

    // --- Message ---

    caption(): string | undefined {
        return this.message()?.caption;
    }

    location(): Location | undefined {
        return this.message()?.location;
    }

    replyToMessageId(): number | undefined {
        return this.message()?.reply_to_message?.message_id;
    }

    replyToMessageFromUserId(): number | undefined {
        return this.message()?.reply_to_message?.from?.id;
    }

    forwardFromId(): number | undefined {
        return this.message()?.forward_from?.id;
    }

    forwardFromChatId(): number | undefined {
        return this.message()?.forward_from_chat?.id;
    }

    contactPhoneNumber(): string | undefined {
        return this.message()?.contact?.phone_number;
    }

    // --- Chat ---

    isFromGroup(): boolean {
        const type = this.chat()?.type;
        return type !== undefined && type !== 'private';
    }

    groupTitle(): string | undefined {
        return this.chat()?.title;
    }

    // --- Callback query ---

    callbackQuery(): CallbackQuery | undefined {
        return this.payloadOf('callback_query');
    }

    callbackId(): string | undefined {
        return this.callbackQuery()?.id;
    }

    callbackData(): string | undefined {
        return this.callbackQuery()?.data;
    }

    callbackMessage(): Message | undefined {
        return this.callbackQuery()?.message;
    }

    callbackFromId(): number | undefined {
        return this.callbackQuery()?.from?.id;
    }

    callbackInstance(): string | undefined {
        return this.callbackQuery()?.chat_instance;
    }

    // --- Inline query ---

    inlineQuery(): Update['inline_query'] {
        return this.payloadOf('inline_query');
    }

    // --- Reactions ---

    newReaction(): Reaction[] | undefined {
        return this.payloadOf('message_reaction')?.new_reaction;
    }

    oldReaction(): Reaction[] | undefined {
        return this.payloadOf('message_reaction')?.old_reaction;
    }

    reactionCounts(): ReactionCount[] | undefined {
        return this.payloadOf('message_reaction_count')?.reactions;
    }

    // --- Poll answers ---

    pollId(): string | undefined {
        return this.payloadOf('poll_answer')?.poll_id;
    }

    pollOptionIds(): number[] | undefined {
        return this.payloadOf('poll_answer')?.option_ids;
    }

    // --- Internals ---

    private current(): Update {
        if (this.update === undefined) {
            throw new InvalidUpdateError('Invalid update: no update loaded');
        }
        return this.update;
    }

    private read<R>(table: ExtractorTable<R>): R | undefined {
        const update = this.current();
        return extract(update, classifyUpdate(update), table);
    }

    /** Payload of `kind` when the current update is of that kind */
    private payloadOf<K extends UpdateKind>(kind: K): Update[K] | undefined {
        const update = this.current();
        return classifyUpdate(update) === kind ? update[kind] : undefined;
    }

    private sender(): User | undefined {
        return this.read(senderOf);
    }

    private message(): Message | undefined {
        return this.read(messageOf);
    }

    private chat(): Chat | undefined {
        return this.read(chatOf);
    }
}
