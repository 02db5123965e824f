import { describe, it, expect } from 'vitest';
import {
    buildForceReply,
    buildInlineKeyboard,
    buildInlineKeyboardButton,
    buildKeyboard,
    buildKeyboardButton,
    buildKeyboardHide,
    buildWebAppButton,
} from '@/services/bot-api/markup/markup.builder';
import { flattenReactions, reactionTypeCustomEmoji, reactionTypeEmoji } from '@/services/bot-api/markup/reaction.builder';
import { encodeValue } from '@/services/bot-api/adapters/http/ky-dispatcher.adapter';
import { InvalidArgumentError } from '@/services/bot-api/errors';

/**
 * Unit tests for markup and reaction builders
 */

describe('Markup builders', () => {
    describe('buildInlineKeyboard', () => {
        it('should keep the row structure through encoding', () => {
            const rows = [
                [
                    buildInlineKeyboardButton('Yes', { callbackData: 'answer:yes' }),
                    buildInlineKeyboardButton('No', { callbackData: 'answer:no' }),
                ],
                [buildInlineKeyboardButton('Docs', { url: 'https://example.com/docs' })],
            ];

            const encoded = encodeValue(buildInlineKeyboard(rows));
            const decoded: unknown = JSON.parse(encoded ?? '');

            expect(decoded).toEqual({
                inline_keyboard: [
                    [
                        { text: 'Yes', callback_data: 'answer:yes' },
                        { text: 'No', callback_data: 'answer:no' },
                    ],
                    [{ text: 'Docs', url: 'https://example.com/docs' }],
                ],
            });
        });
    });

    describe('buildInlineKeyboardButton', () => {
        it('should leave out empty fields and a false pay flag', () => {
            const button = buildInlineKeyboardButton('Go', { url: '', callbackData: 'go', loginUrl: {}, pay: false });

            expect(button).toEqual({ text: 'Go', callback_data: 'go' });
        });

        it('should keep an empty inline query switch', () => {
            expect(buildInlineKeyboardButton('Search', { switchInlineQueryCurrentChat: '' })).toEqual({
                text: 'Search',
                switch_inline_query_current_chat: '',
            });
        });

        it('should set pay when requested', () => {
            expect(buildInlineKeyboardButton('Pay', { pay: true })).toEqual({ text: 'Pay', pay: true });
        });
    });

    describe('buildKeyboard', () => {
        it('should keep false flags explicit and default selective to true', () => {
            expect(buildKeyboard([['A', 'B'], ['C']])).toEqual({
                keyboard: [[{ text: 'A' }, { text: 'B' }], [{ text: 'C' }]],
                is_persistent: false,
                resize_keyboard: false,
                one_time_keyboard: false,
                selective: true,
            });
        });

        it('should include a non-empty placeholder', () => {
            const markup = buildKeyboard([[buildKeyboardButton('Share', { requestContact: true })]], {
                resizeKeyboard: true,
                inputFieldPlaceholder: 'Pick one',
                selective: false,
            });

            expect(markup.keyboard).toEqual([[{ text: 'Share', request_contact: true }]]);
            expect(markup.resize_keyboard).toBe(true);
            expect(markup.input_field_placeholder).toBe('Pick one');
            expect(markup.selective).toBe(false);
        });

        it('should drop an empty placeholder', () => {
            expect('input_field_placeholder' in buildKeyboard([['A']], { inputFieldPlaceholder: '' })).toBe(false);
        });
    });

    describe('buildKeyboardButton', () => {
        it('should leave out false and empty request fields', () => {
            expect(buildKeyboardButton('Plain', { requestContact: false, requestPoll: {} })).toEqual({ text: 'Plain' });
        });
    });

    describe('other markup', () => {
        it('should build a remove-keyboard markup', () => {
            expect(buildKeyboardHide()).toEqual({ remove_keyboard: true, selective: true });
            expect(buildKeyboardHide(false)).toEqual({ remove_keyboard: true, selective: false });
        });

        it('should build a web app button', () => {
            expect(buildWebAppButton('Open', 'https://example.com/app')).toEqual({
                text: 'Open',
                web_app: { url: 'https://example.com/app' },
            });
        });

        it('should build a force reply with and without a placeholder', () => {
            expect(buildForceReply()).toEqual({ force_reply: true, selective: true });
            expect(buildForceReply('Your name', false)).toEqual({
                force_reply: true,
                input_field_placeholder: 'Your name',
                selective: false,
            });
        });
    });
});

describe('Reaction builders', () => {
    it('should build one descriptor per emoji', () => {
        expect(reactionTypeEmoji('🔥')).toEqual([{ type: 'emoji', emoji: '🔥' }]);
        expect(reactionTypeCustomEmoji(['100', '200'])).toEqual([
            { type: 'custom_emoji', custom_emoji_id: '100' },
            { type: 'custom_emoji', custom_emoji_id: '200' },
        ]);
    });

    it('should flatten reaction groups in order', () => {
        const flattened = flattenReactions([reactionTypeEmoji(['👍']), reactionTypeEmoji(['👍', '👎'])]);

        expect(flattened).toEqual([
            { type: 'emoji', emoji: '👍' },
            { type: 'emoji', emoji: '👍' },
            { type: 'emoji', emoji: '👎' },
        ]);
    });

    it('should accept single descriptors next to groups', () => {
        expect(flattenReactions([{ type: 'paid' }, reactionTypeEmoji('🎉')])).toEqual([
            { type: 'paid' },
            { type: 'emoji', emoji: '🎉' },
        ]);
    });

    it('should reject a reaction that is not an array', () => {
        expect(() => flattenReactions('👍')).toThrow(InvalidArgumentError);
        expect(() => flattenReactions(undefined)).toThrow('reaction must be an array');
    });

    it('should reject entries that are not descriptors', () => {
        expect(() => flattenReactions([{ type: 'emoji' }])).toThrow('reaction[0] is not a reaction descriptor');
    });
});
