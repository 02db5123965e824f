import { logger } from '@/shared/utils/logger';
import type { UpdateHandler } from '../routes/webhook.route';

/**
 * Handler used when the host is started without one of its own.
 *
 * Logs each update, answers /ping with "pong" and acknowledges callback
 * queries so clients stop showing a progress indicator.
 */
export const defaultUpdateHandler: UpdateHandler = async (bot, kind) => {
    const { context } = bot;

    logger.info({
        event: 'update.handled',
        updateId: context.updateId(),
        kind,
        chatId: context.chatId(),
        userId: context.userId(),
        textLength: context.text()?.length,
    }, `Handled ${kind} update`);

    if (kind === 'callback_query') {
        await bot.answerCallbackQuery({ callback_query_id: context.callbackId() });
        return;
    }

    if (kind === 'message' && context.text()?.split(/\s/, 1)[0] === '/ping') {
        await bot.sendMessage({
            chat_id: context.chatId(),
            text: 'pong',
            reply_parameters: { message_id: context.messageId() },
        });
    }
};
