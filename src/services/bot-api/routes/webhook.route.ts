import { Hono } from 'hono';
import { logger, logUpdateReceived } from '@/shared/utils/logger';
import { getWideEvent } from '@/shared/middleware/wide-event.middleware';
import type { AppEnv } from '@/shared/types/wide-event.types';
import type { BotApiClient } from '../bot-api.client';
import { InvalidUpdateError } from '../errors';
import { UpdateContext } from '../update/update-context.service';
import type { UpdateKind } from '../update/update-kinds';

export const SECRET_TOKEN_HEADER = 'X-Telegram-Bot-Api-Secret-Token';

/**
 * Handles one classified update; `bot.context` holds the update
 */
export type UpdateHandler = (bot: BotApiClient, kind: UpdateKind) => Promise<void> | void;

export interface WebhookRouteOptions {
    /** Expected value of the secret token header; unchecked when unset */
    secret?: string | undefined;
}

/**
 * Create webhook routes
 *
 * @param bot - Client whose dispatcher handlers share
 * @param handler - Called once per classified update
 * @returns Hono app with the webhook route
 */
export function createWebhookRoutes(bot: BotApiClient, handler: UpdateHandler, options: WebhookRouteOptions = {}) {
    const app = new Hono<AppEnv>();

    /**
     * POST /webhook/telegram
     *
     * Receives updates pushed by the Bot API. Bodies that are not updates
     * are acknowledged so the server does not redeliver them.
     */
    app.post('/webhook/telegram', async (c) => {
        const wideEvent = getWideEvent(c);

        if (options.secret !== undefined && c.req.header(SECRET_TOKEN_HEADER) !== options.secret) {
            logger.warn({
                event: 'webhook.secret.mismatch',
                hasHeader: c.req.header(SECRET_TOKEN_HEADER) !== undefined,
            }, 'Rejected webhook request with wrong secret token');

            return c.json({ status: 'error', error: 'Unauthorized' }, 401);
        }

        const context = new UpdateContext();
        const update = context.loadFromTransportBody(await c.req.text());

        if (update === undefined) {
            logger.warn({ event: 'webhook.update.invalid' }, 'Ignoring webhook body that is not an update');
            if (wideEvent) {
                wideEvent.outcome = 'ignored';
                wideEvent.update = { ignored_reason: 'invalid_body' };
            }
            return c.json({ status: 'ignored' });
        }

        let kind: UpdateKind;
        try {
            kind = context.classify();
        } catch (error) {
            if (!(error instanceof InvalidUpdateError)) {
                throw error;
            }
            logger.warn({
                event: 'webhook.update.unclassifiable',
                updateId: update.update_id,
                keys: error.keys,
            }, error.message);
            if (wideEvent) {
                wideEvent.outcome = 'ignored';
                wideEvent.update = { id: update.update_id, ignored_reason: 'unclassifiable' };
            }
            return c.json({ status: 'ignored' });
        }

        logUpdateReceived({ source: 'webhook', updateId: update.update_id, kind });

        if (wideEvent) {
            wideEvent.update = {
                id: update.update_id,
                kind,
                chat_id: context.chatId(),
                user_id: context.userId(),
            };
        }

        const startTime = Date.now();
        try {
            await handler(bot.withContext(context), kind);
            if (wideEvent) {
                wideEvent.handler = { duration_ms: Date.now() - startTime, success: true };
            }
        } catch (error) {
            if (wideEvent) {
                wideEvent.handler = { duration_ms: Date.now() - startTime, success: false };
            }
            throw error;
        }

        return c.json({ status: 'success' });
    });

    return app;
}
