import { setTimeout as sleep } from 'timers/promises';
import { logger, logUpdateReceived, logError } from '@/shared/utils/logger';
import type { BotApiClient } from '../bot-api.client';
import { isApiSuccess } from '../types';
import type { UpdateHandler } from '../routes/webhook.route';

export interface PollingLoopOptions {
    limit?: number;
    timeoutSeconds?: number;
    /** Pause after a failed poll */
    retryDelayMs?: number;
    /** Stops the loop once the poll in flight returns */
    signal?: AbortSignal;
}

/**
 * Pull updates until aborted, handing each one to `handler`.
 *
 * Batches are confirmed by the poller, so the loop only needs to move its
 * offset past the last update it saw. A failing handler is logged and the
 * loop moves on.
 */
export async function runPollingLoop(
    bot: BotApiClient,
    handler: UpdateHandler,
    options: PollingLoopOptions = {}
): Promise<void> {
    const { limit = 100, timeoutSeconds = 30, retryDelayMs = 5000, signal } = options;
    let offset = 0;

    logger.info({ event: 'polling.started', limit, timeoutSeconds }, 'Polling for updates');

    while (!signal?.aborted) {
        const result = await bot.getUpdates(offset, limit, timeoutSeconds);

        if (!isApiSuccess(result)) {
            logger.warn({
                event: 'polling.batch.failed',
                offset,
                result: typeof result === 'string' ? result.slice(0, 200) : result,
            }, `getUpdates failed, retrying in ${retryDelayMs}ms`);

            try {
                await sleep(retryDelayMs, undefined, { signal });
            } catch (error) {
                if (signal?.aborted) {
                    break;
                }
                throw error;
            }
            continue;
        }

        for (let index = 0; index < bot.updateCount(); index++) {
            try {
                bot.serveUpdate(index);
                const updateId = bot.context.updateId();
                if (updateId !== undefined) {
                    offset = Math.max(offset, updateId + 1);
                }

                const kind = bot.context.classify();
                logUpdateReceived({ source: 'polling', updateId: updateId ?? -1, kind });

                await handler(bot, kind);
            } catch (error) {
                logError(error instanceof Error ? error : new Error(String(error)), {
                    event: 'polling.update.failed',
                    index,
                });
            }
        }
    }
}
