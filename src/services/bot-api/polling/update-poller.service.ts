import { z } from 'zod';
import { logger, logPollBatch } from '@/shared/utils/logger';
import { addSpanAttributes, withSpan } from '@/shared/utils/tracing-utils';
import { InvalidArgumentError } from '../errors';
import type { RequestDispatcher } from '../adapters/http/http.interface';
import { DEFAULT_TIMEOUT_MS } from '../adapters/http/ky-dispatcher.adapter';
import { toApiResult, type ApiResult } from '../types';
import type { UpdateContext } from '../update/update-context.service';

const MIN_LIMIT = 1;
const MAX_LIMIT = 100;

const batchSchema = z.object({
    ok: z.literal(true),
    result: z.array(z.unknown()),
});

const updateIdSchema = z.object({ update_id: z.number() });

export interface UpdatePollerOptions {
    /** Request timeout added on top of the long-poll duration */
    requestTimeoutMs?: number | undefined;
}

/**
 * Update Poller
 *
 * Pulls updates with getUpdates. After a non-empty batch it confirms the
 * batch by asking for the update after the last one, so the server drops
 * everything received so far.
 */
export class UpdatePoller {
    private batch: unknown[] = [];
    private readonly requestTimeoutMs: number;

    constructor(
        private readonly dispatcher: RequestDispatcher,
        private readonly context: UpdateContext,
        options: UpdatePollerOptions = {}
    ) {
        this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    /**
     * Fetch one batch of updates
     *
     * @param offset - First update_id to return
     * @param limit - Batch size, 1 to 100
     * @param timeoutSeconds - Long-poll duration, 0 for short polling
     * @param advanceOffset - Confirm the batch once received
     * @returns The result of the first call
     * @throws {InvalidArgumentError} If limit is outside 1..100
     */
    async poll(offset = 0, limit = 100, timeoutSeconds = 0, advanceOffset = true): Promise<ApiResult> {
        if (!Number.isInteger(limit) || limit < MIN_LIMIT || limit > MAX_LIMIT) {
            throw new InvalidArgumentError(`limit must be between ${MIN_LIMIT} and ${MAX_LIMIT}, got ${limit}`, 'limit');
        }

        return withSpan('bot_api.poll', async (span) => {
            const dispatched = await this.dispatcher.send(
                'getUpdates',
                { offset, limit, timeout: timeoutSeconds },
                true,
                { timeoutMs: timeoutSeconds * 1000 + this.requestTimeoutMs }
            );
            const result = toApiResult(dispatched);

            const parsed = batchSchema.safeParse(result);
            this.batch = parsed.success ? parsed.data.result : [];

            let confirmedOffset: number | undefined;
            const last = updateIdSchema.safeParse(this.batch[this.batch.length - 1]);
            if (advanceOffset && last.success) {
                confirmedOffset = last.data.update_id + 1;
                await this.confirm(confirmedOffset);
            }

            addSpanAttributes(span, {
                'polling.received': this.batch.length,
                'polling.confirmed_offset': confirmedOffset,
            });
            logPollBatch({ offset, limit, timeoutSeconds, received: this.batch.length, confirmedOffset });

            return result;
        }, { 'polling.offset': offset, 'polling.limit': limit });
    }

    /**
     * Number of updates in the last batch
     */
    updateCount(): number {
        return this.batch.length;
    }

    /**
     * Updates of the last batch, as received
     */
    updates(): readonly unknown[] {
        return this.batch;
    }

    /**
     * Make one update of the last batch the current update
     *
     * @throws {InvalidArgumentError} If index is out of range
     * @throws {InvalidUpdateError} If the entry is not an update
     */
    serveUpdate(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this.batch.length) {
            throw new InvalidArgumentError(
                `update index ${index} out of range (batch has ${this.batch.length})`,
                'index'
            );
        }
        this.context.setUpdate(this.batch[index]);
    }

    private async confirm(offset: number): Promise<void> {
        try {
            await this.dispatcher.send('getUpdates', { offset, limit: 1, timeout: 0 });
        } catch (error) {
            logger.warn({
                event: 'polling.confirm.failed',
                offset,
                error: error instanceof Error ? error.message : 'Unknown error',
            }, 'Failed to confirm update batch');
        }
    }
}
