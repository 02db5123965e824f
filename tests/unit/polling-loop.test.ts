import { describe, it, expect, beforeEach } from 'vitest';
import { BotApiClient } from '@/services/bot-api/bot-api.client';
import { runPollingLoop } from '@/services/bot-api/polling/polling-loop';
import type { RequestDispatcher, SendOptions } from '@/services/bot-api/adapters/http/http.interface';
import type { DispatchResult, ParameterBag } from '@/services/bot-api/types';

/**
 * Unit tests for the polling loop
 */

class MockDispatcher implements RequestDispatcher {
    public calls: { method: string; params: ParameterBag }[] = [];
    public responses: DispatchResult[] = [];

    async send(method: string, params: ParameterBag, _usePost?: boolean, _options?: SendOptions): Promise<DispatchResult> {
        this.calls.push({ method, params });
        return this.responses.shift() ?? batch();
    }

    async download(): Promise<void> {}

    async postJson(): Promise<unknown> {
        return undefined;
    }
}

function batch(...updateIds: number[]): DispatchResult {
    const data = { ok: true as const, result: updateIds.map((id) => ({ update_id: id, message: { text: `m${id}` } })) };
    return { kind: 'decoded', status: 200, body: '', data };
}

describe('runPollingLoop', () => {
    let dispatcher: MockDispatcher;
    let bot: BotApiClient;
    let controller: AbortController;

    beforeEach(() => {
        dispatcher = new MockDispatcher();
        bot = new BotApiClient({ token: 'test-token', dispatcher });
        controller = new AbortController();
    });

    it('should hand every update of a batch to the handler', async () => {
        dispatcher.responses = [batch(1, 2)];
        const texts: (string | undefined)[] = [];

        await runPollingLoop(bot, (client) => {
            texts.push(client.context.text());
            if (texts.length === 2) {
                controller.abort();
            }
        }, { signal: controller.signal, timeoutSeconds: 0 });

        expect(texts).toEqual(['m1', 'm2']);
        expect(dispatcher.calls[0]?.params).toEqual({ offset: 0, limit: 100, timeout: 0 });
        expect(dispatcher.calls[1]?.params).toEqual({ offset: 3, limit: 1, timeout: 0 });
    });

    it('should keep going after a handler fails', async () => {
        dispatcher.responses = [batch(1, 2)];
        const seen: (number | undefined)[] = [];

        await runPollingLoop(bot, (client) => {
            seen.push(client.context.updateId());
            if (seen.length === 1) {
                throw new Error('handler failed');
            }
            controller.abort();
        }, { signal: controller.signal, timeoutSeconds: 0 });

        expect(seen).toEqual([1, 2]);
    });

    it('should continue from the offset after the last update', async () => {
        dispatcher.responses = [batch(10), batch(), batch(11)];
        let handledCount = 0;

        await runPollingLoop(bot, () => {
            handledCount++;
            if (handledCount === 2) {
                controller.abort();
            }
        }, { signal: controller.signal, timeoutSeconds: 0 });

        // calls: poll(0), confirm(11), poll(11), confirm(12)
        expect(dispatcher.calls.map((call) => call.params.offset)).toEqual([0, 11, 11, 12]);
    });

    it('should retry after a failed poll', async () => {
        dispatcher.responses = [
            { kind: 'raw', status: 502, body: 'Bad Gateway' },
            batch(4),
        ];

        await runPollingLoop(bot, () => controller.abort(), {
            signal: controller.signal,
            timeoutSeconds: 0,
            retryDelayMs: 1,
        });

        expect(dispatcher.calls).toHaveLength(3);
        expect(dispatcher.calls[1]?.params.offset).toBe(0);
    });
});
