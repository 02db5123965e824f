import { describe, it, expect, beforeEach } from 'vitest';
import { UpdatePoller } from '@/services/bot-api/polling/update-poller.service';
import { UpdateContext } from '@/services/bot-api/update/update-context.service';
import type { RequestDispatcher, SendOptions } from '@/services/bot-api/adapters/http/http.interface';
import type { DispatchResult, ParameterBag } from '@/services/bot-api/types';
import { InvalidArgumentError, InvalidUpdateError } from '@/services/bot-api/errors';

/**
 * Unit tests for UpdatePoller
 */

interface SentCall {
    method: string;
    params: ParameterBag;
    usePost: boolean | undefined;
    options: SendOptions | undefined;
}

// Mock dispatcher answering calls from a queue
class MockDispatcher implements RequestDispatcher {
    public calls: SentCall[] = [];
    public responses: (DispatchResult | Error)[] = [];

    async send(method: string, params: ParameterBag, usePost?: boolean, options?: SendOptions): Promise<DispatchResult> {
        this.calls.push({ method, params, usePost, options });
        const next = this.responses.shift();
        if (next instanceof Error) {
            throw next;
        }
        return next ?? decoded({ ok: true, result: [] });
    }

    async download(): Promise<void> {}

    async postJson(): Promise<unknown> {
        return undefined;
    }
}

function decoded(data: { ok: true; result: unknown }): DispatchResult {
    return { kind: 'decoded', status: 200, body: JSON.stringify(data), data };
}

function batch(...updateIds: number[]): DispatchResult {
    return decoded({ ok: true, result: updateIds.map((id) => ({ update_id: id, message: { text: `m${id}` } })) });
}

describe('UpdatePoller', () => {
    let dispatcher: MockDispatcher;
    let context: UpdateContext;
    let poller: UpdatePoller;

    beforeEach(() => {
        dispatcher = new MockDispatcher();
        context = new UpdateContext();
        poller = new UpdatePoller(dispatcher, context, { requestTimeoutMs: 5000 });
    });

    describe('poll', () => {
        it('should confirm a batch by requesting the update after the last one', async () => {
            dispatcher.responses = [batch(98, 99, 100)];

            await poller.poll(0, 100, 0);

            expect(dispatcher.calls).toHaveLength(2);
            expect(dispatcher.calls[0]?.params).toEqual({ offset: 0, limit: 100, timeout: 0 });
            expect(dispatcher.calls[1]?.method).toBe('getUpdates');
            expect(dispatcher.calls[1]?.params).toEqual({ offset: 101, limit: 1, timeout: 0 });
        });

        it('should return the first batch unchanged when the confirmation throws', async () => {
            dispatcher.responses = [batch(100), new Error('network down')];

            const result = await poller.poll();

            expect(result).toEqual({ ok: true, result: [{ update_id: 100, message: { text: 'm100' } }] });
            expect(poller.updateCount()).toBe(1);
        });

        it('should return the first batch unchanged when the confirmation fails in transport', async () => {
            dispatcher.responses = [
                batch(7, 8),
                {
                    kind: 'transport_error',
                    body: '',
                    data: { ok: false, error_code: 'ECONNRESET', error_message: 'socket hang up' },
                },
            ];

            const result = await poller.poll();

            expect(result).toEqual({
                ok: true,
                result: [
                    { update_id: 7, message: { text: 'm7' } },
                    { update_id: 8, message: { text: 'm8' } },
                ],
            });
            expect(dispatcher.calls).toHaveLength(2);
            expect(poller.updateCount()).toBe(2);
        });

        it('should not confirm an empty batch', async () => {
            dispatcher.responses = [batch()];

            await poller.poll();

            expect(dispatcher.calls).toHaveLength(1);
        });

        it('should not confirm when asked not to advance', async () => {
            dispatcher.responses = [batch(5)];

            await poller.poll(0, 100, 0, false);

            expect(dispatcher.calls).toHaveLength(1);
        });

        it('should extend the transport timeout by the long-poll duration', async () => {
            await poller.poll(0, 50, 30);

            expect(dispatcher.calls[0]?.options?.timeoutMs).toBe(35000);
        });

        it('should reject a limit outside 1..100 before any request', async () => {
            await expect(poller.poll(0, 0)).rejects.toThrow(InvalidArgumentError);
            await expect(poller.poll(0, 101)).rejects.toThrow('limit must be between 1 and 100, got 101');
            expect(dispatcher.calls).toHaveLength(0);
        });

        it('should treat a failed poll as an empty batch', async () => {
            dispatcher.responses = [{
                kind: 'transport_error',
                body: '{}',
                data: { ok: false, error_code: 'ECONNRESET', error_message: 'reset' },
            }];

            const result = await poller.poll();

            expect(result).toEqual({ ok: false, error_code: 'ECONNRESET', error_message: 'reset' });
            expect(poller.updateCount()).toBe(0);
            expect(dispatcher.calls).toHaveLength(1);
        });
    });

    describe('updates', () => {
        it('should expose the entries of the last batch as received', async () => {
            dispatcher.responses = [decoded({ ok: true, result: [{ update_id: 3, message: { text: 'a' } }, { unexpected: true }] })];

            await poller.poll(0, 100, 0, false);

            expect(poller.updates()).toEqual([{ update_id: 3, message: { text: 'a' } }, { unexpected: true }]);
        });

        it('should be empty after a poll that returned no batch', async () => {
            dispatcher.responses = [batch(1), { kind: 'raw', status: 502, body: 'Bad Gateway' }];

            await poller.poll(0, 100, 0, false);
            await poller.poll(2, 100, 0, false);

            expect(poller.updates()).toEqual([]);
        });
    });

    describe('serveUpdate', () => {
        it('should load a batch entry into the context', async () => {
            dispatcher.responses = [batch(7, 8)];
            await poller.poll();

            poller.serveUpdate(1);

            expect(context.updateId()).toBe(8);
            expect(context.text()).toBe('m8');
        });

        it('should reject an index outside the batch', async () => {
            dispatcher.responses = [batch(7)];
            await poller.poll();

            expect(() => poller.serveUpdate(1)).toThrow(InvalidArgumentError);
            expect(() => poller.serveUpdate(-1)).toThrow(InvalidArgumentError);
        });

        it('should reject an entry that is not an update', async () => {
            dispatcher.responses = [decoded({ ok: true, result: [{ unexpected: true }] })];
            await poller.poll();

            expect(() => poller.serveUpdate(0)).toThrow(InvalidUpdateError);
        });
    });
});
