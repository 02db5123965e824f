import { describe, it, expect, beforeEach } from 'vitest';
import { createApp } from '@/api/app';
import { createRoutes } from '@/api/routes';
import { BotApiClient } from '@/services/bot-api/bot-api.client';
import type { UpdateHandler } from '@/services/bot-api/routes/webhook.route';
import type { RequestDispatcher } from '@/services/bot-api/adapters/http/http.interface';
import type { DispatchResult } from '@/services/bot-api/types';
import type { UpdateKind } from '@/services/bot-api/update/update-kinds';

/**
 * Route tests for the webhook and health endpoints
 */

class MockDispatcher implements RequestDispatcher {
    public methods: string[] = [];
    public nextResult: DispatchResult = {
        kind: 'decoded',
        status: 200,
        body: '',
        data: { ok: true, result: { id: 1, is_bot: true } },
    };

    async send(method: string): Promise<DispatchResult> {
        this.methods.push(method);
        return this.nextResult;
    }

    async download(): Promise<void> {}

    async postJson(): Promise<unknown> {
        return undefined;
    }
}

interface HandledUpdate {
    kind: UpdateKind;
    text: string | undefined;
    chatId: number | undefined;
}

function post(app: ReturnType<typeof createApp>, body: string, headers: Record<string, string> = {}) {
    return app.request('/webhook/telegram', {
        method: 'POST',
        body,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

describe('Webhook routes', () => {
    let dispatcher: MockDispatcher;
    let handled: HandledUpdate[];
    let handler: UpdateHandler;

    function buildApp(webhookSecret?: string) {
        const bot = new BotApiClient({ token: 'test-token', dispatcher });
        const app = createApp();
        app.route('/', createRoutes(bot, handler, { webhookSecret }));
        return app;
    }

    beforeEach(() => {
        dispatcher = new MockDispatcher();
        handled = [];
        handler = async (bot, kind) => {
            handled.push({ kind, text: bot.context.text(), chatId: bot.context.chatId() });
        };
    });

    describe('POST /webhook/telegram', () => {
        it('should hand a classified update to the handler', async () => {
            const app = buildApp();

            const res = await post(app, JSON.stringify({
                update_id: 1,
                message: { message_id: 2, chat: { id: 42, type: 'private' }, text: '/ping' },
            }));

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({ status: 'success' });
            expect(handled).toEqual([{ kind: 'message', text: '/ping', chatId: 42 }]);
        });

        it('should acknowledge a body that is not JSON without handling it', async () => {
            const app = buildApp();

            const res = await post(app, '{broken');

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({ status: 'ignored' });
            expect(handled).toHaveLength(0);
        });

        it('should acknowledge an update without a known kind', async () => {
            const app = buildApp();

            const res = await post(app, JSON.stringify({ update_id: 3, business_message: {} }));

            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({ status: 'ignored' });
            expect(handled).toHaveLength(0);
        });

        it('should reject a request with the wrong secret token', async () => {
            const app = buildApp('test-secret');

            const res = await post(app, JSON.stringify({ update_id: 1, message: {} }), {
                'X-Telegram-Bot-Api-Secret-Token': 'wrong',
            });

            expect(res.status).toBe(401);
            expect(handled).toHaveLength(0);
        });

        it('should accept a request with the right secret token', async () => {
            const app = buildApp('test-secret');

            const res = await post(app, JSON.stringify({ update_id: 1, callback_query: { id: 'cb', data: 'go' } }), {
                'X-Telegram-Bot-Api-Secret-Token': 'test-secret',
            });

            expect(res.status).toBe(200);
            expect(handled).toEqual([{ kind: 'callback_query', text: 'go', chatId: undefined }]);
        });

        it('should answer 500 when the handler fails', async () => {
            handler = () => {
                throw new Error('handler exploded');
            };
            const app = buildApp();

            const res = await post(app, JSON.stringify({ update_id: 1, message: { text: 'x' } }));

            expect(res.status).toBe(500);
            expect(await res.json()).toEqual({ status: 'error', error: 'Internal server error' });
        });
    });

    describe('GET /health', () => {
        it('should report healthy when getMe succeeds', async () => {
            const app = buildApp();

            const res = await app.request('/health');

            expect(res.status).toBe(200);
            expect(await res.json()).toMatchObject({ status: 'healthy', adapters: { botApi: 'connected' } });
            expect(dispatcher.methods).toEqual(['getMe']);
        });

        it('should report degraded when the API cannot be reached', async () => {
            dispatcher.nextResult = {
                kind: 'transport_error',
                body: '',
                data: { ok: false, error_code: 'ECONNREFUSED', error_message: 'refused' },
            };
            const app = buildApp();

            const res = await app.request('/health');

            expect(res.status).toBe(503);
            expect(await res.json()).toMatchObject({ status: 'degraded', adapters: { botApi: 'disconnected' } });
        });

        it('should report an error when the API rejects the token', async () => {
            dispatcher.nextResult = {
                kind: 'decoded',
                status: 401,
                body: '',
                data: { ok: false, error_code: 401, description: 'Unauthorized' },
            };
            const app = buildApp();

            const res = await app.request('/health');

            expect(res.status).toBe(503);
            expect(await res.json()).toMatchObject({ adapters: { botApi: 'error' } });
        });
    });

    it('should answer 404 for unknown routes', async () => {
        const app = buildApp();

        const res = await app.request('/unknown');

        expect(res.status).toBe(404);
    });
});
