import { Hono } from 'hono';
import type { BotApiClient } from '@/services/bot-api/bot-api.client';
import { isApiSuccess, isTransportFailure } from '@/services/bot-api/types';
import { createWebhookRoutes, type UpdateHandler } from '@/services/bot-api/routes/webhook.route';
import type { HealthCheckResponse } from '@/shared/types/common.types';
import type { AppEnv } from '@/shared/types/wide-event.types';

export interface RouteOptions {
    /** Webhook secret token; the header is not checked when unset */
    webhookSecret?: string | undefined;
}

/**
 * Create and configure all API routes
 *
 * @param bot - Bot API client
 * @param handler - Called for every classified webhook update
 * @returns Hono app with all routes configured
 */
export function createRoutes(bot: BotApiClient, handler: UpdateHandler, options: RouteOptions = {}) {
    const app = new Hono<AppEnv>();

    // Health check endpoint
    app.get('/health', async (c) => {
        const result = await bot.getMe();
        const healthy = isApiSuccess(result);

        const response: HealthCheckResponse = {
            status: healthy ? 'healthy' : 'degraded',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            adapters: {
                botApi: healthy ? 'connected' : isTransportFailure(result) ? 'disconnected' : 'error',
            },
        };

        return c.json(response, healthy ? 200 : 503);
    });

    // Mount webhook routes
    app.route('/', createWebhookRoutes(bot, handler, { secret: options.webhookSecret }));

    return app;
}
