// IMPORTANT: Import tracing FIRST to enable auto-instrumentation
import './shared/utils/tracing';

import { serve } from '@hono/node-server';
import { createApp } from './api/app';
import { createRoutes } from './api/routes';
import { BotApiClient } from './services/bot-api/bot-api.client';
import { defaultUpdateHandler } from './services/bot-api/handlers/default.handler';
import { runPollingLoop } from './services/bot-api/polling/polling-loop';
import { isApiSuccess } from './services/bot-api/types';
import { config, logConfigSummary } from './shared/config/config';
import { logger } from './shared/utils/logger';

/**
 * Application entry point
 */
async function main() {
    try {
        logger.info('Starting botwire...');

        // Log configuration summary
        logConfigSummary();

        const bot = new BotApiClient({
            token: config.bot.token,
            apiBaseUrl: config.bot.apiBaseUrl,
            webhookUrl: config.bot.webhookUrl,
            logErrors: config.logging.logErrors,
            proxy: config.bot.proxy,
            timeoutMs: config.bot.timeoutMs,
        });

        // Validate the token on startup
        const me = await bot.getMe();
        if (isApiSuccess(me)) {
            logger.info({ event: 'bot.validated', bot: me.result }, 'Bot token validated');
        } else {
            logger.warn({ event: 'bot.validation_failed', result: me }, 'Bot token validation failed - check BOT_TOKEN');
        }

        if (config.bot.mode === 'polling') {
            const controller = new AbortController();

            const shutdown = (signal: string) => {
                logger.info(`Received ${signal}, stopping polling...`);
                controller.abort();
            };
            process.on('SIGINT', () => shutdown('SIGINT'));
            process.on('SIGTERM', () => shutdown('SIGTERM'));

            // Updates cannot be pulled while a webhook is registered
            await bot.deleteWebhook();

            await runPollingLoop(bot, defaultUpdateHandler, {
                limit: config.polling.limit,
                timeoutSeconds: config.polling.timeoutSeconds,
                signal: controller.signal,
            });

            logger.info('Polling stopped');
            return;
        }

        // Create and configure app
        const app = createApp();
        const routes = createRoutes(bot, defaultUpdateHandler, {
            webhookSecret: config.security.webhookSecret,
        });

        // Mount routes
        app.route('/', routes);

        // Start server
        const server = serve({
            port: config.server.port,
            fetch: app.fetch,
        });

        logger.info({
            event: 'server.started',
            port: config.server.port,
            env: config.server.env,
            url: `http://localhost:${config.server.port}`,
        }, `Server started on port ${config.server.port}`);

        // Graceful shutdown
        const shutdown = (signal: string) => {
            logger.info(`Received ${signal}, shutting down gracefully...`);
            server.close(() => process.exit(0));
        };
        process.on('SIGINT', () => shutdown('SIGINT'));
        process.on('SIGTERM', () => shutdown('SIGTERM'));
    } catch (error) {
        logger.error({
            event: 'startup.error',
            error,
        }, 'Failed to start');
        process.exit(1);
    }
}

// Start the application
void main();
