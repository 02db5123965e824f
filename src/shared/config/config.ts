import { validateEnv, type ValidatedEnv } from '../utils/validators';
import type { ProxyConfig } from '../types/common.types';
import { logger } from '../utils/logger';

/**
 * Load and validate environment variables
 */
function loadEnv(): ValidatedEnv {
    try {
        return validateEnv(process.env);
    } catch (error) {
        logger.error({
            event: 'config.env.invalid',
            error: error instanceof Error ? error.message : String(error),
        }, 'Failed to validate environment variables');
        throw new Error('Invalid environment configuration. Check .env file.');
    }
}

/**
 * Collect proxy settings, or undefined when no proxy variable is set
 */
function loadProxy(env: ValidatedEnv): ProxyConfig | undefined {
    const proxy: ProxyConfig = {
        type: env.PROXY_TYPE,
        url: env.PROXY_URL,
        port: env.PROXY_PORT,
        auth: env.PROXY_AUTH,
    };

    return Object.values(proxy).some((value) => value !== undefined) ? proxy : undefined;
}

// Load configuration
const env = loadEnv();

/**
 * Application configuration
 */
export const config = {
    // Server
    server: {
        port: env.PORT,
        env: env.NODE_ENV,
    },

    // Logging
    logging: {
        level: env.LOG_LEVEL,
        logErrors: env.LOG_ERRORS,
    },

    // Bot API
    bot: {
        token: env.BOT_TOKEN,
        apiBaseUrl: env.BOT_API_BASE_URL,
        mode: env.BOT_MODE,
        timeoutMs: env.API_TIMEOUT_MS,
        webhookUrl: env.WEBHOOK_URL,
        proxy: loadProxy(env),
    },

    // Long polling
    polling: {
        timeoutSeconds: env.POLL_TIMEOUT_SECONDS,
        limit: env.POLL_LIMIT,
    },

    // Security
    security: {
        webhookSecret: env.WEBHOOK_SECRET,
    },
} as const;

/**
 * Log configuration summary (without sensitive data)
 */
export function logConfigSummary() {
    logger.info({
        server: {
            port: config.server.port,
            env: config.server.env,
        },
        logging: config.logging,
        bot: {
            apiBaseUrl: config.bot.apiBaseUrl,
            mode: config.bot.mode,
            timeoutMs: config.bot.timeoutMs,
            webhookConfigured: !!config.bot.webhookUrl,
            proxy: config.bot.proxy
                ? { type: config.bot.proxy.type ?? 'http', url: config.bot.proxy.url, port: config.bot.proxy.port }
                : undefined,
        },
        polling: config.polling,
        webhookSecretConfigured: !!config.security.webhookSecret,
    }, 'Configuration loaded');
}
