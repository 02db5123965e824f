import { z } from 'zod';

const booleanFlag = (defaultValue: 'true' | 'false') => z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue)
    .transform((value) => value === 'true' || value === '1');

/**
 * Proxy settings validation schema
 */
export const proxyConfigSchema = z.object({
    type: z.enum(['http', 'https']).optional(),
    url: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    auth: z.string().min(1).optional(),
});

/**
 * Environment variables validation schema
 */
export const envSchema = z.object({
    // Server
    PORT: z.string().default('3000').transform(Number),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

    // Bot API
    BOT_TOKEN: z.string().min(1, 'Bot token is required'),
    BOT_API_BASE_URL: z.string().url().default('https://api.telegram.org'),
    BOT_MODE: z.enum(['webhook', 'polling']).default('webhook'),
    API_TIMEOUT_MS: z.string().default('10000').transform(Number),

    // Webhook (Optional)
    WEBHOOK_URL: z.string().url('Invalid webhook URL').optional(),
    WEBHOOK_SECRET: z
        .string()
        .regex(/^[A-Za-z0-9_-]{1,256}$/, 'Webhook secret may only contain A-Z, a-z, 0-9, _ and -')
        .optional(),

    // Polling
    POLL_TIMEOUT_SECONDS: z.string().default('30').transform(Number),
    POLL_LIMIT: z.string().default('100').transform(Number),

    // Error log sink
    LOG_ERRORS: booleanFlag('true'),

    // Proxy (Optional)
    PROXY_TYPE: z.enum(['http', 'https']).optional(),
    PROXY_URL: z.string().optional(),
    PROXY_PORT: z.string().regex(/^\d+$/, 'Proxy port must be numeric').transform(Number).optional(),
    PROXY_AUTH: z.string().optional(),
});

/**
 * Validate environment variables
 */
export function validateEnv(env: NodeJS.ProcessEnv) {
    // Empty strings in .env files mean "not set"
    const defined = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
    return envSchema.parse(defined);
}

/**
 * Validate proxy settings
 */
export function validateProxyConfig(data: unknown) {
    return proxyConfigSchema.parse(data);
}

/**
 * Type exports for validated data
 */
export type ValidatedEnv = z.infer<typeof envSchema>;
