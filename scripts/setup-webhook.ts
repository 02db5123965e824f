import { BotApiClient } from '../src/services/bot-api/bot-api.client';
import { isApiSuccess } from '../src/services/bot-api/types';
import { config } from '../src/shared/config/config';

/**
 * Register the webhook from the environment
 *
 * Prints the current webhook info, sets WEBHOOK_URL (and WEBHOOK_SECRET when
 * given), then prints the new info.
 */

if (!config.bot.webhookUrl) {
    console.error('❌ Error: WEBHOOK_URL not set');
    process.exit(1);
}

const bot = new BotApiClient({
    token: config.bot.token,
    apiBaseUrl: config.bot.apiBaseUrl,
    webhookUrl: config.bot.webhookUrl,
    proxy: config.bot.proxy,
    timeoutMs: config.bot.timeoutMs,
});

console.log('🔧 Configuring webhook...\n');

console.log('📊 Current webhook configuration:');
const current = await bot.getWebhookInfo();
console.log(JSON.stringify(isApiSuccess(current) ? current.result : current, null, 2));
console.log('\n' + '='.repeat(60) + '\n');

console.log('⚙️  Setting webhook...');
const result = await bot.setWebhook({
    secret_token: config.security.webhookSecret,
    allowed_updates: ['message', 'edited_message', 'callback_query', 'inline_query', 'message_reaction'],
});

if (isApiSuccess(result)) {
    console.log('✅ Webhook configured successfully!\n');

    console.log('📋 New webhook configuration:');
    const updated = await bot.getWebhookInfo();
    console.log(JSON.stringify(isApiSuccess(updated) ? updated.result : updated, null, 2));
} else {
    console.error('❌ Failed to set webhook:');
    console.error(JSON.stringify(result, null, 2));
    process.exit(1);
}
