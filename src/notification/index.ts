import type { Env } from '../env.js';
import { ConfigError } from '../shared/errors.js';
import type { HttpClient } from '../shared/http-client.js';
import { getLogger } from '../shared/logger.js';
import { DiscordChannelNotifier } from './discord-channel.js';
import { DiscordWebhookNotifier } from './discord-webhook.js';
import type { DeliveryOptions, Notifier } from './types.js';

const log = getLogger('notification');

export type NotifierConfig = Pick<Env, 'DISCORD_WEBHOOK_URL' | 'DISCORD_TOKEN' | 'DISCORD_CHANNEL_ID'>;

/**
 * Picks the delivery mechanism. A webhook wins when both are configured.
 * Throws ConfigError when neither mechanism is usable.
 */
export function createNotifier(
  config: NotifierConfig,
  http: HttpClient,
  options: DeliveryOptions = {},
): Notifier {
  if (config.DISCORD_WEBHOOK_URL) {
    log.info('Using Discord webhook for notifications');
    return new DiscordWebhookNotifier(config.DISCORD_WEBHOOK_URL, http, options);
  }

  if (config.DISCORD_TOKEN) {
    if (!config.DISCORD_CHANNEL_ID) {
      throw new ConfigError(
        'DISCORD_CHANNEL_ID is required when DISCORD_TOKEN is set',
        'DISCORD_CHANNEL_ID',
      );
    }
    log.info({ channelId: config.DISCORD_CHANNEL_ID }, 'Using Discord bot token for notifications');
    return new DiscordChannelNotifier(config.DISCORD_TOKEN, config.DISCORD_CHANNEL_ID, http, options);
  }

  throw new ConfigError(
    'No Discord notification method configured: set DISCORD_WEBHOOK_URL or DISCORD_TOKEN with DISCORD_CHANNEL_ID',
    'DISCORD_WEBHOOK_URL',
  );
}

export { DiscordChannelNotifier, DiscordWebhookNotifier };
export { buildCouponContent, buildCouponEmbed, buildCouponMessage } from './format.js';
export type { DeliveryOptions, DiscordEmbed, DiscordMessage, Notifier } from './types.js';
