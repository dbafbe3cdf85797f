import type { CouponRecord } from '../coupons/types.js';
import { DISCORD_API_BASE } from '../shared/constants.js';
import type { HttpClient } from '../shared/http-client.js';
import { getLogger } from '../shared/logger.js';
import { postJsonWithRetry } from './deliver.js';
import { buildCouponMessage } from './format.js';
import type { DeliveryOptions, Notifier } from './types.js';

const log = getLogger('notification', { channel: 'discord-channel' });

export interface DiscordChannelOptions extends DeliveryOptions {
  /** REST API root. Default: https://discord.com/api/v10 */
  apiBase?: string;
}

/**
 * Posts through the bot REST API into one fixed channel.
 */
export class DiscordChannelNotifier implements Notifier {
  readonly name = 'discord-channel';
  private readonly endpoint: string;

  constructor(
    private readonly token: string,
    channelId: string,
    private readonly http: HttpClient,
    private readonly options: DiscordChannelOptions = {},
  ) {
    const apiBase = (options.apiBase ?? DISCORD_API_BASE).replace(/\/+$/, '');
    this.endpoint = `${apiBase}/channels/${channelId}/messages`;
  }

  async notify(record: CouponRecord): Promise<void> {
    await postJsonWithRetry(
      this.http,
      {
        channel: this.name,
        url: this.endpoint,
        body: buildCouponMessage(record),
        headers: { Authorization: `Bot ${this.token}` },
      },
      this.options,
    );

    log.info({ id: record.id, name: record.name }, 'Coupon announced in channel');
  }
}
