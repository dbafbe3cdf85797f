import type { CouponRecord } from '../coupons/types.js';
import { BOT_DISPLAY_NAME } from '../shared/constants.js';
import type { HttpClient } from '../shared/http-client.js';
import { getLogger } from '../shared/logger.js';
import { postJsonWithRetry } from './deliver.js';
import { buildCouponMessage } from './format.js';
import type { DeliveryOptions, Notifier } from './types.js';

const log = getLogger('notification', { channel: 'discord-webhook' });

export class DiscordWebhookNotifier implements Notifier {
  readonly name = 'discord-webhook';

  constructor(
    private readonly webhookUrl: string,
    private readonly http: HttpClient,
    private readonly options: DeliveryOptions = {},
  ) {}

  async notify(record: CouponRecord): Promise<void> {
    const message = { ...buildCouponMessage(record), username: BOT_DISPLAY_NAME };

    await postJsonWithRetry(
      this.http,
      { channel: this.name, url: this.webhookUrl, body: message },
      this.options,
    );

    log.info({ id: record.id, name: record.name }, 'Coupon announced via webhook');
  }
}
