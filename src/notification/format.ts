import type { CouponRecord } from '../coupons/types.js';
import { BOT_DISPLAY_NAME, NOTIFICATION_COLOR } from '../shared/constants.js';
import { daysUntil, truncate } from '../shared/utils.js';
import type { DiscordEmbed, DiscordEmbedField, DiscordMessage } from './types.js';

// Discord API limits
const TITLE_MAX = 256;
const DESCRIPTION_MAX = 4096;
const FIELD_VALUE_MAX = 1024;

function formatDiscount(value: number): string {
  return `${value}%`;
}

export function formatExpiry(expiry: Date, now: Date): string {
  const daysLeft = daysUntil(expiry, now);
  return daysLeft > 0 ? `In ${daysLeft} days` : 'Today';
}

/**
 * Rich embed announcing a coupon.
 */
export function buildCouponEmbed(record: CouponRecord, now: Date = new Date()): DiscordEmbed {
  const fields: DiscordEmbedField[] = [];

  if (record.discountPercentage !== null) {
    fields.push({ name: 'Discount', value: formatDiscount(record.discountPercentage), inline: true });
  }
  fields.push({ name: 'Code', value: truncate(record.code, FIELD_VALUE_MAX), inline: true });
  fields.push({ name: 'Source', value: record.source, inline: true });
  if (record.expiry !== null) {
    fields.push({ name: 'Expires', value: formatExpiry(record.expiry, now), inline: true });
  }

  return {
    title: truncate(`✅ ${record.name}`, TITLE_MAX),
    url: record.url,
    description: truncate(record.description, DESCRIPTION_MAX),
    color: NOTIFICATION_COLOR,
    fields,
    timestamp: now.toISOString(),
    footer: { text: BOT_DISPLAY_NAME },
  };
}

/**
 * Markdown summary sent as the message content, for clients that do not
 * render embeds.
 */
export function buildCouponContent(record: CouponRecord): string {
  const lines = [`**${record.name}**`];
  if (record.discountPercentage !== null) {
    lines.push(`Discount: ${formatDiscount(record.discountPercentage)}`);
  }
  lines.push(`Code: \`${record.code}\``);
  lines.push(`[Apply here](${record.url})`);
  return lines.join('\n');
}

export function buildCouponMessage(record: CouponRecord, now: Date = new Date()): DiscordMessage {
  return {
    content: buildCouponContent(record),
    embeds: [buildCouponEmbed(record, now)],
  };
}
