/**
 * Type definitions for the notification module.
 */

import type { CouponRecord } from '../coupons/types.js';

// ---------------------------------------------------------------------------
// Notifier interface
// ---------------------------------------------------------------------------

/**
 * Delivers one coupon announcement. Resolves once the channel accepted
 * the message; rejects with a NotificationError otherwise.
 */
export interface Notifier {
  readonly name: string;
  notify(record: CouponRecord): Promise<void>;
}

export interface DeliveryOptions {
  /** Attempts while the channel answers 429, including the first. Default: 3 */
  maxAttempts?: number;
  /** Delay before the first retry. Default: 1000 */
  baseDelayMs?: number;
}

// ---------------------------------------------------------------------------
// Discord payloads
// ---------------------------------------------------------------------------

export interface DiscordEmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface DiscordEmbed {
  title: string;
  url?: string;
  description: string;
  color: number;
  fields: DiscordEmbedField[];
  timestamp: string;
  footer: {
    text: string;
  };
}

export interface DiscordMessage {
  content: string;
  username?: string;
  embeds: DiscordEmbed[];
}
