// ---------------------------------------------------------------------------
// Coupon sources
// ---------------------------------------------------------------------------

export const COUPON_SOURCES = {
  CURSOR: 'Cursor AI',
  GITHUB: 'GitHub',
  REPLIT: 'Replit',
  WARP: 'Warp',
  TABNINE: 'Tabnine',
  GENERIC: 'Generic',
} as const;

export type CouponSource = (typeof COUPON_SOURCES)[keyof typeof COUPON_SOURCES];

/** Closed set of source labels, in collector registration order. */
export const COUPON_SOURCE_LABELS = [
  COUPON_SOURCES.CURSOR,
  COUPON_SOURCES.GITHUB,
  COUPON_SOURCES.REPLIT,
  COUPON_SOURCES.WARP,
  COUPON_SOURCES.TABNINE,
  COUPON_SOURCES.GENERIC,
] as const;

export function isCouponSource(value: string): value is CouponSource {
  return COUPON_SOURCE_LABELS.some((label) => label === value);
}

// ---------------------------------------------------------------------------
// Default operational limits
// ---------------------------------------------------------------------------

export const DEFAULT_LIMITS = {
  REQUEST_TIMEOUT_MS: 30_000,
  NOTIFY_MAX_ATTEMPTS: 3,
  CLEANUP_INTERVAL_MS: 86_400_000, // 24 hours
  SCRAPE_INTERVAL_MINUTES: 60,
  MAX_CONCURRENT_COLLECTORS: 10,
  VALIDATION_TIMEOUT_SECONDS: 30,
} as const;

// ---------------------------------------------------------------------------
// Outbound identity
// ---------------------------------------------------------------------------

export const DEFAULT_USER_AGENT = 'CouponRelay/1.0';
export const BOT_DISPLAY_NAME = 'Coupon Relay';

/** Deal aggregator pages scanned by the generic collector. */
export const DEFAULT_GENERIC_SOURCE_URLS: readonly string[] = [
  'https://aidevtools.com/deals',
  'https://llmdeals.net',
  'https://devsoftwaredeals.com',
];

export const DISCORD_API_BASE = 'https://discord.com/api/v10';

/** Embed accent colour (light blue). */
export const NOTIFICATION_COLOR = 0x00c8ff;

// ---------------------------------------------------------------------------
// File-system paths
// ---------------------------------------------------------------------------

export const PATHS = {
  DATABASE: './data/coupons.db',
} as const;
