const intFromEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const floatFromEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseFloat(raw);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const boolFromEnv = (name: string, fallback: boolean): boolean => {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
};

const MINUTE_MS = 60_000;

export default () => ({
  port: intFromEnv('PORT', 3000),
  corsOrigin: process.env.CORS_ORIGIN,
  database: {
    url:
      process.env.DATABASE_URL ??
      'postgresql://localhost:5432/ma2ta_auctions',
    synchronize: boolFromEnv('DATABASE_SYNCHRONIZE', false),
  },
  redis: {
    url: process.env.REDIS_URL ?? 'redis://localhost:6379',
  },
  clerk: {
    secretKey: process.env.CLERK_SECRET_KEY,
    // PEM public key; verifies tokens without a JWKS round trip.
    jwtKey: process.env.CLERK_JWT_KEY,
  },
  auction: {
    // Percent in the environment, fraction everywhere else.
    incrementPercentage:
      floatFromEnv('AUCTION_BID_INCREMENT_PERCENTAGE', 5) / 100,
    allowSelfOutbid: boolFromEnv('AUCTION_ALLOW_SELF_OUTBID', false),
    antiSnipeWindowMs:
      intFromEnv('AUCTION_ANTI_SNIPE_WINDOW_MINUTES', 15) * MINUTE_MS,
    antiSnipeExtensionMs:
      intFromEnv('AUCTION_AUTO_EXTEND_MINUTES', 15) * MINUTE_MS,
    closingSoonMs: intFromEnv('AUCTION_CLOSING_SOON_MINUTES', 60) * MINUTE_MS,
    sweepIntervalMs: intFromEnv('AUCTION_SWEEP_INTERVAL_SECONDS', 600) * 1000,
    lockTimeoutMs: intFromEnv('AUCTION_LOCK_TIMEOUT_MS', 3000),
    maxBidAttempts: intFromEnv('AUCTION_MAX_BID_ATTEMPTS', 3),
    minDurationDays: intFromEnv('AUCTION_MIN_DURATION_DAYS', 3),
    maxDurationDays: intFromEnv('AUCTION_MAX_DURATION_DAYS', 14),
  },
  orders: {
    paymentWindowMs:
      intFromEnv('ORDER_PAYMENT_WINDOW_MINUTES', 30) * MINUTE_MS,
  },
});
