/**
 * Configuration
 *
 * Built once at startup and handed to every component constructor.
 */

import { isPublicAddress, parseIpLiteral } from './netguard.js';

export interface DeliveryConfig {
  /** Per-request timeout for coordinator calls */
  requestTimeoutMs: number;
  /** Attempts before an entry is abandoned */
  maxAttempts: number;
  backoffBaseSeconds: number;
  backoffMaxSeconds: number;
  /** Jitter added on top of the backoff, as a fraction of it */
  jitterRatio: number;
  /** Consecutive failures that open the breaker */
  breakerThreshold: number;
  breakerCooldownSeconds: number;
  /** Entries taken per drain */
  batchSize: number;
}

export interface HiveConfig {
  dbPath: string;
  coordinatorUrl: string;
  networkEnabled: boolean;
  coordinatorToken: string;
  minBondSats: number;
  balanceQueryTimeoutMs: number;
  maxPolls: number;
  maxVotes: number;
  delivery: DeliveryConfig;
}

export const DEFAULT_DELIVERY_CONFIG: DeliveryConfig = {
  requestTimeoutMs: 10_000,
  maxAttempts: 8,
  backoffBaseSeconds: 30,
  backoffMaxSeconds: 3600,
  jitterRatio: 0.1,
  breakerThreshold: 5,
  breakerCooldownSeconds: 300,
  batchSize: 50,
};

export const DEFAULT_CONFIG: HiveConfig = {
  dbPath: './data/hive-governance.db',
  coordinatorUrl: '',
  networkEnabled: false,
  coordinatorToken: '',
  minBondSats: 50_000,
  balanceQueryTimeoutMs: 10_000,
  maxPolls: 5_000,
  maxVotes: 50_000,
  delivery: DEFAULT_DELIVERY_CONFIG,
};

/**
 * Build an immutable configuration. An invalid coordinator URL turns
 * network sync off rather than failing startup.
 */
export function createConfig(overrides: Partial<Omit<HiveConfig, 'delivery'>> & {
  delivery?: Partial<DeliveryConfig>;
} = {}): Readonly<HiveConfig> {
  const { delivery, ...rest } = overrides;
  const config: HiveConfig = {
    ...DEFAULT_CONFIG,
    ...rest,
    delivery: { ...DEFAULT_DELIVERY_CONFIG, ...delivery },
  };

  config.coordinatorUrl = config.coordinatorUrl.trim().replace(/\/+$/, '');
  config.minBondSats = Math.max(1, Math.floor(config.minBondSats));
  config.maxPolls = nonNegativeInteger(config.maxPolls, DEFAULT_CONFIG.maxPolls);
  config.maxVotes = nonNegativeInteger(config.maxVotes, DEFAULT_CONFIG.maxVotes);

  if (config.networkEnabled && !isValidCoordinatorUrl(config.coordinatorUrl)) {
    console.warn('[Config] Invalid coordinator URL; network sync disabled');
    config.networkEnabled = false;
    config.coordinatorUrl = '';
  }

  return Object.freeze({ ...config, delivery: Object.freeze(config.delivery) });
}

/**
 * Read configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<HiveConfig> {
  return createConfig({
    dbPath: env.HIVE_DB_PATH ?? DEFAULT_CONFIG.dbPath,
    coordinatorUrl: env.HIVE_COORDINATOR_URL ?? '',
    networkEnabled: parseBool(env.HIVE_NETWORK_ENABLED),
    coordinatorToken: env.HIVE_COORDINATOR_TOKEN ?? '',
    minBondSats: parseInteger(env.HIVE_MIN_BOND_SATS, DEFAULT_CONFIG.minBondSats),
    maxPolls: parseInteger(env.HIVE_MAX_POLLS, DEFAULT_CONFIG.maxPolls),
    maxVotes: parseInteger(env.HIVE_MAX_VOTES, DEFAULT_CONFIG.maxVotes),
    delivery: {
      maxAttempts: parseInteger(env.HIVE_OUTBOX_MAX_ATTEMPTS, DEFAULT_DELIVERY_CONFIG.maxAttempts),
      backoffBaseSeconds: parseInteger(env.HIVE_OUTBOX_BACKOFF_BASE, DEFAULT_DELIVERY_CONFIG.backoffBaseSeconds),
      backoffMaxSeconds: parseInteger(env.HIVE_OUTBOX_BACKOFF_MAX, DEFAULT_DELIVERY_CONFIG.backoffMaxSeconds),
      breakerThreshold: parseInteger(env.HIVE_BREAKER_THRESHOLD, DEFAULT_DELIVERY_CONFIG.breakerThreshold),
      breakerCooldownSeconds: parseInteger(env.HIVE_BREAKER_COOLDOWN, DEFAULT_DELIVERY_CONFIG.breakerCooldownSeconds),
    },
  });
}

/**
 * https only. Loopback names and literal IP hosts that are not public
 * unicast addresses are refused, as delivery would refuse them anyway.
 */
export function isValidCoordinatorUrl(url: string): boolean {
  if (!url) return false;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  if (parsed.protocol !== 'https:' || !parsed.hostname) {
    return false;
  }
  const hostname = parsed.hostname.toLowerCase();
  if (hostname === 'localhost' || hostname.endsWith('.localhost')) {
    return false;
  }

  const literal = parseIpLiteral(parsed.hostname);
  if (literal !== null && !isPublicAddress(literal)) {
    return false;
  }

  return true;
}

export function parseBool(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function nonNegativeInteger(value: number, fallback: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.floor(value)) : fallback;
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}
