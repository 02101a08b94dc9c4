// MARK: - Configuration
// Environment-driven settings for the bot host and the reminder scheduler

import { ConfigError, errorMessage } from './utils/errors';
import { DEFAULT_REMINDER_OFFSETS, parseReminderOffsetList } from './services/reminders/offsets';

export interface BotConfig {
  token: string;
  clientId: string;
  guildId: string;
  mongoUri: string;
  port: number;
  portExplicit: boolean;
}

export interface ReminderConfig {
  pollIntervalMinutes: number;
  defaultOffsets: number[];
  shutdownTimeoutMs: number;
}

const DEFAULT_PORT = 3000;
const DEFAULT_POLL_INTERVAL_MINUTES = 1;
const MAX_POLL_INTERVAL_MINUTES = 59;
const DEFAULT_SHUTDOWN_TIMEOUT_MS = 10_000;

export function loadBotConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const required = {
    DISCORD_TOKEN: env.DISCORD_TOKEN,
    DISCORD_CLIENT_ID: env.DISCORD_CLIENT_ID,
    DISCORD_GUILD_ID: env.DISCORD_GUILD_ID,
    MONGODB_URI: env.MONGODB_URI,
  };

  const missing = Object.entries(required)
    .filter(([, value]) => !value)
    .map(([key]) => key);

  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  return {
    token: required.DISCORD_TOKEN ?? '',
    clientId: required.DISCORD_CLIENT_ID ?? '',
    guildId: required.DISCORD_GUILD_ID ?? '',
    mongoUri: required.MONGODB_URI ?? '',
    port: parseInteger('PORT', env.PORT, DEFAULT_PORT, 0, 65_535),
    portExplicit: Boolean(env.PORT),
  };
}

export function loadReminderConfig(env: NodeJS.ProcessEnv = process.env): ReminderConfig {
  let defaultOffsets = [...DEFAULT_REMINDER_OFFSETS];

  if (env.DEFAULT_REMINDER_OFFSETS !== undefined) {
    try {
      defaultOffsets = parseReminderOffsetList(env.DEFAULT_REMINDER_OFFSETS);
    } catch (error) {
      throw new ConfigError(`DEFAULT_REMINDER_OFFSETS is invalid: ${errorMessage(error)}`);
    }
  }

  return {
    pollIntervalMinutes: parseInteger(
      'REMINDER_POLL_INTERVAL_MINUTES',
      env.REMINDER_POLL_INTERVAL_MINUTES,
      DEFAULT_POLL_INTERVAL_MINUTES,
      1,
      MAX_POLL_INTERVAL_MINUTES,
    ),
    defaultOffsets,
    shutdownTimeoutMs: parseInteger(
      'REMINDER_SHUTDOWN_TIMEOUT_MS',
      env.REMINDER_SHUTDOWN_TIMEOUT_MS,
      DEFAULT_SHUTDOWN_TIMEOUT_MS,
      0,
      Number.MAX_SAFE_INTEGER,
    ),
  };
}

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max} (received "${raw}")`);
  }

  return value;
}
