import { config } from 'dotenv';

// Load environment variables from .env file
config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some((level) => level === value);
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (value && isLogLevel(value)) return value;
  // Keep test output quiet unless a level is asked for
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed <= 0 ? undefined : parsed;
}

export const karmaConfig = {
  filePath: process.env.KARMA_FILE_PATH || './data/karma.json',
  leaderboard: {
    maxRows: parseOptionalInt(process.env.LEADERBOARD_MAX_ROWS)
  }
};

export const slackConfig = {
  botToken: process.env.SLACK_BOT_TOKEN
};

export const appConfig = {
  port: parseInt(process.env.PORT || '3000', 10),
  env: process.env.NODE_ENV || 'development',
  logLevel: parseLogLevel(process.env.LOG_LEVEL)
};
