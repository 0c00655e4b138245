/**
 * Telegram Bot Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from '@torrent-relay/core';
import { resolveDaemonUrl, type DaemonUrlOptions } from './gateway.js';

// Load .env from monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../..');
dotenvConfig({ path: resolve(monorepoRoot, '.env') });

const numeric = (fallback: string) =>
  z.string().regex(/^\d+$/, 'must be a whole number').transform(Number).default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  
  // Telegram
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_ALLOWED_USERS: z.string().default(''), // Comma-separated list of user IDs
  TELEGRAM_API_ROOT: z.string().url().default('https://api.telegram.org'),
  
  // qBittorrent
  QBITTORRENT_URL: z.string().optional(), // Discovered from the default gateway when unset
  QBITTORRENT_GATEWAY_PORT: numeric('8080'),
  QBITTORRENT_USERNAME: z.string().min(1),
  QBITTORRENT_PASSWORD: z.string(),
  DAEMON_TIMEOUT_MS: numeric('30000'),
  CHECK_DAEMON_ON_START: z.string().transform(v => v === 'true').default('true'),
  
  // Shutdown
  SHUTDOWN_COMMAND: z.string().min(1).default('/shutdown'),
  SHUTDOWN_POLL_INTERVAL_MS: numeric('1000'),
});

export interface BotConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  botToken: string;
  telegramApiRoot: string;
  /** Raw allow-list; parsed once the logger exists so bad entries can be reported */
  allowedUsers: string;
  daemon: {
    url: string;
    username: string;
    password: string;
    timeoutMs: number;
    checkOnStart: boolean;
  };
  shutdown: {
    command: string;
    pollIntervalMs: number;
  };
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  discovery: Pick<DaemonUrlOptions, 'isContainer' | 'readRouteTable'> = {}
): BotConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    throw new ConfigurationError('Invalid environment configuration', {
      issues: parseResult.error.flatten().fieldErrors,
    });
  }

  const parsed = parseResult.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    
    botToken: parsed.TELEGRAM_BOT_TOKEN,
    telegramApiRoot: parsed.TELEGRAM_API_ROOT.replace(/\/+$/, ''),
    allowedUsers: parsed.TELEGRAM_ALLOWED_USERS,
    
    daemon: {
      url: resolveDaemonUrl({
        explicitUrl: parsed.QBITTORRENT_URL,
        gatewayPort: parsed.QBITTORRENT_GATEWAY_PORT,
        ...discovery,
      }),
      username: parsed.QBITTORRENT_USERNAME,
      password: parsed.QBITTORRENT_PASSWORD,
      timeoutMs: parsed.DAEMON_TIMEOUT_MS,
      checkOnStart: parsed.CHECK_DAEMON_ON_START,
    },
    
    shutdown: {
      command: parsed.SHUTDOWN_COMMAND,
      pollIntervalMs: parsed.SHUTDOWN_POLL_INTERVAL_MS,
    },
  };
}
