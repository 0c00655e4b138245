/**
 * Telegram Bot Entry Point
 * 
 * Relays magnet links and .torrent documents from allowed users to a
 * qBittorrent daemon.
 */

import { run } from '@grammyjs/runner';
import { Bot, GrammyError, HttpError } from 'grammy';
import { QBittorrentClient } from '@torrent-relay/acquisition';
import { ShutdownSignal } from '@torrent-relay/core';
import { createRootLogger, logger as fallbackLogger, type Logger } from '@torrent-relay/utils';
import { AccessGate, parseAllowList } from './access.js';
import { loadConfig, type BotConfig } from './config.js';
import { IngestionDispatcher } from './dispatch.js';
import { createTelegramFileFetcher } from './files.js';
import { registerHandlers } from './handlers/index.js';
import { watchShutdown } from './shutdown.js';

/**
 * Log in once and report the daemon version; failures only warn
 */
async function checkDaemon(config: BotConfig, logger: Logger): Promise<void> {
  const client = new QBittorrentClient(config.daemon.url, {
    timeoutMs: config.daemon.timeoutMs,
    logger,
  });

  try {
    await client.login(config.daemon.username, config.daemon.password);
    const version = await client.queryVersion();
    logger.info({ version }, 'qBittorrent reachable');
  } catch (err) {
    logger.warn({ err }, 'qBittorrent startup check failed, continuing');
  } finally {
    client.close();
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createRootLogger({
    level: config.logLevel,
    env: config.nodeEnv,
    service: 'torrent-relay-bot',
  });

  logger.info('Starting Telegram bot...');

  const allowList = parseAllowList(config.allowedUsers, logger);
  if (allowList.size === 0) {
    logger.warn('Allow-list is empty, every message will be ignored');
  }

  // Fails fast on a malformed daemon URL
  const createSession = () => new QBittorrentClient(config.daemon.url, {
    timeoutMs: config.daemon.timeoutMs,
    logger,
  });
  createSession().close();

  if (config.daemon.checkOnStart) {
    await checkDaemon(config, logger);
  }

  // Create bot instance
  const bot = new Bot(config.botToken, {
    client: { apiRoot: config.telegramApiRoot },
  });

  const shutdown = new ShutdownSignal();
  const dispatcher = new IngestionDispatcher({
    gate: new AccessGate(allowList, config.shutdown.command),
    fetchFile: createTelegramFileFetcher(bot.api, config.botToken, {
      apiRoot: config.telegramApiRoot,
      timeoutMs: config.daemon.timeoutMs,
      logger,
    }),
    createSession,
    credentials: {
      username: config.daemon.username,
      password: config.daemon.password,
    },
    shutdown,
    logger,
  });

  registerHandlers(bot, dispatcher, logger);

  // Error handling
  bot.catch((err) => {
    const ctx = err.ctx;
    logger.error({ err: err.error }, `Error handling update ${ctx.update.update_id}`);
    
    const e = err.error;
    if (e instanceof GrammyError) {
      logger.error({ err: e }, 'Error in request');
    } else if (e instanceof HttpError) {
      logger.error({ err: e }, 'Could not contact Telegram');
    } else {
      logger.error({ err: e }, 'Unknown error');
    }
  });

  // Start bot; the runner handles updates concurrently
  await bot.init();
  const runner = run(bot);

  logger.info({ 
    username: bot.botInfo.username,
    allowedUsers: allowList.size,
    daemon: new URL(config.daemon.url).host,
  }, 'Bot started');

  // Graceful shutdown
  const stopWatching = watchShutdown(shutdown, config.shutdown.pollIntervalMs, () => {
    logger.info('Shutting down bot...');
    runner.stop().catch((err: unknown) => {
      logger.error({ err }, 'Failed to stop bot');
      process.exitCode = 1;
    });
  });

  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  for (const signal of signals) {
    process.once(signal, () => {
      logger.info({ signal }, 'Received signal');
      shutdown.requestShutdown();
    });
  }

  try {
    await runner.task();
  } finally {
    stopWatching();
  }

  logger.info('Bot stopped');
}

main().catch((err: unknown) => {
  fallbackLogger.fatal({ err }, 'Fatal error');
  process.exit(1);
});
