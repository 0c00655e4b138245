import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@torrent-relay/core';
import { loadConfig } from './config.js';

const BASE_ENV = {
  TELEGRAM_BOT_TOKEN: 'test-token',
  QBITTORRENT_USERNAME: 'admin',
  QBITTORRENT_PASSWORD: 'test-secret',
  QBITTORRENT_URL: 'http://qbt.local:8080',
};

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig(BASE_ENV);

    expect(config).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      botToken: 'test-token',
      telegramApiRoot: 'https://api.telegram.org',
      allowedUsers: '',
      daemon: {
        url: 'http://qbt.local:8080',
        username: 'admin',
        password: 'test-secret',
        timeoutMs: 30000,
        checkOnStart: true,
      },
      shutdown: {
        command: '/shutdown',
        pollIntervalMs: 1000,
      },
    });
  });

  it('should read overrides', () => {
    const config = loadConfig({
      ...BASE_ENV,
      TELEGRAM_ALLOWED_USERS: '42,7',
      TELEGRAM_API_ROOT: 'http://bot-api.local:8081/',
      DAEMON_TIMEOUT_MS: '5000',
      CHECK_DAEMON_ON_START: 'false',
      SHUTDOWN_COMMAND: 'stop now',
      LOG_LEVEL: 'debug',
    });

    expect(config.allowedUsers).toBe('42,7');
    expect(config.telegramApiRoot).toBe('http://bot-api.local:8081');
    expect(config.daemon.timeoutMs).toBe(5000);
    expect(config.daemon.checkOnStart).toBe(false);
    expect(config.shutdown.command).toBe('stop now');
    expect(config.logLevel).toBe('debug');
  });

  it('should fail when required settings are missing', () => {
    expect(() => loadConfig({ QBITTORRENT_URL: 'http://qbt.local:8080' })).toThrow(ConfigurationError);
  });

  it('should fail on a non-numeric timeout', () => {
    expect(() => loadConfig({ ...BASE_ENV, DAEMON_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError);
  });

  it('should discover the daemon when no URL is configured', () => {
    const { QBITTORRENT_URL: _unused, ...env } = BASE_ENV;
    const config = loadConfig({ ...env, QBITTORRENT_GATEWAY_PORT: '8081' }, {
      isContainer: () => true,
      readRouteTable: () => 'Iface\tDestination\tGateway\neth0\t00000000\t0100A8C0\n',
    });

    expect(config.daemon.url).toBe('http://192.168.0.1:8081');
  });

  it('should fail when the daemon cannot be discovered', () => {
    const { QBITTORRENT_URL: _unused, ...env } = BASE_ENV;

    expect(() => loadConfig(env, { isContainer: () => false })).toThrow(ConfigurationError);
  });
});
