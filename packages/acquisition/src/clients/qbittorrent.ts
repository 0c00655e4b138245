/**
 * qBittorrent Client
 * 
 * Submits torrents to a qBittorrent daemon via its WebUI API.
 * API Docs: https://github.com/qbittorrent/qBittorrent/wiki/WebUI-API-(qBittorrent-4.1)
 * 
 * One instance is one session: log in once, submit, then close.
 * Cookies set by any daemon response are kept per instance and sent on
 * every later request.
 */

import {
  AuthenticationFailedError,
  DaemonRequestError,
  InvalidEndpointError,
  SubmissionRejectedError,
} from '@torrent-relay/core';
import { createLogger, type Logger } from '@torrent-relay/utils';
import type { TorrentSource } from '../source.js';

export const SUCCESS_SENTINEL = 'Ok.';
export const TORRENT_FILE_NAME = 'torrent.torrent';
export const TORRENT_MIME_TYPE = 'application/x-bittorrent';

const LOGIN_ENDPOINT = 'api/v2/auth/login';
const ADD_ENDPOINT = 'api/v2/torrents/add';
const VERSION_ENDPOINT = 'api/v2/app/version';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface QBittorrentClientOptions {
  fetch?: FetchLike;
  /** Per-request timeout; no timeout when omitted */
  timeoutMs?: number;
  logger?: Logger;
}

export class QBittorrentClient {
  private readonly baseUrl: URL;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;
  private readonly cookies = new Map<string, string>();
  private authenticated = false;

  constructor(baseUrl: string, options: QBittorrentClientOptions = {}) {
    this.baseUrl = parseEndpoint(baseUrl);
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs;
    this.logger = createLogger({ component: 'qbittorrent' }, options.logger);
  }

  get isAuthenticated(): boolean {
    return this.authenticated;
  }

  /**
   * Authenticate with qBittorrent
   */
  async login(username: string, password: string): Promise<void> {
    this.authenticated = false;

    const body = new URLSearchParams({ username, password });

    let response: Response;
    try {
      response = await this.send(LOGIN_ENDPOINT, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Referer': this.baseUrl.href,
        },
        body: body.toString(),
      });
    } catch (error) {
      throw new AuthenticationFailedError('daemon unreachable', undefined, error);
    }

    if (!response.ok) {
      throw new AuthenticationFailedError(`status ${response.status}`, response.status);
    }

    this.authenticated = true;

    this.logger.info('qBittorrent authenticated successfully');
  }

  /**
   * Add a torrent from a magnet link or .torrent file contents
   */
  async submit(source: TorrentSource): Promise<void> {
    if (!this.authenticated) {
      throw new AuthenticationFailedError('not logged in');
    }

    const form = new FormData();
    switch (source.kind) {
      case 'url':
        form.append('urls', source.url);
        break;
      case 'file':
        form.append(
          'torrents',
          new Blob([source.content], { type: TORRENT_MIME_TYPE }),
          TORRENT_FILE_NAME
        );
        break;
    }

    let response: Response;
    let text: string;
    try {
      response = await this.send(ADD_ENDPOINT, { method: 'POST', body: form });
      text = await response.text();
    } catch (error) {
      throw new SubmissionRejectedError('daemon unreachable', undefined, undefined, error);
    }

    if (!response.ok) {
      throw new SubmissionRejectedError(`status ${response.status}`, response.status, text);
    }

    if (text !== SUCCESS_SENTINEL) {
      throw new SubmissionRejectedError(`expected "${SUCCESS_SENTINEL}" but got "${text}"`, response.status, text);
    }

    this.logger.info({ kind: source.kind }, 'Torrent added to qBittorrent');
  }

  /**
   * Get qBittorrent version
   */
  async queryVersion(): Promise<string> {
    let response: Response;
    try {
      response = await this.send(VERSION_ENDPOINT, { method: 'GET' });
    } catch (error) {
      throw new DaemonRequestError(VERSION_ENDPOINT, undefined, error);
    }

    if (!response.ok) {
      throw new DaemonRequestError(VERSION_ENDPOINT, response.status);
    }

    return response.text();
  }

  /**
   * Forget the session; no request is sent
   */
  close(): void {
    this.cookies.clear();
    this.authenticated = false;
  }

  private async send(endpoint: string, init: RequestInit): Promise<Response> {
    const url = new URL(endpoint, this.baseUrl).href;
    const headers = new Headers(init.headers);

    const cookie = this.cookieHeader();
    if (cookie) {
      headers.set('Cookie', cookie);
    }

    this.logger.debug({ method: init.method, url }, 'qBittorrent request');

    const response = await this.fetchImpl(url, {
      ...init,
      headers,
      signal: this.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.timeoutMs),
    });

    this.storeCookies(response);
    return response;
  }

  private storeCookies(response: Response): void {
    for (const header of response.headers.getSetCookie()) {
      const pair = header.split(';', 1)[0] ?? '';
      const separator = pair.indexOf('=');
      if (separator <= 0) {
        continue;
      }
      this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
    }
  }

  private cookieHeader(): string | null {
    if (this.cookies.size === 0) {
      return null;
    }
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ');
  }
}

/**
 * Parse the configured base address; endpoints are resolved beneath it
 */
function parseEndpoint(baseUrl: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch (error) {
    throw new InvalidEndpointError(baseUrl, error);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidEndpointError(baseUrl);
  }

  if (!parsed.pathname.endsWith('/')) {
    parsed.pathname = `${parsed.pathname}/`;
  }

  return parsed;
}
