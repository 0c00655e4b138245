/**
 * Telegram File Fetcher
 * 
 * Downloads attachment bytes through the Bot API file endpoint.
 */

import { FileFetchError } from '@torrent-relay/core';
import type { FetchLike } from '@torrent-relay/acquisition';
import { createLogger, type Logger } from '@torrent-relay/utils';

export type FileFetcher = (fileId: string) => Promise<Uint8Array>;

/**
 * The part of the grammy Api used here
 */
export interface TelegramFileApi {
  getFile(fileId: string): Promise<{ file_path?: string }>;
}

export interface TelegramFileFetcherOptions {
  apiRoot?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export function createTelegramFileFetcher(
  api: TelegramFileApi,
  token: string,
  options: TelegramFileFetcherOptions = {}
): FileFetcher {
  const apiRoot = options.apiRoot ?? 'https://api.telegram.org';
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const logger = createLogger({ component: 'telegram-files' }, options.logger);

  return async (fileId) => {
    let filePath: string | undefined;
    try {
      filePath = (await api.getFile(fileId)).file_path;
    } catch (error) {
      throw new FileFetchError(fileId, 'getFile failed', error);
    }

    if (!filePath) {
      throw new FileFetchError(fileId, 'Telegram returned no file path');
    }

    let response: Response;
    let bytes: ArrayBuffer;
    try {
      response = await fetchImpl(`${apiRoot}/file/bot${token}/${filePath}`, {
        signal: options.timeoutMs === undefined ? undefined : AbortSignal.timeout(options.timeoutMs),
      });
      bytes = await response.arrayBuffer();
    } catch (error) {
      throw new FileFetchError(fileId, 'download failed', error);
    }

    if (!response.ok) {
      throw new FileFetchError(fileId, `download failed with status ${response.status}`);
    }

    logger.info({ filePath, size: bytes.byteLength }, 'Downloaded file from Telegram');
    return new Uint8Array(bytes);
  };
}
