/**
 * Access Control
 * 
 * Telegram user ID allow-list and classification of inbound messages.
 * Messages from users outside the list are dropped without a reply.
 */

import { isMagnetLink } from '@torrent-relay/acquisition';
import type { Logger } from '@torrent-relay/utils';

export type AllowList = ReadonlySet<number>;

/**
 * What the bot needs from one inbound chat message
 */
export interface InboundEvent {
  senderId?: number;
  text?: string;
  document?: {
    fileId: string;
    fileName?: string;
  };
}

export type Classification =
  | { kind: 'rejected' }
  | { kind: 'ignored' }
  | { kind: 'shutdown' }
  | { kind: 'magnet'; link: string }
  | { kind: 'torrent-file'; fileId: string; fileName?: string };

/**
 * Parse a comma-separated list of user IDs.
 * Malformed entries are skipped with a warning, not treated as fatal.
 */
export function parseAllowList(raw: string, logger: Logger): AllowList {
  const ids = new Set<number>();

  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) {
      continue;
    }

    const id = /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : NaN;
    if (!Number.isSafeInteger(id)) {
      logger.warn({ entry: trimmed }, 'Ignoring malformed user ID in allow-list');
      continue;
    }

    ids.add(id);
  }

  return ids;
}

export class AccessGate {
  constructor(
    private readonly allowList: AllowList,
    private readonly shutdownCommand: string
  ) {}

  isAuthorized(senderId: number | undefined): boolean {
    return senderId !== undefined && this.allowList.has(senderId);
  }

  classify(event: InboundEvent): Classification {
    if (!this.isAuthorized(event.senderId)) {
      return { kind: 'rejected' };
    }

    if (event.text === this.shutdownCommand) {
      return { kind: 'shutdown' };
    }

    if (event.document) {
      return {
        kind: 'torrent-file',
        fileId: event.document.fileId,
        fileName: event.document.fileName,
      };
    }

    if (event.text !== undefined && isMagnetLink(event.text)) {
      return { kind: 'magnet', link: event.text };
    }

    return { kind: 'ignored' };
  }
}
