/**
 * Ingestion Dispatcher
 * 
 * Runs one inbound message through the access gate and, when allowed,
 * submits its torrent to qBittorrent using a fresh session.
 * 
 * Flow:
 * rejected | ignored                  → no reply
 * shutdown                            → ShutdownSignal.requestShutdown()
 * torrent-file → fetch → login → submit → enqueued
 * magnet              → login → submit → enqueued
 *                 ↘ failed (fetch | submission)
 */

import {
  fileSource,
  parseMagnet,
  urlSource,
  type TorrentSource,
} from '@torrent-relay/acquisition';
import type { ShutdownSignal } from '@torrent-relay/core';
import type { Logger } from '@torrent-relay/utils';
import type { AccessGate, InboundEvent } from './access.js';
import type { FileFetcher } from './files.js';

export type IngestionOutcome =
  | { status: 'rejected' }
  | { status: 'ignored' }
  | { status: 'shutdown-requested' }
  | { status: 'enqueued'; source: TorrentSource['kind']; name?: string }
  | { status: 'failed'; stage: 'fetch' | 'submission'; error: unknown };

/**
 * One authenticated conversation with the daemon
 */
export interface DaemonSession {
  login(username: string, password: string): Promise<void>;
  submit(source: TorrentSource): Promise<void>;
  close(): void;
}

export interface IngestionDispatcherDeps {
  gate: AccessGate;
  fetchFile: FileFetcher;
  createSession: () => DaemonSession;
  credentials: {
    username: string;
    password: string;
  };
  shutdown: ShutdownSignal;
  logger: Logger;
}

export class IngestionDispatcher {
  private readonly logger: Logger;

  constructor(private readonly deps: IngestionDispatcherDeps) {
    this.logger = deps.logger.child({ component: 'dispatcher' });
  }

  /**
   * Never throws; every failure becomes a `failed` outcome
   */
  async handle(event: InboundEvent): Promise<IngestionOutcome> {
    const log = this.logger.child({ senderId: event.senderId });
    const classification = this.deps.gate.classify(event);

    switch (classification.kind) {
      case 'rejected':
        log.warn('Message from user not in allow-list');
        return { status: 'rejected' };

      case 'ignored':
        log.debug('Message is neither a magnet link nor a document');
        return { status: 'ignored' };

      case 'shutdown':
        log.info('Shutdown requested');
        this.deps.shutdown.requestShutdown();
        return { status: 'shutdown-requested' };

      case 'magnet':
        return this.ingest(urlSource(classification.link), parseMagnet(classification.link).name, log);

      case 'torrent-file': {
        let content: Uint8Array;
        try {
          content = await this.deps.fetchFile(classification.fileId);
        } catch (error) {
          log.error({ err: error, fileId: classification.fileId }, 'Failed to fetch torrent file');
          return { status: 'failed', stage: 'fetch', error };
        }
        return this.ingest(fileSource(content), classification.fileName, log);
      }
    }
  }

  private async ingest(
    source: TorrentSource,
    name: string | undefined,
    log: Logger
  ): Promise<IngestionOutcome> {
    const { username, password } = this.deps.credentials;
    let session: DaemonSession | undefined;

    try {
      session = this.deps.createSession();
      await session.login(username, password);
      await session.submit(source);
    } catch (error) {
      log.error({ err: error, source: source.kind }, 'Failed to submit torrent');
      return { status: 'failed', stage: 'submission', error };
    } finally {
      session?.close();
    }

    log.info({ source: source.kind, name }, 'Torrent enqueued');
    return { status: 'enqueued', source: source.kind, name };
  }
}
