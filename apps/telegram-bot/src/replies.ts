/**
 * User-facing reply texts
 * 
 * Failures get one generic notice: daemon addresses, credentials and
 * response bodies stay in the logs.
 */

import type { IngestionOutcome } from './dispatch.js';

export const REPLIES = {
  enqueued: '✅ Torrent added to the queue',
  failed: '⛔ Failed to add torrent, see the logs',
  shutdown: '🛑 Shutting down',
} as const;

export function replyFor(outcome: IngestionOutcome): string | null {
  switch (outcome.status) {
    case 'enqueued':
      return outcome.name
        ? `✅ Torrent "${outcome.name}" added to the queue`
        : REPLIES.enqueued;
    case 'failed':
      return REPLIES.failed;
    case 'shutdown-requested':
      return REPLIES.shutdown;
    case 'ignored':
    case 'rejected':
      return null;
  }
}
