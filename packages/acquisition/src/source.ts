/**
 * Torrent Sources
 * 
 * What can be submitted to the daemon: a magnet/URL string or the raw
 * bytes of a .torrent file.
 */

export const MAGNET_PREFIX = 'magnet:?';

export type TorrentSource =
  | { kind: 'url'; url: string }
  | { kind: 'file'; content: Uint8Array };

export function urlSource(url: string): TorrentSource {
  return { kind: 'url', url };
}

export function fileSource(content: Uint8Array): TorrentSource {
  return { kind: 'file', content };
}

/**
 * Case-sensitive, untrimmed prefix check
 */
export function isMagnetLink(text: string): boolean {
  return text.startsWith(MAGNET_PREFIX);
}

export interface MagnetMetadata {
  infoHash?: string;
  name?: string;
  trackers: string[];
}

/**
 * Parse magnet link parameters
 */
export function parseMagnet(link: string): MagnetMetadata {
  const params = new URLSearchParams(link.slice(MAGNET_PREFIX.length));
  const metadata: MagnetMetadata = { trackers: params.getAll('tr') };

  // Extract info hash
  const hashMatch = params.get('xt')?.match(/^urn:btih:([a-fA-F0-9]{40}|[a-zA-Z2-7]{32})$/);
  if (hashMatch?.[1]) {
    metadata.infoHash = hashMatch[1].toLowerCase();
  }

  // Extract display name
  const name = params.get('dn')?.trim();
  if (name) {
    metadata.name = name;
  }

  return metadata;
}
