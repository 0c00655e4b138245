/**
 * @torrent-relay/acquisition
 * 
 * Torrent acquisition layer.
 * 
 * Responsibilities:
 * - Model torrent sources (magnet links and .torrent files)
 * - Authenticate against and submit to a qBittorrent daemon
 */

// Sources
export {
  MAGNET_PREFIX,
  isMagnetLink,
  parseMagnet,
  urlSource,
  fileSource,
  type TorrentSource,
  type MagnetMetadata,
} from './source.js';

// qBittorrent
export { 
  QBittorrentClient, 
  SUCCESS_SENTINEL,
  TORRENT_FILE_NAME,
  TORRENT_MIME_TYPE,
  type QBittorrentClientOptions,
  type FetchLike,
} from './clients/qbittorrent.js';
