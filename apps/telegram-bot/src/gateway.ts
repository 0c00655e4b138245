/**
 * Daemon Endpoint Discovery
 * 
 * When the bot runs in a container next to qBittorrent on the host and no
 * URL is configured, the daemon is assumed to listen on the default
 * gateway.
 */

import { existsSync, readFileSync } from 'node:fs';
import { ConfigurationError } from '@torrent-relay/core';
import { isNonEmptyString } from '@torrent-relay/utils';

export interface DaemonUrlOptions {
  explicitUrl?: string;
  gatewayPort: number;
  isContainer?: () => boolean;
  readRouteTable?: () => string;
}

export function resolveDaemonUrl(options: DaemonUrlOptions): string {
  if (isNonEmptyString(options.explicitUrl)) {
    return options.explicitUrl.trim();
  }

  const isContainer = options.isContainer ?? detectContainer;
  if (!isContainer()) {
    throw new ConfigurationError(
      'QBITTORRENT_URL is not set and the daemon address cannot be discovered outside a container'
    );
  }

  const readRouteTable = options.readRouteTable ?? (() => readFileSync('/proc/net/route', 'utf-8'));

  let table: string;
  try {
    table = readRouteTable();
  } catch (error) {
    throw new ConfigurationError('Failed to read the routing table for gateway discovery', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const gateway = parseDefaultGateway(table);
  if (!gateway) {
    throw new ConfigurationError('No default gateway found for daemon discovery');
  }

  return `http://${gateway}:${options.gatewayPort}`;
}

/**
 * Find the default route in /proc/net/route contents.
 * Addresses there are little-endian hex: 0100A8C0 is 192.168.0.1.
 */
export function parseDefaultGateway(table: string): string | null {
  for (const line of table.split('\n').slice(1)) {
    const [, destination, gateway] = line.trim().split(/\s+/);
    if (destination !== '00000000' || !gateway || !/^[0-9A-Fa-f]{8}$/.test(gateway)) {
      continue;
    }
    if (gateway === '00000000') {
      continue;
    }

    const octets: number[] = [];
    for (let i = 6; i >= 0; i -= 2) {
      octets.push(parseInt(gateway.slice(i, i + 2), 16));
    }
    return octets.join('.');
  }

  return null;
}

function detectContainer(): boolean {
  if (existsSync('/.dockerenv')) {
    return true;
  }

  try {
    return /docker|containerd|kubepods|libpod/.test(readFileSync('/proc/1/cgroup', 'utf-8'));
  } catch {
    // No procfs, so not a Linux container
    return false;
  }
}
