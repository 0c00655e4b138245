import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@torrent-relay/core';
import { parseDefaultGateway, resolveDaemonUrl } from './gateway.js';

const ROUTE_TABLE = [
  'Iface\tDestination\tGateway \tFlags\tRefCnt\tUse\tMetric\tMask\t\tMTU\tWindow\tIRTT',
  'eth0\t00000000\t010011AC\t0003\t0\t0\t0\t00000000\t0\t0\t0',
  'eth0\t000011AC\t00000000\t0001\t0\t0\t0\t0000FFFF\t0\t0\t0',
  '',
].join('\n');

describe('parseDefaultGateway', () => {
  it('should decode the little-endian gateway of the default route', () => {
    expect(parseDefaultGateway(ROUTE_TABLE)).toBe('172.17.0.1');
  });

  it('should return null without a default route', () => {
    const table = [
      'Iface\tDestination\tGateway \tFlags',
      'eth0\t000011AC\t00000000\t0001',
    ].join('\n');

    expect(parseDefaultGateway(table)).toBeNull();
  });
});

describe('resolveDaemonUrl', () => {
  it('should prefer an explicit URL', () => {
    expect(resolveDaemonUrl({
      explicitUrl: 'http://qbt.local:8080',
      gatewayPort: 8080,
      isContainer: () => true,
      readRouteTable: () => ROUTE_TABLE,
    })).toBe('http://qbt.local:8080');
  });

  it('should discover the gateway inside a container', () => {
    expect(resolveDaemonUrl({
      gatewayPort: 9090,
      isContainer: () => true,
      readRouteTable: () => ROUTE_TABLE,
    })).toBe('http://172.17.0.1:9090');
  });

  it('should treat an empty URL as unset', () => {
    expect(resolveDaemonUrl({
      explicitUrl: '  ',
      gatewayPort: 8080,
      isContainer: () => true,
      readRouteTable: () => ROUTE_TABLE,
    })).toBe('http://172.17.0.1:8080');
  });

  it('should fail outside a container without a URL', () => {
    expect(() => resolveDaemonUrl({ gatewayPort: 8080, isContainer: () => false }))
      .toThrow(ConfigurationError);
  });

  it('should fail when the routing table cannot be read', () => {
    expect(() => resolveDaemonUrl({
      gatewayPort: 8080,
      isContainer: () => true,
      readRouteTable: () => {
        throw new Error('ENOENT');
      },
    })).toThrow(ConfigurationError);
  });

  it('should fail when there is no default route', () => {
    expect(() => resolveDaemonUrl({
      gatewayPort: 8080,
      isContainer: () => true,
      readRouteTable: () => 'Iface\tDestination\tGateway \tFlags\n',
    })).toThrow('No default gateway found for daemon discovery');
  });
});
