import { isIP } from 'net';
import { ConfigError } from '../types/request.js';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8000;

/**
 * Normalize a bind target: nothing → `127.0.0.1:8000`, a bare port → that
 * port on 127.0.0.1, a bare IP → that IP on port 8000. Anything else is
 * taken as `host:port`.
 */
export function normalizeAddress(target?: string): string {
  const value = target?.trim();
  if (!value) return `${DEFAULT_HOST}:${DEFAULT_PORT}`;

  if (/^\d+$/.test(value)) {
    return `${DEFAULT_HOST}:${parsePort(value)}`;
  }

  switch (isIP(value)) {
    case 4:
      return `${value}:${DEFAULT_PORT}`;
    case 6:
      return `[${value}]:${DEFAULT_PORT}`;
    default:
      return value;
  }
}

/**
 * Split a normalized `host:port` (IPv6 hosts in brackets) for `listen()`.
 */
export function splitAddress(address: string): { host: string; port: number } {
  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(address);
  if (bracketed?.[1] && bracketed[2]) {
    return { host: bracketed[1], port: parsePort(bracketed[2]) };
  }

  const separator = address.lastIndexOf(':');
  if (separator <= 0) {
    throw new ConfigError(`Invalid bind address '${address}'`);
  }
  return {
    host: address.slice(0, separator),
    port: parsePort(address.slice(separator + 1)),
  };
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new ConfigError(`Invalid port '${value}'`);
  }
  return port;
}
