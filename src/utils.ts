import { networkInterfaces } from 'node:os';
import { isValidAddress, isValidPort } from './protocol/codec.js';

/**
 * Debug sink injected into the engine. Callers pass nothing to stay quiet.
 */
export interface Logger {
  debug(message: string): void;
}

/**
 * Parse `address:port` as typed by the user.
 *
 * @returns undefined if either half is missing or the port is out of range
 */
export function parseHostPort(value: string): { address: string; port: number } | undefined {
  const separator = value.lastIndexOf(':');
  if (separator <= 0) {
    return undefined;
  }
  const address = value.slice(0, separator).trim();
  const rawPort = value.slice(separator + 1).trim();
  if (!isValidAddress(address) || !/^\d+$/.test(rawPort)) {
    return undefined;
  }
  const port = parseInt(rawPort, 10);
  return isValidPort(port) ? { address, port } : undefined;
}

/**
 * First non-internal IPv4 address of this host, or loopback when there is none.
 */
export function guessLocalAddress(): string {
  for (const addresses of Object.values(networkInterfaces())) {
    for (const info of addresses ?? []) {
      if (info.family === 'IPv4' && !info.internal) {
        return info.address;
      }
    }
  }
  return '127.0.0.1';
}

/**
 * Error text for reporting, whatever was thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
