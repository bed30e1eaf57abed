import { networkInterfaces } from 'os';
import { TapoKlapSession } from './TapoKlapSession';
import type { Credentials } from '../sync/types';

const FALLBACK_SCAN_BASE = '192.168.1';
const DEFAULT_BATCH_SIZE = 32;
const DEFAULT_PROBE_TIMEOUT_MS = 1500;

export type DeviceProbe = (ip: string, credentials: Credentials, timeoutMs: number) => Promise<boolean>;

export interface DiscoveryOptions {
  scanBase?: string;
  start?: number;
  end?: number;
  batchSize?: number;
  probeTimeoutMs?: number;
  probe?: DeviceProbe;
}

/**
 * First three octets of the first external IPv4 interface.
 */
export function defaultScanBase(): string {
  for (const addresses of Object.values(networkInterfaces())) {
    if (!addresses) continue;
    for (const address of addresses) {
      if (address.family === 'IPv4' && !address.internal) {
        return address.address.split('.').slice(0, 3).join('.');
      }
    }
  }
  return FALLBACK_SCAN_BASE;
}

/**
 * A device answers when the KLAP handshake with these credentials succeeds
 * and it returns its device info.
 */
export async function probeDevice(ip: string, credentials: Credentials, timeoutMs: number): Promise<boolean> {
  const session = new TapoKlapSession({ host: ip, credentials, timeoutMs });
  try {
    await session.handshake();
    await session.request('get_device_info');
    return true;
  } catch {
    return false;
  }
}

/**
 * Scan `<base>.<start..end>` in concurrent batches and return the first
 * responsive address in scan order, or null when none answers.
 */
export async function discoverDevice(
  credentials: Credentials,
  options: DiscoveryOptions = {}
): Promise<string | null> {
  const base = options.scanBase ?? defaultScanBase();
  const start = options.start ?? 1;
  const end = options.end ?? 254;
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
  const timeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const probe = options.probe ?? probeDevice;

  console.log(`[Discovery] Scanning ${base}.${start}-${end}`);

  for (let batchStart = start; batchStart <= end; batchStart += batchSize) {
    const ips: string[] = [];
    for (let host = batchStart; host < Math.min(batchStart + batchSize, end + 1); host++) {
      ips.push(`${base}.${host}`);
    }

    const results = await Promise.all(
      ips.map(ip => probe(ip, credentials, timeoutMs).catch(() => false))
    );
    const index = results.findIndex(Boolean);
    if (index !== -1) {
      console.log(`[Discovery] Found device at ${ips[index]}`);
      return ips[index];
    }
  }

  console.log('[Discovery] No device answered');
  return null;
}
