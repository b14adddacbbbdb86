import { execFile } from 'child_process';
import { isIPv4 } from 'net';
import os from 'os';
import * as ping from 'ping';
import { isUsableMac } from '@lanwake/protocol';
import { logger } from '../utils/logger';

/**
 * Network primitives: ICMP probes and the system ARP table.
 * Cross-platform support (Windows, Linux, macOS)
 */

export interface ArpDevice {
  name: string;
  ip: string;
  mac: string;
}

/**
 * Raised when a probe could not be carried out at all, as opposed to a host
 * that simply did not answer.
 */
export class ProbeError extends Error {
  constructor(
    public readonly ip: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProbeError';
  }
}

/**
 * Promisify execFile manually to avoid relying on Node's custom promisify symbol.
 *
 * A non-zero exit code is tolerated as long as stdout contains data, e.g.
 * `arp -a` on macOS with incomplete entries.
 */
function execFileAsync(
  cmd: string,
  args: string[],
  opts: { timeout?: number; windowsHide?: boolean }
): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    execFile(cmd, args, { ...opts, encoding: 'utf-8' }, (err, stdout, stderr) => {
      if (err) {
        if (typeof stdout === 'string' && stdout.trim().length > 0) {
          logger.debug(`Command '${cmd}' exited with error but produced output, parsing anyway`, {
            error: err.message,
          });
          resolve({ stdout, stderr: typeof stderr === 'string' ? stderr : '' });
        } else {
          reject(err);
        }
      } else {
        resolve({ stdout, stderr });
      }
    });
  });
}

/**
 * Send a single ICMP echo request.
 * Resolves true when the host answered, false when it timed out or was
 * unreachable. Throws ProbeError for a malformed address or when the ping
 * binary cannot be run.
 */
async function probeHost(ip: string, timeoutMs: number): Promise<boolean> {
  const address = ip.trim();
  if (!isIPv4(address)) {
    throw new ProbeError(ip, `'${ip}' is not a valid IPv4 address`);
  }

  try {
    const result = await ping.promise.probe(address, {
      timeout: Math.max(timeoutMs / 1000, 0.1), // ping takes seconds
      min_reply: 1,
    });
    return result.alive;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ProbeError(ip, `Ping failed for ${address}: ${message}`, { cause: error });
  }
}

/**
 * Read the system ARP table by running `arp -a` and parsing the output.
 */
async function readArpTable(): Promise<ArpDevice[]> {
  const { stdout } = await execFileAsync('arp', ['-a'], {
    timeout: 5_000,
    windowsHide: true,
  });

  return os.platform() === 'win32' ? parseArpWindows(stdout) : parseArpUnix(stdout);
}

/**
 * Parse `arp -a` output on macOS / Linux.
 * Lines look like:  hostname (192.168.1.1) at aa:bb:cc:dd:ee:ff [ether] on eth0
 *              or:  ? (192.168.1.5) at bc:7:1d:dd:5b:9c on en0 ifscope [ethernet]
 *
 * macOS drops leading zeros in octets; `formatMAC` puts them back.
 */
function parseArpUnix(output: string): ArpDevice[] {
  const devices: ArpDevice[] = [];
  for (const line of output.split('\n')) {
    const match = line.match(/^(\S+)\s+\((\d+\.\d+\.\d+\.\d+)\)\s+at\s+([0-9a-f:]+)/i);
    if (match) {
      const [, name, ip, mac] = match;
      if (/^[0-9a-f]{1,2}(:[0-9a-f]{1,2}){5}$/i.test(mac)) {
        devices.push({ name, ip, mac });
      }
    }
  }
  return devices;
}

/**
 * Parse `arp -a` output on Windows.
 * Lines look like:  192.168.1.1           aa-bb-cc-dd-ee-ff     dynamic
 */
function parseArpWindows(output: string): ArpDevice[] {
  const devices: ArpDevice[] = [];
  for (const line of output.split('\n')) {
    const match = line.match(/^\s+(\d+\.\d+\.\d+\.\d+)\s+([0-9a-f-]+)\s+\w+/i);
    if (match) {
      const [, ip, mac] = match;
      if (/^[0-9a-f]{2}(-[0-9a-f]{2}){5}$/i.test(mac)) {
        devices.push({ name: '?', ip, mac: mac.replace(/-/g, ':') });
      }
    }
  }
  return devices;
}

/**
 * Format MAC address to canonical "AA:BB:CC:DD:EE:FF".
 *
 * - "aa-bb-cc-dd-ee-ff"  → "AA:BB:CC:DD:EE:FF"
 * - "aabbccddeeff"       → "AA:BB:CC:DD:EE:FF"
 * - "bc:7:1d:dd:5b:9c"   → "BC:07:1D:DD:5B:9C"
 */
function formatMAC(mac: string): string {
  const trimmed = mac.trim().toUpperCase();

  const parts = trimmed.split(/[:-]/);
  if (parts.length === 6 && parts.every((p) => /^[0-9A-F]{1,2}$/.test(p))) {
    return parts.map((p) => p.padStart(2, '0')).join(':');
  }

  const hexOnly = trimmed.replace(/[^0-9A-F]/g, '');
  if (hexOnly.length === 12) {
    return (hexOnly.match(/.{2}/g) ?? []).join(':');
  }

  return trimmed.replace(/-/g, ':');
}

/**
 * The validity filter applied to every MAC that leaves the ARP table.
 */
function isValidMac(mac: string | null | undefined): mac is string {
  return isUsableMac(mac);
}

/**
 * Get the MAC address bound to `ip` in the system ARP table.
 * Returns null when the table has no entry for it.
 */
async function lookupMacForIp(ip: string): Promise<string | null> {
  const devices = await readArpTable();
  const device = devices.find((d) => d.ip === ip.trim());
  return device ? formatMAC(device.mac) : null;
}

export {
  probeHost,
  readArpTable,
  parseArpUnix,
  parseArpWindows,
  formatMAC,
  isValidMac,
  lookupMacForIp,
};
