import * as wol from 'wake_on_lan';
import { MAC_ADDRESS_PATTERN, WakeFailureCode } from '@lanwake/protocol';
import { config } from '../config';
import { logger } from '../utils/logger';

export interface WakeOptions {
  address?: string;
  port?: number;
}

export type WakeResult =
  | { success: true; mac: string }
  | { success: false; mac: string; code: WakeFailureCode; reason: string };

/**
 * Broadcast one Wake-on-LAN magic packet for `mac`.
 * Failures are returned, not thrown; nothing here touches the registry.
 */
export async function sendWakePacket(mac: string, options: WakeOptions = {}): Promise<WakeResult> {
  const target = mac.trim();

  if (target.length === 0) {
    return { success: false, mac: target, code: 'MISSING_MAC', reason: 'No MAC address provided' };
  }

  if (!MAC_ADDRESS_PATTERN.test(target)) {
    logger.warn(`Refusing to wake malformed MAC address ${target}`);
    return {
      success: false,
      mac: target,
      code: 'INVALID_MAC',
      reason: `'${target}' is not a valid MAC address`,
    };
  }

  const address = options.address ?? config.wakeOnLan.broadcastAddress;
  const port = options.port ?? config.wakeOnLan.port;

  try {
    await new Promise<void>((resolve, reject) => {
      wol.wake(target, { address, port, num_packets: 1 }, (error: unknown) => {
        if (error) {
          reject(error instanceof Error ? error : new Error(String(error)));
        } else {
          resolve();
        }
      });
    });
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : 'Unknown Wake-on-LAN send error';
    logger.error(`Error sending WoL packet to ${target}`, { error: reason, address, port });
    return { success: false, mac: target, code: 'WOL_SEND_FAILED', reason };
  }

  logger.info(`Sent WoL magic packet to ${target} via ${address}:${port}`);
  return { success: true, mac: target };
}
