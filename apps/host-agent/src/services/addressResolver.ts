import { config } from '../config';
import { logger } from '../utils/logger';
import * as networkDiscovery from './networkDiscovery';

type ResolverDiscoveryDeps = Pick<typeof networkDiscovery, 'probeHost' | 'lookupMacForIp' | 'isValidMac'>;

export type ResolutionResult =
  | { success: true; mac: string }
  | { success: false; reason: string };

/**
 * Best-effort MAC discovery for a single IPv4 address.
 *
 * A host that has never been contacted has no neighbour table entry, so every
 * lookup is preceded by a short priming probe whose outcome is ignored.
 */
class AddressResolver {
  constructor(
    private readonly discovery: ResolverDiscoveryDeps = networkDiscovery,
    private readonly primeTimeoutMs: number = config.network.resolvePrimeTimeout
  ) {}

  async resolve(ip: string): Promise<ResolutionResult> {
    try {
      await this.prime(ip);

      const mac = await this.discovery.lookupMacForIp(ip);
      if (mac === null) {
        logger.info(`No ARP entry found for ${ip}`);
        return { success: false, reason: `no ARP entry for ${ip}` };
      }

      if (!this.discovery.isValidMac(mac)) {
        logger.warn(`Discarding unusable MAC ${mac} for ${ip}`);
        return { success: false, reason: `ARP entry for ${ip} is not a usable MAC (${mac})` };
      }

      logger.info(`Resolved ${ip} to ${mac}`);
      return { success: true, mac };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.warn(`MAC resolution failed for ${ip}: ${message}`);
      return { success: false, reason: message };
    }
  }

  private async prime(ip: string): Promise<void> {
    try {
      await this.discovery.probeHost(ip, this.primeTimeoutMs);
    } catch (error: unknown) {
      logger.debug(`Priming probe for ${ip} failed (non-fatal)`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

export default AddressResolver;
