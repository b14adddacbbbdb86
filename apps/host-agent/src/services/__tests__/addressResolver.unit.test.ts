import AddressResolver from '../addressResolver';
import { isValidMac } from '../networkDiscovery';

jest.mock('../../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

describe('AddressResolver', () => {
  let calls: string[];
  let probeHost: jest.Mock<Promise<boolean>, [string, number]>;
  let lookupMacForIp: jest.Mock<Promise<string | null>, [string]>;
  let resolver: AddressResolver;

  beforeEach(() => {
    calls = [];
    probeHost = jest.fn<Promise<boolean>, [string, number]>(async (ip) => {
      calls.push(`probe ${ip}`);
      return false;
    });
    lookupMacForIp = jest.fn<Promise<string | null>, [string]>(async (ip) => {
      calls.push(`lookup ${ip}`);
      return '80:6D:97:60:39:08';
    });
    resolver = new AddressResolver({ probeHost, lookupMacForIp, isValidMac }, 200);
  });

  it('should prime the neighbour table before looking up the MAC', async () => {
    const result = await resolver.resolve('192.168.1.147');

    expect(result).toEqual({ success: true, mac: '80:6D:97:60:39:08' });
    expect(calls).toEqual(['probe 192.168.1.147', 'lookup 192.168.1.147']);
    expect(probeHost).toHaveBeenCalledWith('192.168.1.147', 200);
  });

  it('should ignore a failed priming probe', async () => {
    probeHost.mockRejectedValue(new Error('spawn ping ENOENT'));

    await expect(resolver.resolve('192.168.1.147')).resolves.toEqual({
      success: true,
      mac: '80:6D:97:60:39:08',
    });
  });

  it('should fail when the IP has no ARP entry', async () => {
    lookupMacForIp.mockResolvedValue(null);

    await expect(resolver.resolve('192.168.1.200')).resolves.toEqual({
      success: false,
      reason: 'no ARP entry for 192.168.1.200',
    });
  });

  it('should discard an all-zero MAC', async () => {
    lookupMacForIp.mockResolvedValue('00:00:00:00:00:00');

    await expect(resolver.resolve('192.168.1.200')).resolves.toEqual({
      success: false,
      reason: 'ARP entry for 192.168.1.200 is not a usable MAC (00:00:00:00:00:00)',
    });
  });

  it('should discard a truncated MAC', async () => {
    lookupMacForIp.mockResolvedValue('AA:BB:CC');

    const result = await resolver.resolve('192.168.1.200');

    expect(result.success).toBe(false);
  });

  it('should turn lookup errors into a failed result', async () => {
    lookupMacForIp.mockRejectedValue(new Error('spawn arp ENOENT'));

    await expect(resolver.resolve('192.168.1.200')).resolves.toEqual({
      success: false,
      reason: 'spawn arp ENOENT',
    });
  });
});
