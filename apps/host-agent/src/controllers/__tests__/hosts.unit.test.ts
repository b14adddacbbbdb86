import { Request, Response } from 'express';
import { HostEntry } from '@lanwake/protocol';
import * as hostsController from '../hosts';
import HostRegistry from '../../services/hostRegistry';
import AddressResolver from '../../services/addressResolver';
import { RegistryStorage } from '../../services/registryStorage';
import { isValidMac } from '../../services/networkDiscovery';

jest.mock('../../utils/logger', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

class MemoryStorage implements RegistryStorage {
  constructor(private snapshot: HostEntry[]) {}

  load(): HostEntry[] {
    return this.snapshot.map((entry) => ({ ...entry }));
  }

  save(entries: readonly HostEntry[]): void {
    this.snapshot = entries.map((entry) => ({ ...entry }));
  }
}

function mockResponse(): Response {
  const res: Partial<Response> = {};
  res.status = jest.fn().mockReturnValue(res);
  res.json = jest.fn().mockReturnValue(res);
  return res as Response;
}

describe('hosts controller', () => {
  let registry: HostRegistry;

  beforeEach(async () => {
    registry = new HostRegistry(
      new MemoryStorage([
        { id: 1, ip: '192.168.1.10', mac: '', name: 'Lab PC', user: 'Unknown', status: 'offline' },
      ])
    );
    await registry.initialize();
    hostsController.setHostRegistry(registry);
    hostsController.setAddressResolver(null);
    hostsController.setStatusPoller(null);
  });

  afterEach(() => {
    hostsController.setHostRegistry(null);
  });

  it('should add the host without a MAC when no resolver is configured', async () => {
    const req = { body: { ip: '192.168.1.20' } } as Request;
    const res = mockResponse();

    await hostsController.addHost(req, res);

    expect(res.status).toHaveBeenCalledWith(201);
    expect(res.json).toHaveBeenCalledWith({
      host: expect.objectContaining({ id: 2, mac: '' }),
      message: 'Host added, MAC address could not be resolved: address resolver not initialized',
      resolution: 'skipped',
    });
  });

  it('should report polling defaults when no poller is configured', async () => {
    const res = mockResponse();

    await hostsController.getAllHosts({} as Request, res);

    expect(res.json).toHaveBeenCalledWith({
      hosts: [expect.objectContaining({ id: 1 })],
      pollInProgress: false,
      lastPollTime: null,
    });
  });

  it('should return 404 when the host is deleted while its MAC is resolved', async () => {
    hostsController.setAddressResolver(
      new AddressResolver(
        {
          probeHost: async () => true,
          lookupMacForIp: async () => {
            await registry.delete(1);
            return '80:6D:97:60:39:08';
          },
          isValidMac,
        },
        200
      )
    );
    const req = { params: { id: '1' }, body: { name: 'Renamed' } } as unknown as Request;
    const res = mockResponse();

    await hostsController.updateHost(req, res);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(registry.size()).toBe(0);
  });

  it('should skip resolution for a host without an IP address', async () => {
    await registry.update(1, { ip: '' });
    const req = { params: { id: '1' }, body: { mac: '' } } as unknown as Request;
    const res = mockResponse();

    await hostsController.updateHost(req, res);

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({
        message: 'Host updated, MAC address could not be resolved: host has no IP address',
        resolution: 'skipped',
      })
    );
  });
});
