import { Request, Response } from 'express';
import {
  ErrorResponse,
  HostMutationResponse,
  HostsResponse,
  ResolutionOutcome,
  WakeFailureCode,
  WakeResponse,
} from '@lanwake/protocol';
import { logger } from '../utils/logger';
import HostRegistry, { HostUpdateFields } from '../services/hostRegistry';
import AddressResolver from '../services/addressResolver';
import StatusPoller from '../services/statusPoller';
import { sendWakePacket, WakeResult } from '../services/wakeSignaler';
import { AddHostInput, UpdateHostInput, WakeHostInput } from '../validators/hostValidator';

// Services will be set by app.ts
let hostRegistry: HostRegistry | null = null;
let addressResolver: AddressResolver | null = null;
let statusPoller: StatusPoller | null = null;

const WAKE_FAILURE_STATUS: Record<WakeFailureCode, number> = {
  MISSING_MAC: 400,
  INVALID_MAC: 400,
  WOL_SEND_FAILED: 502,
};

type MacDecision = {
  mac?: string;
  resolution: ResolutionOutcome;
  detail?: string;
};

function setHostRegistry(registry: HostRegistry | null): void {
  hostRegistry = registry;
}

function setAddressResolver(resolver: AddressResolver | null): void {
  addressResolver = resolver;
}

function setStatusPoller(poller: StatusPoller | null): void {
  statusPoller = poller;
}

function parseHostId(req: Request): number {
  return Number.parseInt(String(req.params.id), 10);
}

function notFound(res: Response, id: number): void {
  const body: ErrorResponse = { error: 'Not Found', message: `Host ${id} not found` };
  res.status(404).json(body);
}

async function resolveMac(ip: string): Promise<MacDecision> {
  if (!ip) {
    return { resolution: 'skipped', detail: 'host has no IP address' };
  }
  if (!addressResolver) {
    return { resolution: 'skipped', detail: 'address resolver not initialized' };
  }

  const outcome = await addressResolver.resolve(ip);
  return outcome.success
    ? { mac: outcome.mac, resolution: 'resolved' }
    : { resolution: 'failed', detail: outcome.reason };
}

function mutationMessage(action: 'added' | 'updated', decision: MacDecision): string {
  switch (decision.resolution) {
    case 'resolved':
      return `Host ${action}, MAC address resolved: ${decision.mac ?? ''}`;
    case 'failed':
    case 'skipped':
      return `Host ${action}, MAC address could not be resolved: ${decision.detail ?? 'unknown reason'}`;
    default:
      return `Host ${action}`;
  }
}

function sendWakeResult(res: Response, result: WakeResult): void {
  if (result.success) {
    const body: WakeResponse = {
      success: true,
      mac: result.mac,
      message: `Packet sent to ${result.mac}`,
    };
    res.status(200).json(body);
    return;
  }

  const body: WakeResponse = {
    success: false,
    mac: result.mac,
    error: result.code,
    message: result.reason,
  };
  res.status(WAKE_FAILURE_STATUS[result.code]).json(body);
}

/**
 * @swagger
 * /hosts:
 *   get:
 *     summary: Get all hosts
 *     description: List every registered host with the status from the latest poll cycle
 *     tags: [Hosts]
 *     responses:
 *       200:
 *         description: Registered hosts with polling state
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/HostsResponse'
 */
const getAllHosts = async (_req: Request, res: Response): Promise<void> => {
  if (!hostRegistry) {
    res.status(500).json({ error: 'Registry not initialized' });
    return;
  }

  const body: HostsResponse = {
    hosts: hostRegistry.list(),
    pollInProgress: statusPoller?.isPollInProgress() ?? false,
    lastPollTime: statusPoller?.getLastPollTime() ?? null,
  };
  res.status(200).json(body);
};

/**
 * @swagger
 * /hosts/{id}:
 *   get:
 *     summary: Get a specific host by id
 *     tags: [Hosts]
 *     parameters:
 *       - $ref: '#/components/parameters/HostId'
 *     responses:
 *       200:
 *         description: Host found
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/Host'
 *       404:
 *         $ref: '#/components/responses/NotFound'
 */
const getHost = async (req: Request, res: Response): Promise<void> => {
  const id = parseHostId(req);

  if (!hostRegistry) {
    res.status(500).json({ error: 'Registry not initialized' });
    return;
  }
  const host = hostRegistry.get(id);
  if (!host) {
    notFound(res, id);
    return;
  }
  res.status(200).json(host);
};

/**
 * @swagger
 * /hosts:
 *   post:
 *     summary: Add a host
 *     description: >
 *       Register a host by IPv4 address. When no MAC address is supplied the
 *       agent primes the ARP cache with a ping and reads the MAC from it; a
 *       failed lookup still adds the host and is reported in `message`.
 *     tags: [Hosts]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/AddHostRequest'
 *     responses:
 *       201:
 *         description: Host added
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/HostMutationResponse'
 *       400:
 *         $ref: '#/components/responses/BadRequest'
 */
const addHost = async (req: Request, res: Response): Promise<void> => {
  const input: AddHostInput = req.body;

  if (!hostRegistry) {
    res.status(500).json({ error: 'Registry not initialized' });
    return;
  }

  const decision: MacDecision = input.mac
    ? { mac: input.mac, resolution: 'provided' }
    : await resolveMac(input.ip);

  const host = await hostRegistry.add({
    ip: input.ip,
    mac: decision.mac ?? '',
    name: input.name,
    user: input.user,
  });

  const body: HostMutationResponse = {
    host,
    message: mutationMessage('added', decision),
    resolution: decision.resolution,
  };
  res.status(201).json(body);
};

/**
 * @swagger
 * /hosts/{id}:
 *   put:
 *     summary: Update host properties
 *     description: >
 *       Update any of ip, mac, name or user. Sending `mac: ""` asks the agent
 *       to resolve the MAC again from the host's IP; the previous MAC is kept
 *       if that lookup fails.
 *     tags: [Hosts]
 *     parameters:
 *       - $ref: '#/components/parameters/HostId'
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/UpdateHostRequest'
 *     responses:
 *       200:
 *         description: Host updated
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/HostMutationResponse'
 *       400:
 *         $ref: '#/components/responses/BadRequest'
 *       404:
 *         $ref: '#/components/responses/NotFound'
 */
const updateHost = async (req: Request, res: Response): Promise<void> => {
  const id = parseHostId(req);
  const updates: UpdateHostInput = req.body;

  if (!hostRegistry) {
    res.status(500).json({ error: 'Registry not initialized' });
    return;
  }

  const existing = hostRegistry.get(id);
  if (!existing) {
    notFound(res, id);
    return;
  }

  let decision: MacDecision;
  if (updates.mac) {
    decision = { mac: updates.mac, resolution: 'provided' };
  } else if (updates.mac === '' || existing.mac === '') {
    decision = await resolveMac(updates.ip ?? existing.ip);
  } else {
    decision = { resolution: 'unchanged' };
  }

  const fields: HostUpdateFields = {
    ...(updates.ip !== undefined && { ip: updates.ip }),
    ...(updates.name !== undefined && { name: updates.name }),
    ...(updates.user !== undefined && { user: updates.user }),
    ...(decision.mac !== undefined && { mac: decision.mac }),
  };

  // The host may have been deleted while its MAC was being resolved.
  const host = await hostRegistry.update(id, fields);
  if (!host) {
    notFound(res, id);
    return;
  }

  const body: HostMutationResponse = {
    host,
    message: mutationMessage('updated', decision),
    resolution: decision.resolution,
  };
  res.status(200).json(body);
};

/**
 * @swagger
 * /hosts/{id}:
 *   delete:
 *     summary: Delete a host
 *     tags: [Hosts]
 *     parameters:
 *       - $ref: '#/components/parameters/HostId'
 *     responses:
 *       200:
 *         description: Host deleted
 *       404:
 *         $ref: '#/components/responses/NotFound'
 */
const deleteHost = async (req: Request, res: Response): Promise<void> => {
  const id = parseHostId(req);

  if (!hostRegistry) {
    res.status(500).json({ error: 'Registry not initialized' });
    return;
  }

  const deleted = await hostRegistry.delete(id);
  if (!deleted) {
    logger.info(`Delete requested for unknown host ${id}`);
    notFound(res, id);
    return;
  }
  res.status(200).json({ message: 'Host deleted', id });
};

/**
 * @swagger
 * /hosts/wake:
 *   post:
 *     summary: Send a Wake-on-LAN packet to a MAC address
 *     description: Works for any MAC address, registered or not.
 *     tags: [Wake-on-LAN]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [mac]
 *             properties:
 *               mac:
 *                 type: string
 *                 example: 'AA:BB:CC:DD:EE:FF'
 *     responses:
 *       200:
 *         description: Magic packet sent
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/WakeResponse'
 *       400:
 *         description: Missing or malformed MAC address
 *       502:
 *         description: The packet could not be sent
 *       429:
 *         $ref: '#/components/responses/TooManyRequests'
 */
const wakeHost = async (req: Request, res: Response): Promise<void> => {
  const { mac }: WakeHostInput = req.body;
  logger.info(`Wake requested for ${mac}`);

  sendWakeResult(res, await sendWakePacket(mac));
};

/**
 * @swagger
 * /hosts/{id}/wake:
 *   post:
 *     summary: Wake a registered host
 *     tags: [Wake-on-LAN]
 *     parameters:
 *       - $ref: '#/components/parameters/HostId'
 *     responses:
 *       200:
 *         description: Magic packet sent
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/WakeResponse'
 *       400:
 *         description: The host has no known MAC address
 *       404:
 *         $ref: '#/components/responses/NotFound'
 *       502:
 *         description: The packet could not be sent
 */
const wakeHostById = async (req: Request, res: Response): Promise<void> => {
  const id = parseHostId(req);

  if (!hostRegistry) {
    res.status(500).json({ error: 'Registry not initialized' });
    return;
  }
  const host = hostRegistry.get(id);
  if (!host) {
    notFound(res, id);
    return;
  }
  if (!host.mac) {
    const body: WakeResponse = {
      success: false,
      mac: '',
      error: 'MISSING_MAC',
      message: `Host ${id} has no known MAC address`,
    };
    res.status(400).json(body);
    return;
  }

  logger.info(`Wake requested for host ${id} (${host.name})`);
  sendWakeResult(res, await sendWakePacket(host.mac));
};

export {
  setHostRegistry,
  setAddressResolver,
  setStatusPoller,
  getAllHosts,
  getHost,
  addHost,
  updateHost,
  deleteHost,
  wakeHost,
  wakeHostById,
};
