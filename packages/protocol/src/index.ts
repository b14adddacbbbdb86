import { z } from 'zod';

// --- Protocol versioning ---

export const PROTOCOL_VERSION = '1.0.0' as const;

// --- Shared types ---

export type HostStatus = 'online' | 'offline' | 'error';

/**
 * A tracked LAN host as stored in the registry file and returned by the API.
 * `mac` is an empty string while the hardware address is unknown.
 */
export interface HostEntry {
  id: number;
  ip: string;
  mac: string;
  name: string;
  user: string;
  status: HostStatus;
}

export type HostIdentityFields = Pick<HostEntry, 'ip' | 'mac' | 'name' | 'user'>;

export const DEFAULT_HOST_NAME = 'New Host';
export const DEFAULT_HOST_USER = 'Unknown';

// --- MAC address validity ---

export const MAC_ADDRESS_LENGTH = 17;
const ZERO_MAC_PATTERN = /^00([:-]00){5}$/;

/**
 * Six hex octets joined by one separator used throughout: `XX:XX:XX:XX:XX:XX`
 * or `XX-XX-XX-XX-XX-XX`.
 */
export const MAC_ADDRESS_PATTERN = /^[0-9A-Fa-f]{2}([:-])(?:[0-9A-Fa-f]{2}\1){4}[0-9A-Fa-f]{2}$/;

/**
 * Known-bad results from a neighbour table lookup: empty, all-zero or shorter
 * than `XX:XX:XX:XX:XX:XX`.
 */
export function isUsableMac(mac: string | null | undefined): mac is string {
  if (!mac) {
    return false;
  }
  const trimmed = mac.trim();
  return trimmed.length >= MAC_ADDRESS_LENGTH && !ZERO_MAC_PATTERN.test(trimmed);
}

// --- Response shapes ---

export interface ErrorResponse {
  error: string;
  message: string;
  code?: string;
}

export interface HostsResponse {
  hosts: HostEntry[];
  pollInProgress: boolean;
  lastPollTime: string | null;
}

export type ResolutionOutcome = 'provided' | 'resolved' | 'failed' | 'skipped' | 'unchanged';

export interface HostMutationResponse {
  host: HostEntry;
  message: string;
  resolution: ResolutionOutcome;
}

export type WakeFailureCode = 'MISSING_MAC' | 'INVALID_MAC' | 'WOL_SEND_FAILED';

export type WakeResponse =
  | { success: true; mac: string; message: string }
  | { success: false; mac: string; error: WakeFailureCode; message: string };

// --- Zod schemas ---

export const hostStatusSchema = z.enum(['online', 'offline', 'error']);

/**
 * Registry files written by older releases may carry `null` addresses or a
 * placeholder MAC; both load as "unknown" rather than failing the whole file.
 */
export const hostEntrySchema = z.object({
  id: z.number().int().positive(),
  ip: z
    .string()
    .nullable()
    .transform((value) => (value ?? '').trim()),
  mac: z
    .string()
    .nullable()
    .transform((value) => (isUsableMac(value) ? value.trim() : '')),
  name: z.string(),
  user: z.string(),
  status: hostStatusSchema.default('offline'),
});

export const registrySnapshotSchema = z
  .array(hostEntrySchema)
  .superRefine((entries, ctx) => {
    const seen = new Set<number>();
    entries.forEach((entry, index) => {
      if (seen.has(entry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `Duplicate host id ${entry.id}`,
        });
      }
      seen.add(entry.id);
    });
  });
