import { z } from 'zod';
import { isIPv4 } from 'node:net';
import { isUsableMac, MAC_ADDRESS_PATTERN } from '@lanwake/protocol';

const MAC_FORMAT_MESSAGE = 'MAC address must be in format XX:XX:XX:XX:XX:XX or XX-XX-XX-XX-XX-XX';

const ipv4Schema = z
  .string()
  .trim()
  .refine((value) => isIPv4(value), { message: 'IP address must be a valid IPv4 address' });

/**
 * An empty string means "resolve it for me"; anything else must be a real address.
 */
const optionalMacSchema = z
  .string()
  .trim()
  .refine((value) => value === '' || MAC_ADDRESS_PATTERN.test(value), {
    message: MAC_FORMAT_MESSAGE,
  })
  .refine((value) => value === '' || isUsableMac(value), {
    message: 'MAC address must not be all zeros',
  });

const labelSchema = (field: string) =>
  z.string().trim().max(255, `${field} must not exceed 255 characters`);

/**
 * Schema for validating host creation data
 */
export const addHostSchema = z.object({
  ip: ipv4Schema,
  mac: optionalMacSchema.optional(),
  name: labelSchema('Name').optional(),
  user: labelSchema('User').optional(),
});

export type AddHostInput = z.infer<typeof addHostSchema>;

/**
 * Schema for validating partial host update data
 */
export const updateHostSchema = z
  .object({
    ip: ipv4Schema.optional(),
    mac: optionalMacSchema.optional(),
    name: labelSchema('Name').optional(),
    user: labelSchema('User').optional(),
  })
  .refine(
    (value) =>
      value.ip !== undefined ||
      value.mac !== undefined ||
      value.name !== undefined ||
      value.user !== undefined,
    { message: 'At least one field is required: ip, mac, name, or user' }
  );

export type UpdateHostInput = z.infer<typeof updateHostSchema>;

/**
 * Schema for validating the direct wake request body
 */
export const wakeHostSchema = z.object({
  mac: z
    .string({ required_error: 'No MAC address provided' })
    .trim()
    .min(1, 'No MAC address provided'),
});

export type WakeHostInput = z.infer<typeof wakeHostSchema>;

/**
 * Schema for validating host id path parameter
 */
export const hostIdParamSchema = z.object({
  id: z.string().regex(/^[1-9]\d*$/, 'Host id must be a positive integer'),
});
