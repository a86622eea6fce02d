import { z } from 'zod';
import { isValidMac, normalizeMac } from '../utils/mac.js';

// Any common notation in, dotted device form out
const macAddressSchema = z.string().trim().refine(
  isValidMac,
  'Invalid MAC address format. Expected 12 hex digits, e.g. AA:BB:CC:DD:EE:FF or AABB.CCDD.EEFF'
).transform(mac => normalizeMac(mac, '.') ?? mac);

export const AuditActionSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal('collect_sessions'),
    params: z.object({
      switchHost: z.string().trim().min(1),
    }),
  }),
  z.object({
    action: z.literal('get_last_snapshot'),
    params: z.object({}).optional(),
  }),
  z.object({
    action: z.literal('list_endpoint_groups'),
    params: z.object({}).optional(),
  }),
  z.object({
    action: z.literal('get_endpoint_group'),
    params: z.object({
      macAddress: macAddressSchema,
    }),
  }),
  z.object({
    // Free text on purpose: an unparseable MAC is reported, not rejected up front
    action: z.literal('search_endpoint'),
    params: z.object({
      macAddress: z.string(),
    }),
  }),
  z.object({
    action: z.literal('update_endpoint_group'),
    params: z.object({
      macAddress: macAddressSchema,
      groupId: z.string().trim().min(1),
    }),
  }),
]);

export type AuditAction = z.infer<typeof AuditActionSchema>;

export const AuditResponseSchema = z.object({
  success: z.boolean(),
  action: z.string(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  details: z.record(z.unknown()).optional(),
  timestamp: z.string(),
});

export type AuditResponse = z.infer<typeof AuditResponseSchema>;
