import { z } from 'zod';
import { ENCODING_HINTS } from './encoding.utils';

const booleanish = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])])
  .transform((value) => (typeof value === 'boolean' ? value : ['true', '1', 'yes', 'on'].includes(value)));

// Params

export const sessionParamsSchema = z.object({
  sessionId: z.string().uuid('sessionId must be a UUID'),
});

export const personParamsSchema = z.object({
  personId: z.string().uuid('personId must be a UUID'),
});

// Roster import (multipart fields arrive as strings)

export const importOptionsSchema = z.object({
  encoding: z.enum(ENCODING_HINTS).default('auto'),
  confirmDuplicates: booleanish.default(false),
});

// Person queues

export const personListQuerySchema = z.object({
  search: z.string().trim().max(200).optional(),
  audited: booleanish.optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

// Verification

export const deviceDescriptorSchema = z.object({
  assetId: z.string().min(1),
  assetTag: z.string(),
  serialNumber: z.string(),
  deviceType: z.string(),
});

export const submitVerificationSchema = z.object({
  fetchedDevices: z.array(deviceDescriptorSchema).max(500),
  confirmedDeviceIds: z.array(z.string().min(1)).max(500).default([]),
  note: z.string().nullish(),
});

// Notes

export const notesQuerySchema = z.object({
  sessionId: z.string().uuid().optional(),
  dateFrom: z.string().min(1).optional(),
  dateTo: z.string().min(1).optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export const notesExportQuerySchema = notesQuerySchema.omit({ page: true, limit: true });

// Maintenance

export const purgeSchema = z.object({
  days: z.number().int().min(1).optional(),
});
