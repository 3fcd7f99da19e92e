import { z } from 'zod';

// ============================================
// PERSISTED CONFIG
// ============================================

export const StoredConfigSchema = z.object({
  url: z.string().optional(),
  token: z.string().optional(),
});

export type StoredConfig = z.infer<typeof StoredConfigSchema>;

// ============================================
// COMMAND OPTION SCHEMAS
// ============================================

export const DEFAULT_POSITION = 65535;

// z.coerce.number reads '' as 0, so blank input is rejected first
const numericText = (label: string) => z.string().trim().min(1, `${label} must not be blank`);

export const PositionSchema = numericText('position')
  .pipe(
    z.coerce
      .number({ invalid_type_error: 'position must be a number' })
      .finite('position must be a finite number')
  )
  .describe('Sparse float ordering key');

export const LimitSchema = numericText('limit').pipe(
  z.coerce
    .number({ invalid_type_error: 'limit must be a number' })
    .int('limit must be an integer')
    .positive('limit must be positive')
);

export const BoardRoleSchema = z.enum(['editor', 'viewer']);

export type BoardRole = z.infer<typeof BoardRoleSchema>;

export const DueDateSchema = z
  .string()
  .refine((value) => !isNaN(Date.parse(value)), 'due date must be an ISO 8601 date')
  .describe('Due date in ISO format');

export const ServerUrlSchema = z
  .string()
  .trim()
  .url('server URL must be a valid URL')
  .refine((url) => /^https?:\/\//i.test(url), 'server URL must start with http:// or https://');
