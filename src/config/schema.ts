/**
 * Zod schemas for YAML config file validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';
import { API_URL } from '../client/url.js';

const statusCode = z.number().int().min(100).max(599);
const headerName = z.string().min(1, { message: 'Header name must not be empty' });

/** Client-level settings. */
export const SettingsSchema = z.object({
  userAgent: z.string().trim().min(1, { message: 'userAgent must identify you (e.g. your main nation)' }),
  apiUrl: z.url({ message: 'apiUrl must be a valid URL' }).default(API_URL),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  fallbackDelayMs: z.number().int().min(0).default(1000),
  requestTimeoutMs: z.number().int().min(1000).default(30000),
  throttleRetries: z.number().int().min(0).default(5),
  serverErrorRetries: z.number().int().min(0).default(5),
  retryStatuses: z.array(statusCode).default([500, 502]),
});

/** Response headers that advertise the quota window. */
export const QuotaSchema = z.object({
  headers: z
    .object({
      remaining: headerName.default('RateLimit-Remaining'),
      reset: headerName.default('RateLimit-Reset'),
      limit: headerName.default('RateLimit-Limit'),
      retryAfter: headerName.default('Retry-After'),
    })
    .prefault({}),
  throttleStatus: statusCode.default(429),
});

/** A nation whose private shards or commands this client may use. */
export const CredentialSchema = z
  .object({
    nation: z.string().min(1, { message: 'Credential nation must not be empty' }),
    password: z.string().min(1).optional(),
    autologin: z.string().min(1).optional(),
    pin: z.string().min(1).optional(),
  })
  .refine((credential) => credential.password !== undefined || credential.autologin !== undefined, {
    message: 'Credential needs a password or an autologin token',
  });

export const AuthSchema = z.object({
  headers: z
    .object({
      autologin: headerName.default('X-Autologin'),
      pin: headerName.default('X-Pin'),
    })
    .prefault({}),
  rejectedStatus: statusCode.default(403),
  credentials: z.array(CredentialSchema).default([]),
});

/** Minimum spacing between telegrams. */
export const TelegramSchema = z.object({
  standardMs: z.number().int().min(0).default(30000),
  recruitmentMs: z.number().int().min(0).default(180000),
});

/** Top-level config schema. */
export const ConfigSchema = z
  .object({
    version: z.literal(1),
    settings: SettingsSchema,
    quota: QuotaSchema.prefault({}),
    auth: AuthSchema.prefault({}),
    telegram: TelegramSchema.prefault({}),
  })
  .refine(
    (config) => {
      const nations = config.auth.credentials.map((c) => c.nation.toLowerCase().replace(/ /g, '_'));
      return new Set(nations).size === nations.length;
    },
    {
      message: 'auth.credentials lists the same nation more than once',
    },
  );
