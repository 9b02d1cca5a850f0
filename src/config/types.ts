/**
 * TypeScript types inferred from Zod schemas.
 */

import { z } from 'zod';
import {
  ConfigSchema,
  SettingsSchema,
  QuotaSchema,
  AuthSchema,
  CredentialSchema,
  TelegramSchema,
} from './schema.js';

/** Fully validated client configuration. */
export type Config = z.infer<typeof ConfigSchema>;

export type Settings = z.infer<typeof SettingsSchema>;

export type QuotaConfig = z.infer<typeof QuotaSchema>;

export type AuthConfig = z.infer<typeof AuthSchema>;

/** One nation's credentials. */
export type CredentialConfig = z.infer<typeof CredentialSchema>;

export type TelegramConfig = z.infer<typeof TelegramSchema>;

export {
  ConfigSchema,
  SettingsSchema,
  QuotaSchema,
  AuthSchema,
  CredentialSchema,
  TelegramSchema,
} from './schema.js';
