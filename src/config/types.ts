import type { z } from 'zod';
import type { configSchema } from './schema.js';

export type AppConfig = z.infer<typeof configSchema>;

export type QuotaConfig = AppConfig['quota'];
export type AlertPolicyConfig = AppConfig['alerts'];
export type SessionConfig = AppConfig['session'];
export type ResponsePolicy = AlertPolicyConfig['responsePolicy'];
export type QuotaResetPolicy = QuotaConfig['resetPolicy'];
