import { BaseEnvSchema, validateEnv } from '@lendwise/config';
import { PORTS, SERVICE_URLS } from '@lendwise/shared-kernel';
import { z } from 'zod';

const EnvSchema = BaseEnvSchema.extend({
  PORT: z.coerce.number().int().positive().default(PORTS.ORIGINATION),
  ORIG_CONV_TTL_MIN: z.coerce.number().int().positive().default(30),
  ORIG_MAX_AGENT_CALLS: z.coerce.number().int().positive().default(6),
  ORIG_MIN_CREDIT_SCORE: z.coerce.number().int().min(300).max(900).default(700),
  ORIG_MAX_EMI_SALARY_RATIO: z.coerce.number().gt(0).max(1).default(0.5),
  ORIG_STRETCH_MULTIPLIER: z.coerce.number().gt(1).default(2),
  ORIG_DEFAULT_TENURE_MONTHS: z.coerce.number().int().positive().default(12),
  ORIG_CONTEXT_WINDOW: z.coerce.number().int().positive().default(4),
  ORIG_COLLABORATOR_MODE: z.enum(['local', 'remote']).default('local'),
  ORIG_COLLABORATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  ORIG_CUSTOMERS_FILE: z.string().min(1).optional(),
  LOOKUP_SERVICE_URL: z.string().url().default(SERVICE_URLS.CUSTOMER_LOOKUP),
  EXTRACTION_SERVICE_URL: z.string().url().default(SERVICE_URLS.EXTRACTION),
  DOCUMENT_SERVICE_URL: z.string().url().default(SERVICE_URLS.DOCUMENTS),
});

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = validateEnv(EnvSchema);
