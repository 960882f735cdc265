/**
 * Environment configuration, read once at the CLI boundary.
 *
 * The engine itself never looks at process.env: everything it needs is
 * passed in through the InjectConfig built here.
 */
import { z } from 'zod';

import { DEFAULT_TEMPLATE_LOCATIONS } from './discovery.js';
import { invalidConfigError } from './errors.js';
import {
  DEFAULT_FIELD,
  DEFAULT_OP_TIMEOUT_MS,
  DEFAULT_VAULT,
} from './secret-source.js';

export interface InjectConfig {
  cacheTtlMs: number;
  cacheEnabled: boolean;
  dryRun: boolean;
  /** Account alias to query first (OP_ACCOUNT_ALIAS). */
  account?: string;
  accountMap: Record<string, string>;
  fallbackAccounts: string[];
  vault: string;
  field: string;
  timeoutMs: number;
  opCommand: string;
  templateLocations: string[];
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const commaList = z.string().transform((s) =>
  s
    .split(',')
    .map((t) => t.trim())
    .filter(Boolean),
);

// "work=example.1password.com,home=my.1password.com"
const accountMap = commaList.transform((entries, ctx) => {
  const map: Record<string, string> = {};
  for (const entry of entries) {
    const eq = entry.indexOf('=');
    if (eq <= 0 || eq === entry.length - 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected alias=account, got "${entry}"`,
      });
      return z.NEVER;
    }
    map[entry.slice(0, eq).trim()] = entry.slice(eq + 1).trim();
  }
  return map;
});

export const EnvSchema = z.object({
  OP_CACHE_TTL: z.coerce.number().int().nonnegative().default(300),
  OP_CACHE_ENABLED: booleanFlag.default('true'),
  TEMPLATE_DRY_RUN: booleanFlag.optional(),
  DRY_RUN: booleanFlag.optional(),
  OP_ACCOUNT_ALIAS: z.string().optional(),
  OP_ACCOUNT_MAP: accountMap.default(''),
  OP_FALLBACK_ACCOUNTS: commaList.default(''),
  OP_VAULT: z.string().default(DEFAULT_VAULT),
  OP_FIELD: z.string().default(DEFAULT_FIELD),
  OP_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_OP_TIMEOUT_MS),
  OP_CLI: z.string().default('op'),
  TEMPLATE_LOCATIONS: commaList.optional(),
});

/**
 * Build the configuration from environment variables.
 * Empty variables count as unset.
 *
 * @throws InjectError (INVALID_CONFIG) on malformed values
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): InjectConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value.trim();
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw invalidConfigError(`Invalid environment configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    cacheTtlMs: e.OP_CACHE_TTL * 1000,
    cacheEnabled: e.OP_CACHE_ENABLED,
    dryRun: (e.TEMPLATE_DRY_RUN ?? false) || (e.DRY_RUN ?? false),
    account: e.OP_ACCOUNT_ALIAS,
    accountMap: e.OP_ACCOUNT_MAP,
    fallbackAccounts: e.OP_FALLBACK_ACCOUNTS,
    vault: e.OP_VAULT,
    field: e.OP_FIELD,
    timeoutMs: e.OP_TIMEOUT_MS,
    opCommand: e.OP_CLI,
    templateLocations: e.TEMPLATE_LOCATIONS ?? DEFAULT_TEMPLATE_LOCATIONS,
  };
}
