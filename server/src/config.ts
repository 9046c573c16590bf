import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'node:path';

dotenv.config({ path: process.env.DOTENV_CONFIG_PATH || undefined });

// z.coerce.boolean() turns "false" into true; env flags need an explicit mapping.
const envBoolean = (fallback: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === '') return fallback;
      if (typeof value === 'boolean') return value;
      const v = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(v)) return true;
      if (['0', 'false', 'no', 'off'].includes(v)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got ${JSON.stringify(value)}` });
      return z.NEVER;
    });

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),

  // Admin API
  HOST: z.string().optional().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().optional().default(8080),
  ADMIN_TOKEN: z.string().optional().default(''),
  FRONTEND_ORIGIN: z.string().optional().default('http://localhost:3000'),
  TRUST_PROXY: envBoolean(true),

  // Rules + maintenance flag live here between restarts.
  DATA_DIR: z.string().optional().default('/data'),
  STATE_FILE: z.string().optional().default(''),

  DNS_HOST: z.string().optional().default('0.0.0.0'),
  DNS_PORT: z.coerce.number().int().min(0).max(65535).optional().default(53),
  ENABLE_DNS: envBoolean(true),

  // Where non-blocked queries go: "host:port", "[v6]:port" or an https:// DoH URL. Empty answers SERVFAIL.
  UPSTREAM_DNS: z.string().optional().default(''),
  DNS_FORWARD_TIMEOUT_MS: z.coerce.number().int().min(250).optional().default(2000),

  // Datagrams arriving while this many are still being handled are dropped.
  DNS_MAX_INFLIGHT: z.coerce.number().int().positive().optional().default(256),

  // Sent as a single TXT character-string, which caps it at 255 bytes.
  MAINTENANCE_MESSAGE: z
    .string()
    .optional()
    .default('Service under maintenance')
    .refine((v) => Buffer.byteLength(v, 'utf8') <= 255, 'MAINTENANCE_MESSAGE must be at most 255 bytes'),

  QUERY_LOG_LIMIT: z.coerce.number().int().min(0).optional().default(100)
});

export type AppConfig = z.infer<typeof schema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return schema.parse(env);
}

export function resolveStateFile(config: Pick<AppConfig, 'DATA_DIR' | 'STATE_FILE'>): string {
  const explicit = config.STATE_FILE.trim();
  return explicit ? path.resolve(explicit) : path.join(config.DATA_DIR || '/data', 'state.json');
}
