import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

export const ConfigSchema = z.object({
  device: z.object({
    username: z.string().default('admin'),
    password: z.string().default(''),
    secret: z.string().default(''),
    port: z.number().int().min(1).max(65535).default(22),
    connectTimeoutMs: z.number().int().positive().default(15000),
    commandTimeoutMs: z.number().int().positive().default(30000),
  }),
  ise: z.object({
    username: z.string().default('admin'),
    password: z.string().default(''),
    baseUrl: z.string().default('https://localhost:9060/ers/config/'),
    verifyTls: z.boolean().default(false),
    timeoutMs: z.number().int().positive().default(30000),
  }),
  vendorLookup: z.object({
    baseUrl: z.string().url().default('https://api.macvendors.com'),
    timeoutMs: z.number().int().positive().default(5000),
    minIntervalMs: z.number().int().nonnegative().default(1000),
  }),
  snapshot: z.object({
    path: z.string().min(1).default('static/result.json'),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function parseIntEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return parseInt(value, 10);
}

export function loadConfigFromEnv(env: Env = process.env): Config {
  const result = ConfigSchema.safeParse({
    device: {
      username: env['SWITCH_USERNAME'] ?? 'admin',
      password: env['SWITCH_PASSWORD'] ?? '',
      secret: env['SWITCH_SECRET'] ?? '',
      port: parseIntEnv(env['SWITCH_SSH_PORT'], 22),
      connectTimeoutMs: parseIntEnv(env['SWITCH_CONNECT_TIMEOUT_MS'], 15000),
      commandTimeoutMs: parseIntEnv(env['SWITCH_COMMAND_TIMEOUT_MS'], 30000),
    },
    ise: {
      username: env['ISE_USERNAME'] ?? 'admin',
      password: env['ISE_PASSWORD'] ?? '',
      baseUrl: env['ISE_BASE_URL'] ?? 'https://localhost:9060/ers/config/',
      verifyTls: env['ISE_VERIFY_TLS'] === 'true',
    },
    vendorLookup: {
      baseUrl: env['MAC_VENDOR_URL'] ?? 'https://api.macvendors.com',
    },
    snapshot: {
      path: env['SNAPSHOT_PATH'] ?? 'static/result.json',
    },
    logging: {
      level: env['LOG_LEVEL'] ?? 'info',
    },
  });

  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`, {
      cause: result.error,
    });
  }
  return result.data;
}

const REQUIRED_DEVICE = ['username', 'password', 'secret'] as const;
const REQUIRED_ISE = ['username', 'password', 'baseUrl'] as const;

export function validateDeviceCredentials(config: Config): void {
  for (const key of REQUIRED_DEVICE) {
    if (!config.device[key]) {
      throw new ConfigurationError(`Missing required switch credential: ${key}`, { context: { key } });
    }
  }
}

export function validateIseCredentials(config: Config): void {
  for (const key of REQUIRED_ISE) {
    if (!config.ise[key]) {
      throw new ConfigurationError(`Missing required ISE credential: ${key}`, { context: { key } });
    }
  }
}

export function validateCredentials(config: Config): void {
  validateDeviceCredentials(config);
  validateIseCredentials(config);
}
