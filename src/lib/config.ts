import { z } from 'zod';
import { isLogLevel, logger, type LogLevel } from './logger';

export interface CredentialOverrides {
  username?: string;
  password?: string;
  enableSecret?: string;
}

export interface SshSettings {
  port: number;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
}

export interface ToolConfig {
  logLevel: LogLevel;
  credentials: CredentialOverrides;
  ssh: SshSettings;
}

export const DEFAULT_CONFIG: ToolConfig = {
  logLevel: 'info',
  credentials: {},
  ssh: {
    port: 22,
    connectTimeoutMs: 15000,
    commandTimeoutMs: 30000,
  },
};

const positiveInt = z.coerce.number().int().positive();

const optionalText = z
  .string()
  .optional()
  .transform(value => (value === '' ? undefined : value));

const credentialEnvSchema = z.object({
  NETWORK_USERNAME: optionalText,
  NETWORK_PASSWORD: optionalText,
  NETWORK_ENABLE_PASSWORD: optionalText,
});

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = positiveInt.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Config', `Ignoring ${key}=${raw}: expected a positive integer, using ${fallback}`);
    return fallback;
  }
  return parsed.data;
}

function readLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env.LOG_LEVEL;
  if (raw === undefined || raw === '') return DEFAULT_CONFIG.logLevel;
  if (isLogLevel(raw)) return raw;
  logger.warn('Config', `Ignoring LOG_LEVEL=${raw}, using ${DEFAULT_CONFIG.logLevel}`);
  return DEFAULT_CONFIG.logLevel;
}

/**
 * Builds the tool configuration from the environment. Credential overrides
 * are collected here once and handed to the deployer explicitly.
 */
export function loadToolConfig(env: NodeJS.ProcessEnv = process.env): ToolConfig {
  const credentials = credentialEnvSchema.parse(env);
  return {
    ...DEFAULT_CONFIG,
    logLevel: readLogLevel(env),
    credentials: {
      username: credentials.NETWORK_USERNAME,
      password: credentials.NETWORK_PASSWORD,
      enableSecret: credentials.NETWORK_ENABLE_PASSWORD,
    },
    ssh: {
      port: readNumber(env, 'NETCFG_SSH_PORT', DEFAULT_CONFIG.ssh.port),
      connectTimeoutMs: readNumber(env, 'NETCFG_CONNECT_TIMEOUT_MS', DEFAULT_CONFIG.ssh.connectTimeoutMs),
      commandTimeoutMs: readNumber(env, 'NETCFG_COMMAND_TIMEOUT_MS', DEFAULT_CONFIG.ssh.commandTimeoutMs),
    },
  };
}
