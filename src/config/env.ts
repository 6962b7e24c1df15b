import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env from the project root
dotenv.config({ path: resolve(__dirname, '../../.env') });

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

interface Config {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: LogLevel;
  mxCacheEnabled: boolean;
  checkMxByDefault: boolean;
  dnsTimeoutMs: number;
  dnsTries: number;
  dnsServers: string[];
  blocklistPath: string | undefined;
  allowlistPath: string | undefined;
  includePackagedBlocklist: boolean;
  maxBatchSize: number;
  shutdownTimeoutMs: number;
  forceShutdownTimeoutMs: number;
}

function parseLogLevel(value: string | undefined, nodeEnv: string): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value);
  if (match) {
    return match;
  }
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
}

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

const nodeEnv = process.env.NODE_ENV || 'development';

export const config: Config = {
  port: parseInt(process.env.PORT || '3000', 10),
  host: process.env.HOST || '0.0.0.0',
  nodeEnv,
  logLevel: parseLogLevel(process.env.LOG_LEVEL, nodeEnv),
  mxCacheEnabled: process.env.MX_CACHE_ENABLED !== 'false', // enabled by default
  checkMxByDefault: process.env.CHECK_MX_DEFAULT !== 'false',
  dnsTimeoutMs: parseInt(process.env.DNS_TIMEOUT_MS || '5000', 10),
  dnsTries: parseInt(process.env.DNS_TRIES || '2', 10),
  dnsServers: parseList(process.env.DNS_SERVERS),
  blocklistPath: process.env.BLOCKLIST_PATH || undefined,
  allowlistPath: process.env.ALLOWLIST_PATH || undefined,
  includePackagedBlocklist: process.env.INCLUDE_PACKAGED_BLOCKLIST === 'true',
  maxBatchSize: parseInt(process.env.MAX_BATCH_SIZE || '1000', 10),
  shutdownTimeoutMs: parseInt(process.env.SHUTDOWN_TIMEOUT_MS || '10000', 10),
  forceShutdownTimeoutMs: parseInt(process.env.FORCE_SHUTDOWN_TIMEOUT_MS || '20000', 10),
};
