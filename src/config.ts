/**
 * Configuration management for the transfer fault proxy
 *
 * Network settings come from the environment (optionally a `.env` file).
 * Filter stacks come from a JSON file validated with zod.
 */

import { existsSync, readFileSync } from 'fs';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { FILTER_DEFAULTS, PROXY } from './constants.js';
import { ConfigurationError, ErrorCodes } from './errors.js';
import type { ProxyConfig } from './types.js';

export type { ProxyConfig };

loadEnv();

// =============================================================================
// FILTER STACK SCHEMA
// =============================================================================

const rate = z.number().min(0).max(1);
const seed = z.number().int().optional();
const onlyConsiderTransferChunks = z.boolean().default(false);

export const FilterConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('hdlc_packetizer'),
  }).strict(),
  z.object({
    type: z.literal('data_dropper'),
    rate,
    seed,
  }).strict(),
  z.object({
    type: z.literal('rate_limiter'),
    rate: z.number().positive(),
  }).strict(),
  z.object({
    type: z.literal('data_transposer'),
    rate,
    timeout: z.number().positive().default(FILTER_DEFAULTS.TRANSPOSER_TIMEOUT_S),
    seed,
  }).strict(),
  z.object({
    type: z.literal('server_failure'),
    packetsBeforeFailure: z.array(z.number().int().positive()),
    startImmediately: z.boolean().default(false),
    onlyConsiderTransferChunks,
  }).strict(),
  z.object({
    type: z.literal('keep_drop_queue'),
    pattern: z.array(z.number().int()).min(1),
    onlyConsiderTransferChunks,
  }).strict(),
  z.object({
    type: z.literal('window_packet_dropper'),
    windowPacketToDrop: z.number().int().nonnegative(),
  }).strict(),
]);

export const FilterStackConfigSchema = z.object({
  clientFilterStack: z.array(FilterConfigSchema).default([]),
  serverFilterStack: z.array(FilterConfigSchema).default([]),
}).strict();

export type FilterConfig = z.infer<typeof FilterConfigSchema>;
export type FilterStackConfig = z.infer<typeof FilterStackConfigSchema>;

/**
 * Validate an already-parsed filter stack document
 */
export function parseFilterStackConfig(raw: unknown, source = 'filter config'): FilterStackConfig {
  const result = FilterStackConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid ${source}: ${issues.join('; ')}`, ErrorCodes.INVALID_CONFIG_FILE, {
      source,
      issues,
    });
  }
  return result.data;
}

/**
 * Read and validate a JSON filter stack file
 */
export function loadFilterStackConfig(path: string): FilterStackConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read filter config ${path}: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCodes.INVALID_CONFIG_FILE,
      { path }
    );
  }
  return parseFilterStackConfig(raw, path);
}

// =============================================================================
// ENVIRONMENT
// =============================================================================

function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function envPort(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') return defaultValue;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new ConfigurationError(`${key} must be a port number, got "${value}"`, ErrorCodes.INVALID_CONFIG_FILE, {
      key,
      value,
    });
  }
  return parsed;
}

export function loadConfig(): ProxyConfig {
  const explicitPath = process.env['PROXY_CONFIG_PATH'];
  const configPath = explicitPath || PROXY.CONFIG_PATH;

  let filters: FilterStackConfig = { clientFilterStack: [], serverFilterStack: [] };
  let loadedFrom: string | null = null;
  if (explicitPath || existsSync(configPath)) {
    filters = loadFilterStackConfig(configPath);
    loadedFrom = configPath;
  }

  return {
    network: {
      host: envString('PROXY_HOST', 'localhost'),
      clientPort: envPort('PROXY_CLIENT_PORT', PROXY.CLIENT_PORT),
      serverHost: envString('PROXY_SERVER_HOST', 'localhost'),
      serverPort: envPort('PROXY_SERVER_PORT', PROXY.SERVER_PORT),
    },
    configPath: loadedFrom,
    filters,
  };
}
