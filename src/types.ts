/**
 * Core types for the transfer fault proxy
 */

import type { FilterConfig, FilterStackConfig } from './config.js';

export type { FilterConfig, FilterStackConfig };

export interface NetworkConfig {
  /** Interface the proxy listens on */
  host: string;
  /** Port transfer clients connect to */
  clientPort: number;
  serverHost: string;
  /** Port of the real transfer server */
  serverPort: number;
}

export interface ProxyConfig {
  network: NetworkConfig;
  /** Where the filter stacks were read from, if anywhere */
  configPath: string | null;
  filters: FilterStackConfig;
}

/** Direction of travel through the proxy */
export type Direction = 'client' | 'server';
