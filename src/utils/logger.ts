/**
 * Proxy Logger
 *
 * Level-filtered console logging with `[Tag]` prefixes. Packet payloads are
 * never logged whole; only their length and a short hex preview.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerConfig {
  level: LogLevel;
  previewBytes: number;
  environment: 'development' | 'production';
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type PacketAction = 'forwarded' | 'dropped' | 'held' | 'transposed' | 'flushed' | 'delayed';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Render the first bytes of a packet as hex, e.g. `7e93 03… (12 bytes)`.
 */
export function previewPacket(packet: Uint8Array, maxBytes = 8): string {
  const head = Array.from(packet.subarray(0, maxBytes), (b) => b.toString(16).padStart(2, '0')).join('');
  const ellipsis = packet.length > maxBytes ? '…' : '';
  return `${head}${ellipsis} (${packet.length} bytes)`;
}

class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    const nodeEnv = process.env['NODE_ENV'] || 'development';
    const isProduction = nodeEnv === 'production';
    const envLevel = process.env['LOG_LEVEL'];

    this.config = {
      level: isLogLevel(envLevel) ? envLevel : (isProduction ? 'info' : 'debug'),
      previewBytes: isProduction ? 0 : 8,
      environment: isProduction ? 'production' : 'development',
      ...config,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  get level(): LogLevel {
    return this.config.level;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      if (meta) {
        console.debug(`[DEBUG] ${message}`, meta);
      } else {
        console.debug(`[DEBUG] ${message}`);
      }
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      if (meta) {
        console.log(`[INFO] ${message}`, meta);
      } else {
        console.log(`[INFO] ${message}`);
      }
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      if (meta) {
        console.warn(`[WARN] ${message}`, meta);
      } else {
        console.warn(`[WARN] ${message}`);
      }
    }
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      if (error && meta) {
        console.error(`[ERROR] ${message}`, error, meta);
      } else if (error) {
        console.error(`[ERROR] ${message}`, error);
      } else if (meta) {
        console.error(`[ERROR] ${message}`, meta);
      } else {
        console.error(`[ERROR] ${message}`);
      }
    }
  }

  /**
   * Log what a filter did with a packet
   */
  packetAction(filter: string, action: PacketAction, packet: Uint8Array): void {
    if (!this.shouldLog('debug')) return;

    const details = this.config.previewBytes > 0
      ? previewPacket(packet, this.config.previewBytes)
      : `${packet.length} bytes`;
    this.debug(`[${filter}] ${action} ${details}`);
  }

  /**
   * Log a proxied connection event
   */
  connection(event: 'accepted' | 'connected' | 'closed' | 'failed', peer: string): void {
    this.info(`[Proxy] ${event}`, { peer });
  }
}

// Export a singleton instance
export const logger = new Logger();

// Also export the class for testing or custom configurations
export { Logger };
