/**
 * Error types raised by the proxy.
 *
 * Malformed packets are never errors: classifiers return null and filters
 * pass such packets through. Errors here are for bad configuration and for
 * transport failures that must reach the caller.
 */

export const ErrorCodes = {
  INVALID_FILTER_OPTIONS: 'INVALID_FILTER_OPTIONS',
  INVALID_CONFIG_FILE: 'INVALID_CONFIG_FILE',
  TRANSPORT_CLOSED: 'TRANSPORT_CLOSED',
  QUEUE_CLOSED: 'QUEUE_CLOSED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all proxy errors.
 */
export class ProxyError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProxyError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid filter options or configuration file. Raised at construction time;
 * values are never clamped into range.
 */
export class ConfigurationError extends ProxyError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INVALID_FILTER_OPTIONS,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = 'ConfigurationError';
  }
}

/**
 * A write was attempted on a socket that can no longer accept data.
 */
export class TransportError extends ProxyError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCodes.TRANSPORT_CLOSED, context);
    this.name = 'TransportError';
  }
}

/**
 * Check if an error is a proxy error.
 */
export function isProxyError(error: unknown): error is ProxyError {
  return error instanceof ProxyError;
}
