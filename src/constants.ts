/**
 * Centralized constants for the transfer fault proxy.
 */

// =============================================================================
// HDLC FRAMING
// =============================================================================

export const HDLC = {
  /** Frame delimiter */
  FLAG: 0x7e,

  /** Escape marker; the following byte is XORed with ESCAPE_XOR */
  ESCAPE: 0x7d,

  ESCAPE_XOR: 0x20,

  /** Control byte of an unnumbered information frame */
  UI_FRAME_CONTROL: 0x03,

  /** Frame check sequence length (CRC-32) */
  FCS_SIZE: 4,

  /** Smallest decoded frame: 1-byte address, control byte, FCS */
  MIN_FRAME_SIZE: 1 + 1 + 4,

  /** Longest one-terminated varint address accepted */
  MAX_ADDRESS_BYTES: 10,
} as const;

// =============================================================================
// PROXY NETWORKING
// =============================================================================

export const PROXY = {
  /** Default port the proxy listens on for clients */
  CLIENT_PORT: 3300,

  /** Default port of the upstream transfer server */
  SERVER_PORT: 3301,

  /** Default filter-stack file, relative to the working directory */
  CONFIG_PATH: './proxy.config.json',
} as const;

// =============================================================================
// FILTER DEFAULTS
// =============================================================================

export const FILTER_DEFAULTS = {
  /** DataTransposer flush timeout in seconds */
  TRANSPOSER_TIMEOUT_S: 0.5,
} as const;
