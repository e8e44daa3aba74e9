export const APP_VERSION = '0.1.0';

export const FIRMATA = {
  DEFAULT_BAUD_RATE: 57600,
  DATA_BITS: 8,
  STOP_BITS: 1,
  PARITY: 'none',
  /** Ports whose digital reporting is enabled once the handshake completes (pins 0-15) */
  INITIAL_REPORT_PORTS: [0, 1],
  DEFAULT_ANALOG_RESOLUTION: 10,
  /** Analog pins are addressed from this offset in the pin list */
  ANALOG_PIN_OFFSET: 14,
  PINS_PER_PORT: 8,
} as const;

export const BACKOFF = {
  INITIAL_INTERVAL_MS: 500,
  MULTIPLIER: 1.5,
  MAX_INTERVAL_MS: 5000,
  MAX_ELAPSED_MS: 15 * 60 * 1000,
  MAX_ATTEMPTS: Infinity,
} as const;

export const LOG_LEVELS = {
  ERROR: 'error',
  WARN: 'warn',
  INFO: 'info',
  DEBUG: 'debug'
} as const;
