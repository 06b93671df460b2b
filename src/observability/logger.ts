import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

export const logger = pino({
  level,
  base: { service: 'tiered-record-store' },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  // Key material and decrypted payloads never reach the log stream
  redact: {
    paths: ['encryptionKey', 'keyMaterial', 'plaintext', '*.encryptionKey', '*.plaintext'],
    censor: '[REDACTED]',
  },
  ...(process.env.NODE_ENV === 'development'
    ? { transport: { target: 'pino/file', options: { destination: 1 } } }
    : {}),
});

/** Child logger scoped to one component */
export function componentLogger(component: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ component, ...extra });
}
