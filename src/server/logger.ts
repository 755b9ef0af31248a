import pino from 'pino';

export type Logger = pino.Logger;

export function createLogger(level: string): Logger {
  return pino({
    name: 'desktop-mcp-broker',
    level,
    redact: { paths: ['token', 'clientSecret', 'headers.authorization'], censor: '[redacted]' }
  });
}
