import pino from 'pino';

// Logs go to stderr so CLI output on stdout stays pipeable.
const options: pino.LoggerOptions = {
  level: process.env['LOG_LEVEL'] ?? 'info',
  redact: {
    paths: ['password', 'token', 'cookie', '*.password', '*.token', '*.cookie', 'headers.authorization', 'headers.cookie'],
    censor: '***REDACTED***',
  },
};

export const logger =
  process.env['NODE_ENV'] !== 'production'
    ? pino({ ...options, transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } } })
    : pino(options, pino.destination(2));
