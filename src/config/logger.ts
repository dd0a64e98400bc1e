import pino from 'pino';

// Create logger instance with configuration
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  },
  // Redact credentials and tokens
  redact: {
    paths: ['accessToken', 'refreshToken', 'clientSecret', 'token', 'headers.Authorization'],
    remove: true,
  },
});

export default logger;
