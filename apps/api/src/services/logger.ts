import pino from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
  },
  redact: ['apiKey', 'llm.apiKey', 'headers.authorization'],
});

export function createLogger(module: string) {
  return logger.child({ module });
}
