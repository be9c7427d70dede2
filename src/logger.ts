import pino, { type Logger } from 'pino';

// stdout belongs to the CLI
export const logger = pino(
  {
    name: 'tapeshelf',
    level: process.env.LOG_LEVEL ?? 'warn',
  },
  pino.destination(2)
);

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
