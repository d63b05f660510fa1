import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

/**
 * Creates a child logger scoped to a single agent.
 */
export function createAgentLogger(
  agentId: string,
  extra?: Record<string, unknown>,
) {
  return logger.child({ agentId, ...extra });
}

export type Logger = ReturnType<typeof createAgentLogger>;

export default logger;
