import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export type MeshLogger = Logger;

function resolveLevel(): string {
  const envLevel = process.env.MESHCTL_LOG_LEVEL ?? process.env.LOG_LEVEL;
  if (typeof envLevel === 'string' && envLevel.trim().length > 0) {
    return envLevel.trim();
  }
  return 'warn';
}

// stdout carries the rendered manifest, so every log line goes to stderr.
function createLogger(): MeshLogger {
  const loggerOptions: LoggerOptions = {
    level: resolveLevel(),
    base: { service: 'meshctl' },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
  };
  return pino(loggerOptions, pino.destination({ dest: 2, sync: true }));
}

export const logger: MeshLogger = createLogger();
