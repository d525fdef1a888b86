import { pino, type Logger as PinoLogger } from 'pino';

type LogMethod = (objOrMsg: object | string, msg?: string) => void;

export interface Logger {
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  debug: LogMethod;
  child: (bindings: { name?: string }) => Logger;
}

const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
});

function bindMethod(pinoLogger: PinoLogger, level: 'info' | 'warn' | 'error' | 'debug'): LogMethod {
  return (objOrMsg, msg) => {
    if (typeof objOrMsg === 'string') {
      pinoLogger[level](objOrMsg);
    } else {
      pinoLogger[level](objOrMsg, msg);
    }
  };
}

function wrapLogger(pinoLogger: PinoLogger, resolvedName?: string): Logger {
  return {
    info: bindMethod(pinoLogger, 'info'),
    warn: bindMethod(pinoLogger, 'warn'),
    error: bindMethod(pinoLogger, 'error'),
    debug: bindMethod(pinoLogger, 'debug'),
    child: (bindings) => {
      const childName = bindings.name ? (resolvedName ? `${resolvedName}:${bindings.name}` : bindings.name) : resolvedName;
      const childLogger = pinoLogger.child(childName ? { name: childName } : {});
      return wrapLogger(childLogger, childName);
    },
  };
}

export function createLogger(name?: string | { name?: string }): Logger {
  const resolvedName = typeof name === 'string' ? name : name?.name;
  const pinoLogger = resolvedName ? baseLogger.child({ name: resolvedName }) : baseLogger;
  return wrapLogger(pinoLogger, resolvedName);
}

/**
 * Applies a level chosen after startup (e.g. from validated config) to every logger.
 */
export function setLogLevel(level: string): void {
  baseLogger.level = level;
}
