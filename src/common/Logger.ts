import pino from 'pino';
import { LogLevel } from './Config';

// Silent until initLogger() runs, so tests and --help print nothing.
let logger: pino.Logger = pino({ level: 'silent' });

export function initLogger(options: { level?: LogLevel } = {}): pino.Logger {
  logger = pino({
    level: options.level ?? 'info',
    base: { service: 'kv-http-gateway' },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return logger;
}

/**
 * Named logger that always delegates to the current root logger, so a module
 * may call getLogger() at import time, before initLogger(). The child is
 * rebuilt only when initLogger() replaces the root.
 */
export function getLogger(name: string): pino.Logger {
  let root = logger;
  let child = root.child({ module: name });

  const current = (): pino.Logger => {
    if (root !== logger) {
      root = logger;
      child = root.child({ module: name });
    }
    return child;
  };

  return new Proxy(child, {
    get(_target, prop) {
      const target = current();
      const value: unknown = Reflect.get(target, prop, target);
      return typeof value === 'function' ? value.bind(target) : value;
    },
  });
}
