/**
 * @fileoverview Sistema de logging centralizado (electron-log, entrada para Node).
 * @module utils/logger
 *
 * Proporciona loggers con scope, formato de objetos y operaciones cronometradas.
 * La librería no configura transports al importarse: el consumidor llama a configureLogger
 * si quiere archivo de log, niveles propios o silenciar la consola.
 */

import log from 'electron-log/node';
import type { LevelOption } from 'electron-log';
import path from 'path';
import { types } from 'util';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface ConfigureLoggerOptions {
  /** Nivel del transport de archivo; false lo desactiva. */
  fileLevel?: LevelOption;
  /** Nivel del transport de consola; false lo desactiva. */
  consoleLevel?: LevelOption;
  maxSize?: number;
  /** Directorio donde escribir parafetch.log. Si falta, electron-log decide la ruta. */
  logDir?: string;
}

/**
 * Convierte un valor a string para logging: Errors con stack, objetos a JSON, primitivos a String.
 */
export function formatObject(obj: unknown): string {
  if (obj === null) return 'null';
  if (obj === undefined) return 'undefined';
  if (typeof obj === 'string') return obj;
  if (types.isNativeError(obj)) {
    return `${obj.message}\n${obj.stack ?? ''}`;
  }
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return String(obj);
  }
}

export interface ScopedLogger {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  startOperation: (_operation: string) => (_result?: string) => void;
  object: (_label: string, _obj: unknown) => void;
}

const childLoggers = new Map<string, ScopedLogger>();

export function createScopedLogger(scope: string): ScopedLogger {
  const existing = childLoggers.get(scope);
  if (existing) return existing;

  const baseChildLog = log.scope(scope);

  const logMethod =
    (method: LogLevel) =>
    (...args: unknown[]): void => {
      if (
        args.length === 2 &&
        typeof args[0] === 'string' &&
        typeof args[1] === 'object' &&
        args[1] !== null
      ) {
        baseChildLog[method](args[0], formatObject(args[1]));
      } else {
        baseChildLog[method](...args);
      }
    };

  const extendedChildLog: ScopedLogger = {
    error: logMethod('error'),
    warn: logMethod('warn'),
    info: logMethod('info'),
    debug: logMethod('debug'),
    startOperation(operation: string) {
      const start = Date.now();
      baseChildLog.debug(`▶ Iniciando: ${operation}`);
      return (result = 'completado') => {
        const duration = Date.now() - start;
        baseChildLog.info(`✓ ${operation}: ${result} (${duration}ms)`);
      };
    },
    object(label: string, obj: unknown) {
      baseChildLog.debug(`${label}:\n${formatObject(obj)}`);
    },
  };

  childLoggers.set(scope, extendedChildLog);
  return extendedChildLog;
}

/**
 * Configura el logger global (archivo y consola).
 * Por defecto: fileLevel 'info', consoleLevel 'warn', maxSize 10 MB.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): typeof log {
  const {
    fileLevel = 'info',
    consoleLevel = 'warn',
    maxSize = 10 * 1024 * 1024,
    logDir,
  } = options;

  log.transports.file.level = fileLevel;
  log.transports.file.maxSize = maxSize;
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';
  if (logDir) {
    log.transports.file.resolvePathFn = () => path.join(logDir, 'parafetch.log');
  }

  log.transports.console.level = consoleLevel;
  log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';

  return log;
}
