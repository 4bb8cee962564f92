/**
 * Tests unitarios para src/utils/logger.ts.
 */
import log from 'electron-log/node';
import { configureLogger, createScopedLogger, formatObject } from '../../src/utils/logger';

describe('formatObject', () => {
  it('debe formatear primitivos, objetos y errores', () => {
    expect(formatObject(null)).toBe('null');
    expect(formatObject(undefined)).toBe('undefined');
    expect(formatObject('texto')).toBe('texto');
    expect(formatObject({ a: 1 })).toBe('{\n  "a": 1\n}');

    const error = new Error('fallo');
    expect(formatObject(error)).toBe(`fallo\n${error.stack ?? ''}`);
  });

  it('debe recurrir a String si el objeto no es serializable', () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(formatObject(circular)).toBe('[object Object]');
  });
});

describe('createScopedLogger', () => {
  it('debe reutilizar el logger de un mismo scope', () => {
    expect(createScopedLogger('Prueba')).toBe(createScopedLogger('Prueba'));
    expect(createScopedLogger('Prueba')).not.toBe(createScopedLogger('Otra'));
  });
});

describe('configureLogger', () => {
  afterEach(() => {
    log.transports.file.level = false;
    log.transports.console.level = false;
  });

  it('debe aplicar niveles y tamaño máximo a los transports', () => {
    configureLogger({ fileLevel: 'debug', consoleLevel: 'error', maxSize: 1024 });

    expect(log.transports.file.level).toBe('debug');
    expect(log.transports.file.maxSize).toBe(1024);
    expect(log.transports.console.level).toBe('error');
  });
});
