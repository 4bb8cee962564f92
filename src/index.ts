/**
 * parafetch: descargas HTTP fragmentadas en rangos paralelos, con reanudación, caché de
 * ETag y verificación de integridad.
 *
 * @module parafetch
 */

export * from './engines';
export { fetcherOptionsSchema, integritySchema } from './utils/schemas';
export type { FetcherOptions, FetcherOptionsInput, IntegritySpec } from './utils/schemas';
export { configureLogger, createScopedLogger } from './utils/logger';
export type { ConfigureLoggerOptions, ScopedLogger } from './utils/logger';
export { default as config } from './config';
export type { AppConfig } from './config.types';
