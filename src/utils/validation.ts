/**
 * @fileoverview Validación de URLs de descarga
 * @module validation
 */

import { errorMessage } from './fileHelpers';
import { createScopedLogger } from './logger';

const log = createScopedLogger('Validation');

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

export function isValidUrl(urlString: string): boolean {
  try {
    const url = new URL(urlString);

    if (!ALLOWED_PROTOCOLS.has(url.protocol)) {
      log.warn('URL rechazada: protocolo no soportado', urlString);
      return false;
    }

    return true;
  } catch (error) {
    log.warn('URL inválida:', urlString, errorMessage(error));
    return false;
  }
}
