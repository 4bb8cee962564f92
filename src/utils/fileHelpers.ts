/**
 * @fileoverview Utilidades para operaciones con archivos y sanitización de nombres
 * @module fileHelpers
 */

import { promises as fs } from 'fs';
import { types } from 'util';
import { MAX_FILENAME_LENGTH } from '../constants/validations';
import { createScopedLogger } from './logger';

const log = createScopedLogger('FileUtils');

export function sanitizeFilename(filename: string): string {
  if (!filename) return 'unnamed';

  let sanitized = filename
    .replace(/[<>:"|?*]/g, '_')
    .replace(/\\/g, '_')
    .replace(/\//g, '_')
    /* eslint-disable-next-line no-control-regex */
    .replace(/[\u0000-\u001f\u007f]/g, '')
    .trim();

  const reservedNames = /^(CON|PRN|AUX|NUL|COM[1-9]|LPT[1-9])(\..*)?$/i;
  if (reservedNames.test(sanitized)) {
    sanitized = `_${sanitized}`;
  }

  if (sanitized.length > MAX_FILENAME_LENGTH) {
    sanitized = sanitized.slice(0, MAX_FILENAME_LENGTH);
  }

  if (!sanitized || sanitized === '.' || sanitized === '..') {
    sanitized = 'unnamed';
  }

  return sanitized;
}

/**
 * true si el error de fs/red trae el código indicado (ENOENT, ECONNRESET, ...).
 * No usa instanceof: los errores de fs pueden venir de otro realm (p. ej. bajo Jest).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

export function errorMessage(error: unknown): string {
  return types.isNativeError(error) ? error.message : String(error);
}

/** Tamaño del archivo en bytes, o null si no existe. Otros errores de fs se propagan. */
export async function fileSizeOrNull(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw error;
  }
}

/** Borra un archivo o directorio ignorando que no exista; otros fallos solo se registran. */
export async function removeQuietly(targetPath: string): Promise<boolean> {
  try {
    await fs.rm(targetPath, { recursive: true, force: true });
    return true;
  } catch (error) {
    log.warn(`No se pudo eliminar ${targetPath}:`, errorMessage(error));
    return false;
  }
}
