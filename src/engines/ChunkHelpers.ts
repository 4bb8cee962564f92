/**
 * Utilidades compartidas por el motor de descargas fragmentadas.
 *
 * @module ChunkHelpers
 */

import path from 'path';
import { sanitizeFilename } from '../utils/fileHelpers';

export function formatBytes(bytes: number): string {
  if (bytes < 0) return 'desconocido';
  if (bytes === 0) return '0 B';
  if (bytes === Infinity) return '∞';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/**
 * Nombre de archivo local para una URL: basename del path, o el host si el path está vacío.
 * El resultado se sanitiza para poder usarse como nombre en disco.
 */
export function fileNameFromUrl(url: string): string {
  const parsed = new URL(url);
  let pathname = parsed.pathname;
  try {
    pathname = decodeURIComponent(pathname);
  } catch {
    // secuencia % mal formada: se usa el path tal cual
  }
  const base = path.posix.basename(pathname);
  return sanitizeFilename(base || parsed.host);
}

/** Cabecera Range para [start, end) o abierta si end < 0. */
export function formatRangeHeader(start: number, end: number): string {
  return end < 0 ? `bytes=${start}-` : `bytes=${start}-${end - 1}`;
}
