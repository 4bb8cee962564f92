/**
 * Cálculo de rangos de bytes para descarga fragmentada.
 *
 * planRanges: parte [0, totalLength) en rangos contiguos sin solapes; el último absorbe
 * el resto de la división. resolveConcurrency: decide la concurrencia efectiva según
 * los metadatos del preflight (longitud conocida, soporte de Range, tamaño mínimo).
 *
 * @module RangePlanner
 */

import { ERRORS } from '../constants/errors';
import { InvalidConfigurationError } from './errors';
import { formatBytes } from './ChunkHelpers';
import { createScopedLogger } from '../utils/logger';
import type { ByteRange, ContentMetadata } from './types';

const log = createScopedLogger('RangePlanner');

/** Longitud desconocida (el servidor no envió Content-Length). */
export const UNKNOWN_LENGTH = -1;

function assertConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new InvalidConfigurationError(`${ERRORS.CONFIG.CONCURRENCY_INVALID} (recibido: ${concurrency})`);
  }
}

/**
 * Calcula los rangos [start, end) para cada chunk.
 *
 * Con longitud desconocida devuelve un único rango abierto (end = -1). Si se piden más
 * chunks que bytes, la concurrencia se limita a totalLength para no producir rangos vacíos.
 *
 * @throws InvalidConfigurationError si concurrency no es un entero ≥ 1.
 */
export function planRanges(totalLength: number, concurrency: number): ByteRange[] {
  assertConcurrency(concurrency);

  if (totalLength < 0) {
    return [{ index: 0, start: 0, end: UNKNOWN_LENGTH }];
  }

  const effective = Math.min(concurrency, Math.max(totalLength, 1));
  const chunkSize = Math.floor(totalLength / effective);
  const remainder = totalLength % effective;

  const ranges: ByteRange[] = [];
  for (let i = 0; i < effective; i++) {
    const start = chunkSize * i;
    let end = chunkSize * (i + 1);
    if (i === effective - 1) {
      end += remainder;
    }
    ranges.push({ index: i, start, end });
  }

  log.debug(
    `${formatBytes(totalLength)} → ${ranges.length} rangos de ~${formatBytes(chunkSize)}`
  );
  return ranges;
}

/** Ancho en bytes de un rango, o null si es abierto (longitud desconocida). */
export function rangeWidth(range: ByteRange): number | null {
  return range.end < 0 ? null : range.end - range.start;
}

/**
 * Concurrencia efectiva para una descarga: 1 si la longitud es desconocida, el servidor
 * no acepta rangos o el recurso es menor que minParallelSize.
 */
export function resolveConcurrency(
  metadata: ContentMetadata,
  requested: number,
  minParallelSize: number
): number {
  assertConcurrency(requested);
  if (metadata.totalLength < 0) return 1;
  if (!metadata.supportsRanges) return 1;
  if (metadata.totalLength < minParallelSize) return 1;
  return Math.min(requested, Math.max(metadata.totalLength, 1));
}
