/**
 * Descarga de un rango de bytes a un archivo local, con reanudación.
 *
 * fetchRange abre el archivo temporal en modo append y mira cuántos bytes ya hay:
 * - si el chunk está completo, reporta esos bytes y no hace ninguna petición;
 * - si está a medias, pide solo la cola que falta (Range desde start + n);
 * - si no hay nada, pide el rango entero.
 * El cuerpo se escribe a través de ProgressWriter (un evento por write). Con longitud conocida
 * nunca se leen más bytes de los que faltan para completar el rango.
 *
 * Un fallo aquí se propaga al Fetcher, que lo agrega sin abortar los rangos hermanos.
 *
 * @module ChunkFetcher
 */

import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import type { Readable } from 'stream';
import { ERRORS } from '../constants/errors';
import { createScopedLogger } from '../utils/logger';
import { UpstreamError } from './errors';
import { formatBytes, formatRangeHeader } from './ChunkHelpers';
import { FileHandleWriter, ProgressWriter } from './ProgressWriter';
import { rangeWidth } from './RangePlanner';
import { isSuccessStatus } from './HttpTransport';
import type { HttpTransport } from './HttpTransport';
import type { ByteRange, ProgressSink } from './types';

const log = createScopedLogger('ChunkFetcher');

export interface RangeRequest {
  url: string;
  tempFilePath: string;
  range: ByteRange;
  /** Longitud total del recurso (-1 si es desconocida); se copia en cada ProgressEvent. */
  total: number;
  sink: ProgressSink | null;
}

export interface RangeResult {
  index: number;
  /** Bytes que ya estaban en disco al empezar. */
  resumedBytes: number;
  /** Bytes transferidos por red en esta ejecución. */
  transferredBytes: number;
  /** true si el chunk ya estaba completo y no hubo petición HTTP. */
  skipped: boolean;
}

export default class ChunkFetcher {
  constructor(private readonly transport: HttpTransport) {}

  async fetchRange(request: RangeRequest): Promise<RangeResult> {
    const handle = await fs.open(request.tempFilePath, 'a');
    try {
      return await this.fetchInto(handle, request);
    } finally {
      await handle.close();
    }
  }

  private async fetchInto(handle: FileHandle, request: RangeRequest): Promise<RangeResult> {
    const { url, range, total, sink } = request;
    const width = rangeWidth(range);
    let onDisk = (await handle.stat()).size;

    if (width !== null && onDisk === width) {
      if (onDisk > 0) {
        sink?.report({ total, writtenBytes: onDisk, fromDisk: true });
      }
      log.debug(`Rango ${range.index} ya completo en disco (${formatBytes(onDisk)}), sin petición`);
      return { index: range.index, resumedBytes: onDisk, transferredBytes: 0, skipped: true };
    }

    if (width !== null && onDisk > width) {
      log.warn(
        `Rango ${range.index}: archivo temporal mayor que el rango (${onDisk}/${width}), reiniciando`
      );
      await handle.truncate(0);
      onDisk = 0;
    }

    const requestStart = range.start + onDisk;
    const response = await this.transport.get(url, {
      Range: formatRangeHeader(requestStart, range.end),
    });

    if (!isSuccessStatus(response.status)) {
      response.body.destroy();
      throw new UpstreamError(url, response.status);
    }

    // 200 a una petición con Range: el servidor mandó el recurso completo desde el byte 0.
    if (response.status !== 206 && requestStart > 0) {
      if (range.start > 0) {
        response.body.destroy();
        throw new UpstreamError(url, response.status, ERRORS.UPSTREAM.RANGE_IGNORED);
      }
      log.warn(`Rango ${range.index}: el servidor ignoró Range al reanudar, descargando desde 0`);
      await handle.truncate(0);
      onDisk = 0;
    }

    if (onDisk > 0) {
      log.info(`Reanudando rango ${range.index} desde byte ${requestStart} (${formatBytes(onDisk)} en disco)`);
      sink?.report({ total, writtenBytes: onDisk, fromDisk: true });
    }

    const remaining = width === null ? null : width - onDisk;
    const writer = new ProgressWriter(new FileHandleWriter(handle), sink, total);
    await copyBody(response.body, writer, remaining);

    if (remaining !== null && writer.bytesWritten < remaining) {
      throw new UpstreamError(
        url,
        response.status,
        `${ERRORS.UPSTREAM.BODY_TRUNCATED} (rango ${range.index}: ${onDisk + writer.bytesWritten}/${remaining + onDisk} bytes)`
      );
    }

    return {
      index: range.index,
      resumedBytes: onDisk,
      transferredBytes: writer.bytesWritten,
      skipped: false,
    };
  }
}

/**
 * Copia el cuerpo al writer. Con `limit` se detiene al alcanzarlo y descarta el resto
 * (romper el for-await destruye el stream).
 */
async function copyBody(body: Readable, writer: ProgressWriter, limit: number | null): Promise<void> {
  let left = limit ?? Infinity;
  if (left <= 0) {
    body.destroy();
    return;
  }
  try {
    for await (const piece of body) {
      const bytes: Uint8Array = typeof piece === 'string' ? Buffer.from(piece) : piece;
      const slice = bytes.length > left ? bytes.subarray(0, left) : bytes;
      await writer.write(slice);
      left -= slice.length;
      if (left <= 0) break;
    }
  } finally {
    if (!body.destroyed) body.destroy();
  }
}
