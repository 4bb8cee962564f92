/**
 * Decorador de escritura que reporta progreso por cada write.
 *
 * ProgressWriter compone un ByteWriter (capacidad "write") con un ProgressSink: cada
 * escritura subyacente emite exactamente un ProgressEvent con los bytes de esa escritura,
 * nunca acumulados. FileHandleWriter adapta un FileHandle abierto en modo append.
 *
 * @module ProgressWriter
 */

import type { FileHandle } from 'fs/promises';
import type { ProgressSink } from './types';

export interface ByteWriter {
  /** Escribe un prefijo de `data` y devuelve cuántos bytes se escribieron (≥ 1 si data no está vacío). */
  write(_data: Uint8Array): Promise<number>;
}

export class FileHandleWriter implements ByteWriter {
  constructor(private readonly handle: FileHandle) {}

  async write(data: Uint8Array): Promise<number> {
    const { bytesWritten } = await this.handle.write(data);
    return bytesWritten;
  }
}

export class ProgressWriter {
  private written = 0;

  constructor(
    private readonly target: ByteWriter,
    private readonly sink: ProgressSink | null,
    private readonly total: number
  ) {}

  /** Bytes escritos por este writer desde su creación. */
  get bytesWritten(): number {
    return this.written;
  }

  /** Escribe todo `data`, repitiendo writes parciales; un evento por write subyacente. */
  async write(data: Uint8Array): Promise<void> {
    let offset = 0;
    while (offset < data.length) {
      const n = await this.target.write(data.subarray(offset));
      if (n <= 0) {
        throw new Error(`Escritura sin progreso (${offset}/${data.length} bytes)`);
      }
      offset += n;
      this.written += n;
      this.sink?.report({ total: this.total, writtenBytes: n, fromDisk: false });
    }
  }
}
