/**
 * Archivo descargado que Fetcher devuelve al consumidor: ruta más un FileHandle abierto
 * en lectura y posicionado al inicio.
 *
 * @module FetchedFile
 */

import { promises as fs, createReadStream } from 'fs';
import type { ReadStream } from 'fs';
import type { FileHandle } from 'fs/promises';

export class FetchedFile {
  private constructor(
    readonly path: string,
    readonly handle: FileHandle
  ) {}

  static async open(filePath: string): Promise<FetchedFile> {
    const handle = await fs.open(filePath, 'r');
    return new FetchedFile(filePath, handle);
  }

  async size(): Promise<number> {
    return (await this.handle.stat()).size;
  }

  /** Lee el archivo completo con lecturas posicionales (no mueve la posición del handle). */
  async readAll(): Promise<Buffer> {
    const size = await this.size();
    const buffer = Buffer.alloc(size);
    let offset = 0;
    while (offset < size) {
      const { bytesRead } = await this.handle.read(buffer, offset, size - offset, offset);
      if (bytesRead === 0) break;
      offset += bytesRead;
    }
    return offset === size ? buffer : buffer.subarray(0, offset);
  }

  /** Stream de lectura independiente del handle, desde el byte 0. */
  createReadStream(): ReadStream {
    return createReadStream(this.path);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
