/**
 * Fusión de chunks en el archivo final.
 *
 * assemble: crea (o trunca) el destino, concatena los chunks en orden estricto de índice,
 * borra el directorio de chunks y devuelve el destino abierto al inicio. Un chunk que falta
 * es un AssemblyError; en ese caso los chunks se conservan para poder reanudar.
 * promote: en modo de un solo stream renombra el `.part` al destino.
 *
 * @module FileAssembler
 */

import { promises as fs } from 'fs';
import config from '../config';
import { createScopedLogger } from '../utils/logger';
import { hasErrorCode } from '../utils/fileHelpers';
import { AssemblyError } from './errors';
import { FetchedFile } from './FetchedFile';
import { formatBytes } from './ChunkHelpers';
import type ChunkStore from './ChunkStore';

const log = createScopedLogger('FileAssembler');

export interface AssembleResult {
  file: FetchedFile;
  bytesProcessed: number;
  duration: number;
}

export default class FileAssembler {
  constructor(
    private readonly chunkStore: ChunkStore,
    private readonly bufferSize: number = config.io.assembleBufferSize
  ) {}

  async assemble(destinationPath: string, rangeCount: number): Promise<AssembleResult> {
    const startTime = Date.now();
    const buffer = Buffer.allocUnsafe(this.bufferSize);
    const dest = await fs.open(destinationPath, 'w');
    let bytesWritten = 0;

    try {
      for (let i = 0; i < rangeCount; i++) {
        bytesWritten += await this.appendChunk(dest, i, buffer, bytesWritten);
      }
    } finally {
      await dest.close();
    }

    await this.chunkStore.removeChunkDir();

    const duration = Date.now() - startTime;
    log.info(
      `Ensamblado ${destinationPath}: ${rangeCount} chunks, ${formatBytes(bytesWritten)} (${duration}ms)`
    );
    return { file: await FetchedFile.open(destinationPath), bytesProcessed: bytesWritten, duration };
  }

  private async appendChunk(
    dest: fs.FileHandle,
    chunkIndex: number,
    buffer: Buffer,
    destOffset: number
  ): Promise<number> {
    const chunkPath = this.chunkStore.getChunkPath(chunkIndex);
    let source: fs.FileHandle;
    try {
      source = await fs.open(chunkPath, 'r');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new AssemblyError(chunkIndex, chunkPath, { cause: error });
      }
      throw error;
    }

    try {
      let copied = 0;
      for (;;) {
        const { bytesRead } = await source.read(buffer, 0, buffer.length, copied);
        if (bytesRead === 0) break;
        let flushed = 0;
        while (flushed < bytesRead) {
          const { bytesWritten } = await dest.write(
            buffer,
            flushed,
            bytesRead - flushed,
            destOffset + copied + flushed
          );
          flushed += bytesWritten;
        }
        copied += bytesRead;
      }
      return copied;
    } finally {
      await source.close();
    }
  }

  /** Modo de un solo stream: mueve `<destino>.part` al destino y lo abre al inicio. */
  async promote(partialPath: string, destinationPath: string): Promise<AssembleResult> {
    const startTime = Date.now();
    try {
      await fs.rename(partialPath, destinationPath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new AssemblyError(0, partialPath, { cause: error });
      }
      throw error;
    }
    const file = await FetchedFile.open(destinationPath);
    const bytesProcessed = await file.size();
    return { file, bytesProcessed, duration: Date.now() - startTime };
  }
}
