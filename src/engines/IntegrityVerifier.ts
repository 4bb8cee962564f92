/**
 * Verificación de integridad por hash del archivo descargado.
 *
 * calculateHash lee el archivo del byte 0 al final con lecturas posicionales sobre un buffer
 * fijo: nunca carga el archivo entero y no mueve la posición del handle. verify compara en
 * minúsculas y lanza IntegrityMismatchError con ambos digests.
 *
 * @module IntegrityVerifier
 */

import crypto from 'crypto';
import type { FileHandle } from 'fs/promises';
import config from '../config';
import { createScopedLogger } from '../utils/logger';
import { IntegrityMismatchError, UnsupportedAlgorithmError } from './errors';

const log = createScopedLogger('IntegrityVerifier');

export const SUPPORTED_ALGORITHMS = ['md5', 'sha1', 'sha256', 'sha512'] as const;

export type HashAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

export function isSupportedAlgorithm(name: string): name is HashAlgorithm {
  return SUPPORTED_ALGORITHMS.some(algorithm => algorithm === name);
}

/** @throws UnsupportedAlgorithmError si el nombre no está en SUPPORTED_ALGORITHMS. */
export function assertAlgorithm(name: string): HashAlgorithm {
  const normalized = name.trim().toLowerCase();
  if (!isSupportedAlgorithm(normalized)) {
    throw new UnsupportedAlgorithmError(name);
  }
  return normalized;
}

export default class IntegrityVerifier {
  constructor(private readonly bufferSize: number = config.io.hashBufferSize) {}

  async calculateHash(
    handle: FileHandle,
    algorithm: string,
    onProgress: ((_progress: number) => void) | null = null
  ): Promise<string> {
    const hash = crypto.createHash(assertAlgorithm(algorithm));
    const { size } = await handle.stat();
    const buffer = Buffer.allocUnsafe(this.bufferSize);
    let position = 0;

    while (position < size) {
      const toRead = Math.min(buffer.length, size - position);
      const { bytesRead } = await handle.read(buffer, 0, toRead, position);
      if (bytesRead === 0) break;
      hash.update(buffer.subarray(0, bytesRead));
      position += bytesRead;
      if (onProgress) onProgress(position / size);
    }
    return hash.digest('hex');
  }

  async verify(
    handle: FileHandle,
    filePath: string,
    algorithm: string,
    expectedHexDigest: string
  ): Promise<void> {
    const end = log.startOperation(`verificación ${algorithm} de ${filePath}`);
    const computed = await this.calculateHash(handle, algorithm);
    const expected = expectedHexDigest.trim().toLowerCase();
    if (computed !== expected) {
      log.warn(`Checksum incorrecto para ${filePath}: ${computed} !== ${expected}`);
      throw new IntegrityMismatchError(filePath, computed, expected);
    }
    end('checksum correcto');
  }
}
