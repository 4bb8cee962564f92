/**
 * Caché de ETags: un archivo marcador vacío por (recurso, token) bajo `cacheRoot`.
 *
 * La presencia del marcador indica que una descarga de ese token terminó (y pasó la
 * verificación, si había). Para saltar la descarga además debe coincidir el tamaño del
 * archivo local con el Content-Length del servidor. El token se guarda como su SHA-256:
 * dos tokens distintos nunca comparten marcador.
 *
 * @module ChangeTokenCache
 */

import crypto from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { createScopedLogger } from '../utils/logger';
import { fileSizeOrNull, sanitizeFilename } from '../utils/fileHelpers';

const log = createScopedLogger('ChangeTokenCache');

export interface ChangeTokenCacheOptions {
  cacheRoot: string;
  enabled: boolean;
}

export interface SkipQuery {
  resourceKey: string;
  token: string;
  localPath: string;
  contentLength: number;
}

/**
 * Normaliza un ETag: quita el prefijo débil `W/` y las comillas.
 */
export function normalizeChangeToken(raw: string | undefined): string {
  if (!raw) return '';
  return raw
    .trim()
    .replace(/^W\//i, '')
    .replace(/^"+|"+$/g, '');
}

export default class ChangeTokenCache {
  readonly cacheRoot: string;
  readonly enabled: boolean;

  constructor(options: ChangeTokenCacheOptions) {
    this.cacheRoot = options.cacheRoot;
    this.enabled = options.enabled;
  }

  markerPath(resourceKey: string, token: string): string {
    const tokenDigest = crypto.createHash('sha256').update(token, 'utf8').digest('hex');
    return path.join(this.cacheRoot, sanitizeFilename(resourceKey), tokenDigest);
  }

  async has(resourceKey: string, token: string): Promise<boolean> {
    return (await fileSizeOrNull(this.markerPath(resourceKey, token))) !== null;
  }

  async shouldSkip(query: SkipQuery): Promise<boolean> {
    if (!this.enabled || !query.token) return false;

    if (!(await this.has(query.resourceKey, query.token))) return false;

    const localSize = await fileSizeOrNull(query.localPath);
    const skip = localSize !== null && localSize === query.contentLength;
    log.debug(
      `Token ${query.token} conocido para ${query.resourceKey}; local ${localSize ?? 'ausente'} / servidor ${query.contentLength} → ${skip ? 'se reutiliza' : 'se descarga'}`
    );
    return skip;
  }

  /** Crea el marcador (idempotente). No hace nada si la caché está desactivada o no hay token. */
  async record(resourceKey: string, token: string): Promise<void> {
    if (!this.enabled || !token) return;
    const markerPath = this.markerPath(resourceKey, token);
    await fs.mkdir(path.dirname(markerPath), { recursive: true, mode: 0o700 });
    const handle = await fs.open(markerPath, 'a');
    await handle.close();
    log.debug(`Marcador de token registrado: ${markerPath}`);
  }
}
