/**
 * Layout en disco de los archivos temporales de una descarga.
 *
 * Para un destino `<destDir>/<nombre>`:
 * - modo paralelo: `<destDir>/<nombre>.chunks/<índice>` (un archivo por rango)
 * - modo de un solo stream: `<destDir>/<nombre>.part`
 *
 * Los archivos sobreviven entre ejecuciones: es lo que permite reanudar.
 *
 * @module ChunkStore
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { createScopedLogger } from '../utils/logger';
import { errorMessage, fileSizeOrNull, hasErrorCode, removeQuietly } from '../utils/fileHelpers';

const log = createScopedLogger('ChunkStore');

/** Plan con el que se escribieron los chunks; si cambia, los chunks en disco no sirven. */
const chunkPlanSchema = z.object({
  totalLength: z.number().int(),
  rangeCount: z.number().int().positive(),
  changeToken: z.string(),
});

export type ChunkPlan = z.infer<typeof chunkPlanSchema>;

const PLAN_FILE = '.plan.json';

export interface ChunkInfo {
  index: number;
  path: string;
  size: number;
}

export default class ChunkStore {
  readonly destinationPath: string;

  constructor(destDir: string, fileName: string) {
    this.destinationPath = path.join(destDir, fileName);
  }

  getChunkDir(): string {
    return `${this.destinationPath}.chunks`;
  }

  getChunkPath(chunkIndex: number): string {
    return path.join(this.getChunkDir(), String(chunkIndex));
  }

  getPartialPath(): string {
    return `${this.destinationPath}.part`;
  }

  async createChunkDir(): Promise<string> {
    const chunkDir = this.getChunkDir();
    await fs.mkdir(chunkDir, { recursive: true });
    return chunkDir;
  }

  async ensureDestinationDir(): Promise<void> {
    await fs.mkdir(path.dirname(this.destinationPath), { recursive: true });
  }

  /** Chunks presentes en disco, ordenados por índice. */
  async listChunks(): Promise<ChunkInfo[]> {
    const chunkDir = this.getChunkDir();
    let files: string[];
    try {
      files = await fs.readdir(chunkDir);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return [];
      throw error;
    }
    const chunks: ChunkInfo[] = [];
    for (const file of files) {
      if (!/^\d+$/.test(file)) continue;
      const chunkPath = path.join(chunkDir, file);
      const stats = await fs.stat(chunkPath);
      chunks.push({ index: parseInt(file, 10), path: chunkPath, size: stats.size });
    }
    return chunks.sort((a, b) => a.index - b.index);
  }

  getPlanPath(): string {
    return path.join(this.getChunkDir(), PLAN_FILE);
  }

  async readPlan(): Promise<ChunkPlan | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.getPlanPath(), 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return null;
      throw error;
    }
    try {
      const parsed = chunkPlanSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      log.warn(`Plan de chunks ilegible, se descarta: ${this.getPlanPath()}`);
      return null;
    }
  }

  /**
   * Prepara el directorio de chunks para `plan`. Si hay chunks de un plan distinto (otra
   * concurrencia, otra longitud u otro ETag) se borran antes de empezar. Chunks sin plan
   * registrado se adoptan tal cual.
   */
  async preparePlan(plan: ChunkPlan): Promise<void> {
    const previous = await this.readPlan();
    const samePlan =
      previous !== null &&
      previous.totalLength === plan.totalLength &&
      previous.rangeCount === plan.rangeCount &&
      previous.changeToken === plan.changeToken;

    if (previous !== null && !samePlan) {
      log.info(`Plan de chunks distinto al anterior, descartando chunks en ${this.getChunkDir()}`);
      await this.removeChunkDir();
    }
    await this.createChunkDir();
    if (!samePlan) {
      await fs.writeFile(this.getPlanPath(), JSON.stringify(plan), 'utf8');
    }
  }

  /** Elimina el directorio de chunks y todo su contenido. */
  async removeChunkDir(): Promise<boolean> {
    const removed = await removeQuietly(this.getChunkDir());
    if (removed) log.debug(`Directorio de chunks eliminado: ${this.getChunkDir()}`);
    return removed;
  }

  /** Registra qué queda en disco de una ejecución anterior (para logs de reanudación). */
  async describeLeftovers(): Promise<string | null> {
    try {
      const chunks = await this.listChunks();
      const partialSize = await fileSizeOrNull(this.getPartialPath());
      if (chunks.length === 0 && partialSize === null) return null;
      const chunkBytes = chunks.reduce((sum, c) => sum + c.size, 0);
      return `${chunks.length} chunks (${chunkBytes} bytes), .part: ${partialSize ?? 'no'}`;
    } catch (error) {
      log.warn(`No se pudo inspeccionar ${this.getChunkDir()}:`, errorMessage(error));
      return null;
    }
  }
}
