/**
 * Configuración por defecto del motor (valores de runtime).
 *
 * Aquí se definen timeouts, concurrencia, umbral de descarga paralela, directorio de caché
 * de ETags y tamaños de buffer. Las opciones que recibe Fetcher se mezclan con estos valores
 * al validarse (utils/schemas).
 *
 * @module config
 */

import os from 'os';
import path from 'path';
import type { AppConfig } from './config.types';

const config: AppConfig = {
  network: {
    requestTimeoutMs: 0,
    userAgent: 'parafetch/0.1',
  },

  fetch: {
    destDir: './',
    concurrency: 1,
    minParallelSize: 64 * 1024,
    trackChangeTokens: false,
  },

  cache: {
    dir: path.join(os.homedir(), '.parafetch'),
  },

  io: {
    assembleBufferSize: 1024 * 1024,
    hashBufferSize: 1024 * 1024,
  },
};

export default config;
