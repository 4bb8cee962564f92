/**
 * Tipos para la configuración por defecto del motor.
 *
 * La implementación concreta y valores por defecto están en config.ts.
 */
export interface AppConfig {
  /** Timeout por petición HTTP y cabeceras fijas. */
  network: {
    /** Timeout de cada petición en ms; 0 = sin límite. */
    requestTimeoutMs: number;
    userAgent: string;
  };
  /** Valores por defecto de FetcherOptions. */
  fetch: {
    destDir: string;
    concurrency: number;
    /** Por debajo de este tamaño se descarga en un solo stream aunque haya soporte de Range. */
    minParallelSize: number;
    trackChangeTokens: boolean;
  };
  /** Raíz de los marcadores de ETag (uno por recurso y token). */
  cache: {
    dir: string;
  };
  /** Tamaños de buffer para ensamblado y verificación. */
  io: {
    assembleBufferSize: number;
    hashBufferSize: number;
  };
}
