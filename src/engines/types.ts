/**
 * Tipos compartidos por el motor de descargas.
 *
 * Define metadatos del preflight, rangos de bytes, eventos de progreso y el contrato
 * ProgressSink que reciben ChunkFetcher y Fetcher.
 *
 * @module engines/types
 */

/** Metadatos derivados de la respuesta HEAD. Solo lectura durante la descarga. */
export interface ContentMetadata {
  /** Longitud total en bytes; -1 si el servidor no la informó. */
  totalLength: number;
  /** true si el servidor anuncia `Accept-Ranges: bytes`. */
  supportsRanges: boolean;
  /** ETag sin comillas ni prefijo débil; cadena vacía si no hay. */
  changeToken: string;
}

/** Rango [start, end) de un chunk. end = -1 cuando la longitud total es desconocida. */
export interface ByteRange {
  index: number;
  start: number;
  end: number;
}

export interface ProgressEvent {
  /** Longitud total del recurso, o -1 si es desconocida. */
  total: number;
  /** Bytes escritos en esta operación (no acumulado). */
  writtenBytes: number;
  /** true para el único evento que reporta bytes ya presentes en disco de una ejecución anterior. */
  fromDisk: boolean;
}

/**
 * Destino de eventos de progreso. Varios rangos reportan en paralelo sobre el mismo sink;
 * Fetcher llama a close() exactamente una vez por descarga.
 */
export interface ProgressSink {
  report(_event: ProgressEvent): void;
  close(): void;
}
