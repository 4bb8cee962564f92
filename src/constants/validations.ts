/**
 * @fileoverview Límites y mensajes de validación de opciones.
 * @module constants/validations
 */

// =====================
// LÍMITES
// =====================

/** Longitud máxima de nombre de archivo (estándar en muchos sistemas de archivos). */
export const MAX_FILENAME_LENGTH = 255;

/** Concurrencia máxima aceptada por Fetcher (una petición HTTP por rango). */
export const MAX_CONCURRENCY = 256;

// =====================
// MENSAJES
// =====================

export const VALIDATIONS = {
  DEST_DIR: {
    CANNOT_BE_EMPTY: 'El directorio de destino no puede estar vacío',
  },
  CACHE_DIR: {
    CANNOT_BE_EMPTY: 'El directorio de caché no puede estar vacío',
  },
  CONCURRENCY: {
    MUST_BE_INTEGER: 'La concurrencia debe ser un número entero',
    MIN: 'La concurrencia debe ser mayor o igual a 1',
    MAX: `La concurrencia no puede superar ${MAX_CONCURRENCY}`,
  },
  TIMEOUT: {
    MUST_BE_NON_NEGATIVE: 'El timeout debe ser un entero mayor o igual a 0 (0 = sin límite)',
  },
  SIZE: {
    MUST_BE_NON_NEGATIVE: 'El tamaño mínimo para descarga paralela debe ser ≥ 0',
  },
  INTEGRITY: {
    ALGORITHM_REQUIRED: 'El algoritmo de hash es obligatorio',
    DIGEST_FORMAT: 'El digest esperado debe ser hexadecimal',
  },
} as const;
