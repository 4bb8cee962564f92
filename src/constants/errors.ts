/**
 * @fileoverview Constantes de mensajes de error del motor de descargas.
 * @module constants/errors
 *
 * Fuente única de verdad para textos de error; las clases de src/engines/errors.ts
 * componen sus mensajes a partir de estas constantes.
 */

// =====================
// ERRORES DE CONFIGURACIÓN
// =====================

export const CONFIG_ERRORS = {
  URL_REQUIRED: 'La URL es obligatoria',
  URL_INVALID: 'URL inválida o con protocolo no soportado (solo http/https)',
  CONCURRENCY_INVALID: 'La concurrencia debe ser un entero mayor o igual a 1',
  OPTIONS_INVALID: 'Opciones de configuración inválidas',
} as const;

// =====================
// ERRORES DE RED / SERVIDOR
// =====================

export const UPSTREAM_ERRORS = {
  NON_2XX: 'La petición HTTP devolvió un código distinto de 2xx',
  RANGE_IGNORED: 'El servidor ignoró la cabecera Range y devolvió el recurso completo',
  BODY_TRUNCATED: 'La respuesta terminó antes de completar el rango solicitado',
  BODY_NOT_STREAM: 'La respuesta HTTP no trae un cuerpo legible como stream',
} as const;

// =====================
// ERRORES DE DESCARGA / ENSAMBLADO
// =====================

export const TRANSFER_ERRORS = {
  PARTIAL_TRANSFER: 'Fallaron uno o más rangos de la descarga',
  CHUNK_MISSING: 'Falta el archivo de chunk durante el ensamblado',
  UNEXPECTED: 'Error inesperado durante la descarga',
} as const;

// =====================
// ERRORES DE VERIFICACIÓN
// =====================

export const VERIFY_ERRORS = {
  UNSUPPORTED_ALGORITHM: 'Algoritmo de hash no soportado',
  INTEGRITY_MISMATCH: 'El checksum no coincide; el contenido descargado no es confiable',
} as const;

export const ERRORS = {
  CONFIG: CONFIG_ERRORS,
  UPSTREAM: UPSTREAM_ERRORS,
  TRANSFER: TRANSFER_ERRORS,
  VERIFY: VERIFY_ERRORS,
} as const;

export type ErrorsMap = typeof ERRORS;

export default ERRORS;
