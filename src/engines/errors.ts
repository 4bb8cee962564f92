/**
 * Jerarquía de errores del motor de descargas.
 *
 * Todo error que escapa de Fetcher.fetch es un FetchError con `stage` (estado de la
 * máquina de estados en el que ocurrió). Los errores por rango se agregan en
 * PartialTransferError una vez que todos los rangos terminaron.
 *
 * @module engines/errors
 */

import { types } from 'util';
import { ERRORS } from '../constants/errors';
import type { FetchStateValue } from './FetchStateMachine';

export type FetchErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'UPSTREAM_ERROR'
  | 'PARTIAL_TRANSFER'
  | 'ASSEMBLY_ERROR'
  | 'UNSUPPORTED_ALGORITHM'
  | 'INTEGRITY_MISMATCH'
  | 'UNEXPECTED';

export interface FetchErrorOptions {
  cause?: unknown;
  stage?: FetchStateValue;
}

export class FetchError extends Error {
  readonly code: FetchErrorCode;
  stage: FetchStateValue | undefined;

  constructor(code: FetchErrorCode, message: string, options: FetchErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.stage = options.stage;
  }
}

export class InvalidConfigurationError extends FetchError {
  constructor(detail: string, options: FetchErrorOptions = {}) {
    super('INVALID_CONFIGURATION', detail, options);
  }
}

export class UpstreamError extends FetchError {
  readonly status: number;
  readonly url: string;

  constructor(
    url: string,
    status: number,
    detail: string = ERRORS.UPSTREAM.NON_2XX,
    options: FetchErrorOptions = {}
  ) {
    super('UPSTREAM_ERROR', `${detail} (HTTP ${status}, ${url})`, options);
    this.status = status;
    this.url = url;
  }
}

export interface RangeFailure {
  index: number;
  error: Error;
}

export class PartialTransferError extends FetchError {
  readonly failures: readonly RangeFailure[];

  constructor(failures: RangeFailure[], options: FetchErrorOptions = {}) {
    const lines = failures.map(f => `  - rango ${f.index}: ${f.error.message}`);
    super(
      'PARTIAL_TRANSFER',
      `${ERRORS.TRANSFER.PARTIAL_TRANSFER} (${failures.length}):\n${lines.join('\n')}`,
      options
    );
    this.failures = failures;
  }
}

export class AssemblyError extends FetchError {
  readonly chunkIndex: number;

  constructor(chunkIndex: number, chunkPath: string, options: FetchErrorOptions = {}) {
    super('ASSEMBLY_ERROR', `${ERRORS.TRANSFER.CHUNK_MISSING}: ${chunkIndex} (${chunkPath})`, options);
    this.chunkIndex = chunkIndex;
  }
}

export class UnsupportedAlgorithmError extends FetchError {
  readonly algorithm: string;

  constructor(algorithm: string, options: FetchErrorOptions = {}) {
    super('UNSUPPORTED_ALGORITHM', `${ERRORS.VERIFY.UNSUPPORTED_ALGORITHM}: ${algorithm}`, options);
    this.algorithm = algorithm;
  }
}

export class IntegrityMismatchError extends FetchError {
  readonly computed: string;
  readonly expected: string;
  readonly filePath: string;

  constructor(
    filePath: string,
    computed: string,
    expected: string,
    options: FetchErrorOptions = {}
  ) {
    super(
      'INTEGRITY_MISMATCH',
      `${ERRORS.VERIFY.INTEGRITY_MISMATCH}\n encontrado: ${computed}\n esperado: ${expected}\n archivo: ${filePath}`,
      options
    );
    this.computed = computed;
    this.expected = expected;
    this.filePath = filePath;
  }
}

/** Normaliza cualquier valor lanzado a Error (también errores nativos de otro realm). */
export function toError(value: unknown): Error {
  return value instanceof Error || types.isNativeError(value) ? value : new Error(String(value));
}
