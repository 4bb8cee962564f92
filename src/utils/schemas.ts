/**
 * @fileoverview Schemas de validación (Zod) para las opciones de Fetcher
 * @module schemas
 */

import { z } from 'zod';
import config from '../config';
import { MAX_CONCURRENCY, VALIDATIONS } from '../constants/validations';

export interface ZodValidationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export const integritySchema = z.object({
  algorithm: z
    .string()
    .min(1, VALIDATIONS.INTEGRITY.ALGORITHM_REQUIRED)
    .transform(val => val.trim().toLowerCase()),
  expectedDigest: z
    .string()
    .regex(/^[0-9a-fA-F]+$/, VALIDATIONS.INTEGRITY.DIGEST_FORMAT)
    .transform(val => val.toLowerCase()),
});

export const fetcherOptionsSchema = z.object({
  destDir: z.string().min(1, VALIDATIONS.DEST_DIR.CANNOT_BE_EMPTY).default(config.fetch.destDir),

  concurrency: z
    .number()
    .int(VALIDATIONS.CONCURRENCY.MUST_BE_INTEGER)
    .min(1, VALIDATIONS.CONCURRENCY.MIN)
    .max(MAX_CONCURRENCY, VALIDATIONS.CONCURRENCY.MAX)
    .default(config.fetch.concurrency),

  trackChangeTokens: z.boolean().default(config.fetch.trackChangeTokens),

  requestTimeoutMs: z
    .number()
    .int(VALIDATIONS.TIMEOUT.MUST_BE_NON_NEGATIVE)
    .nonnegative(VALIDATIONS.TIMEOUT.MUST_BE_NON_NEGATIVE)
    .default(config.network.requestTimeoutMs),

  minParallelSize: z
    .number()
    .int(VALIDATIONS.SIZE.MUST_BE_NON_NEGATIVE)
    .nonnegative(VALIDATIONS.SIZE.MUST_BE_NON_NEGATIVE)
    .default(config.fetch.minParallelSize),

  cacheDir: z.string().min(1, VALIDATIONS.CACHE_DIR.CANNOT_BE_EMPTY).default(config.cache.dir),

  integrity: integritySchema.optional(),
});

/** Opciones tal como las pasa el consumidor (todas opcionales). */
export type FetcherOptionsInput = z.input<typeof fetcherOptionsSchema>;
/** Opciones validadas, con valores por defecto aplicados. */
export type FetcherOptions = z.output<typeof fetcherOptionsSchema>;
export type IntegritySpec = z.output<typeof integritySchema>;

export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): ZodValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return {
      success: true,
      data: result.data,
    };
  }
  const errorMessages = result.error.issues.map((issue: z.ZodIssue) => {
    const field = issue.path.join('.');
    return field ? `${field}: ${issue.message}` : issue.message;
  });
  return {
    success: false,
    error: errorMessages.join(', '),
  };
}
