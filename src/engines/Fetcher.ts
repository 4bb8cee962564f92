/**
 * Orquestador de una descarga: preflight → caché de ETag → plan de rangos → descarga
 * paralela → ensamblado → verificación.
 *
 * Cada llamada a fetch() crea su propia FetchStateMachine, así que un mismo Fetcher puede
 * descargar varios recursos a la vez. El sink de progreso se cierra exactamente una vez por
 * llamada: tras unir todos los rangos y ensamblar, o en cuanto la descarga falla.
 *
 * Todo error que sale de fetch() es un FetchError con `stage` = estado en el que ocurrió.
 *
 * @module Fetcher
 */

import { ERRORS } from '../constants/errors';
import { createScopedLogger } from '../utils/logger';
import { fetcherOptionsSchema, validate } from '../utils/schemas';
import type { FetcherOptions, FetcherOptionsInput } from '../utils/schemas';
import { isValidUrl } from '../utils/validation';
import ChangeTokenCache, { normalizeChangeToken } from './ChangeTokenCache';
import ChunkFetcher from './ChunkFetcher';
import type { RangeResult } from './ChunkFetcher';
import { fileNameFromUrl, formatBytes } from './ChunkHelpers';
import ChunkStore from './ChunkStore';
import {
  FetchError,
  InvalidConfigurationError,
  PartialTransferError,
  UpstreamError,
  toError,
} from './errors';
import type { RangeFailure } from './errors';
import { FetchedFile } from './FetchedFile';
import FileAssembler from './FileAssembler';
import type { AssembleResult } from './FileAssembler';
import { FETCH_STATE, FetchStateMachine } from './FetchStateMachine';
import type { FetchStateValue, StateChangeListener } from './FetchStateMachine';
import { AxiosTransport, isSuccessStatus } from './HttpTransport';
import type { HeaderMap, HttpTransport } from './HttpTransport';
import IntegrityVerifier, { assertAlgorithm } from './IntegrityVerifier';
import { UNKNOWN_LENGTH, planRanges, resolveConcurrency } from './RangePlanner';
import type { ByteRange, ContentMetadata, ProgressEvent, ProgressSink } from './types';

const log = createScopedLogger('Fetcher');

/** Colaboradores inyectables; por defecto se construyen a partir de las opciones. */
export interface FetcherDeps {
  transport?: HttpTransport;
  tokenCache?: ChangeTokenCache;
  verifier?: IntegrityVerifier;
  /** Se invoca en cada transición de estado de cada descarga. */
  onStateChange?: StateChangeListener;
}

/**
 * Deriva ContentMetadata de las cabeceras del HEAD. Una Content-Length ausente o no
 * numérica se trata como longitud desconocida.
 */
export function parseContentMetadata(headers: HeaderMap): ContentMetadata {
  const rawLength = (headers['content-length'] ?? '').trim();
  const totalLength = /^\d+$/.test(rawLength) ? Number(rawLength) : UNKNOWN_LENGTH;
  const supportsRanges = (headers['accept-ranges'] ?? '')
    .split(',')
    .some(unit => unit.trim().toLowerCase() === 'bytes');
  return {
    totalLength,
    supportsRanges,
    changeToken: normalizeChangeToken(headers['etag']),
  };
}

/** Envuelve el sink del consumidor para garantizar un único close(). */
class SinkGuard implements ProgressSink {
  private closed = false;

  constructor(private readonly sink: ProgressSink | null) {}

  report(event: ProgressEvent): void {
    if (!this.closed) this.sink?.report(event);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.sink?.close();
  }
}

function annotate(error: unknown, stage: FetchStateValue): FetchError {
  if (error instanceof FetchError) {
    error.stage ??= stage;
    return error;
  }
  return new FetchError(
    'UNEXPECTED',
    `${ERRORS.TRANSFER.UNEXPECTED} [${stage}]: ${toError(error).message}`,
    { cause: error, stage }
  );
}

export class Fetcher {
  readonly options: Readonly<FetcherOptions>;
  private readonly transport: HttpTransport;
  private readonly tokenCache: ChangeTokenCache;
  private readonly verifier: IntegrityVerifier;
  private readonly chunkFetcher: ChunkFetcher;
  private readonly onStateChange: StateChangeListener | null;

  /** @throws InvalidConfigurationError si las opciones no validan. */
  constructor(options: FetcherOptionsInput = {}, deps: FetcherDeps = {}) {
    const result = validate(fetcherOptionsSchema, options);
    if (!result.success || !result.data) {
      throw new InvalidConfigurationError(`${ERRORS.CONFIG.OPTIONS_INVALID}: ${result.error ?? ''}`);
    }
    this.options = result.data;
    if (this.options.integrity) {
      assertAlgorithm(this.options.integrity.algorithm);
    }

    this.transport =
      deps.transport ?? new AxiosTransport({ timeoutMs: this.options.requestTimeoutMs });
    this.tokenCache =
      deps.tokenCache ??
      new ChangeTokenCache({
        cacheRoot: this.options.cacheDir,
        enabled: this.options.trackChangeTokens,
      });
    this.verifier = deps.verifier ?? new IntegrityVerifier();
    this.chunkFetcher = new ChunkFetcher(this.transport);
    this.onStateChange = deps.onStateChange ?? null;
  }

  /**
   * Descarga `url` en `<destDir>/<nombre>` y devuelve el archivo abierto al inicio.
   * El llamador es responsable de cerrar el FetchedFile.
   */
  async fetch(url: string, sink: ProgressSink | null = null): Promise<FetchedFile> {
    const machine = new FetchStateMachine((from, to) => {
      log.debug(`${url}: ${from} → ${to}`);
      this.onStateChange?.(from, to);
    });
    const guard = new SinkGuard(sink);

    try {
      return await this.run(url, machine, guard);
    } catch (error) {
      const failedAt = machine.fail();
      const fetchError = annotate(error, failedAt);
      log.error(`Descarga fallida en ${failedAt}: ${url}`, fetchError.message);
      throw fetchError;
    } finally {
      guard.close();
    }
  }

  private async run(url: string, machine: FetchStateMachine, guard: SinkGuard): Promise<FetchedFile> {
    if (!url) throw new InvalidConfigurationError(ERRORS.CONFIG.URL_REQUIRED);
    if (!isValidUrl(url)) throw new InvalidConfigurationError(`${ERRORS.CONFIG.URL_INVALID}: ${url}`);

    const end = log.startOperation(`descarga de ${url}`);
    const metadata = await this.preflight(url);
    const fileName = fileNameFromUrl(url);
    const store = new ChunkStore(this.options.destDir, fileName);
    const destinationPath = store.destinationPath;

    const cacheHit = await this.tokenCache.shouldSkip({
      resourceKey: fileName,
      token: metadata.changeToken,
      localPath: destinationPath,
      contentLength: metadata.totalLength,
    });
    if (cacheHit) {
      machine.transition(FETCH_STATE.CACHE_HIT);
      guard.close();
      const file = await FetchedFile.open(destinationPath);
      machine.transition(FETCH_STATE.DONE);
      end(`sin cambios (ETag ${metadata.changeToken}), se reutiliza ${destinationPath}`);
      return file;
    }

    machine.transition(FETCH_STATE.PLANNING);
    const concurrency = resolveConcurrency(
      metadata,
      this.options.concurrency,
      this.options.minParallelSize
    );
    const ranges = planRanges(metadata.totalLength, concurrency);
    const singleStream = concurrency === 1;
    log.info(
      `${fileName}: ${formatBytes(metadata.totalLength)}, ${ranges.length} rango(s), ` +
        `Range ${metadata.supportsRanges ? 'sí' : 'no'}`
    );

    await store.ensureDestinationDir();
    const leftovers = await store.describeLeftovers();
    if (leftovers) log.info(`Restos de una ejecución anterior: ${leftovers}`);

    machine.transition(FETCH_STATE.DOWNLOADING);
    let assembled: AssembleResult;
    try {
      if (!singleStream) {
        await store.preparePlan({
          totalLength: metadata.totalLength,
          rangeCount: ranges.length,
          changeToken: metadata.changeToken,
        });
      }
      await this.downloadRanges(url, ranges, metadata.totalLength, guard, index =>
        singleStream ? store.getPartialPath() : store.getChunkPath(index)
      );

      machine.transition(FETCH_STATE.ASSEMBLING);
      const assembler = new FileAssembler(store);
      assembled = singleStream
        ? await assembler.promote(store.getPartialPath(), destinationPath)
        : await assembler.assemble(destinationPath, ranges.length);
    } finally {
      guard.close();
    }

    const { file } = assembled;
    const { integrity } = this.options;
    if (integrity) {
      machine.transition(FETCH_STATE.VERIFYING);
      try {
        await this.verifier.verify(file.handle, file.path, integrity.algorithm, integrity.expectedDigest);
      } catch (error) {
        // El archivo queda en disco para inspección; solo se suelta el handle.
        await file.close();
        throw error;
      }
    }

    // El marcador solo se escribe con el archivo completo y verificado.
    try {
      await this.tokenCache.record(fileName, metadata.changeToken);
    } catch (error) {
      await file.close();
      throw error;
    }

    machine.transition(FETCH_STATE.DONE);
    end(`${formatBytes(assembled.bytesProcessed)} en ${destinationPath}`);
    return file;
  }

  private async preflight(url: string): Promise<ContentMetadata> {
    const response = await this.transport.head(url);
    if (!isSuccessStatus(response.status)) {
      throw new UpstreamError(url, response.status);
    }
    const metadata = parseContentMetadata(response.headers);
    log.object(`Preflight ${url}`, metadata);
    return metadata;
  }

  /**
   * Lanza un ChunkFetcher por rango y espera a todos. Los fallos no cancelan a los rangos
   * hermanos; se agregan en un PartialTransferError al final.
   */
  private async downloadRanges(
    url: string,
    ranges: ByteRange[],
    total: number,
    sink: ProgressSink,
    tempPathFor: (_index: number) => string
  ): Promise<RangeResult[]> {
    const settled = await Promise.allSettled(
      ranges.map(range =>
        this.chunkFetcher.fetchRange({
          url,
          tempFilePath: tempPathFor(range.index),
          range,
          total,
          sink,
        })
      )
    );

    const results: RangeResult[] = [];
    const failures: RangeFailure[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
      } else {
        const error = toError(outcome.reason);
        log.warn(`Rango ${ranges[i].index} falló: ${error.message}`);
        failures.push({ index: ranges[i].index, error });
      }
    });

    if (failures.length > 0) {
      throw new PartialTransferError(failures);
    }

    const resumed = results.reduce((sum, r) => sum + r.resumedBytes, 0);
    const transferred = results.reduce((sum, r) => sum + r.transferredBytes, 0);
    log.debug(
      `Rangos completos: ${formatBytes(transferred)} por red, ${formatBytes(resumed)} reanudados`
    );
    return results;
  }
}

export default Fetcher;
