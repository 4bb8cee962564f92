/**
 * Punto de entrada del motor de descargas: reexporta Fetcher, RangePlanner, ChunkFetcher,
 * ChunkStore, FileAssembler, ChangeTokenCache, IntegrityVerifier, el canal de progreso,
 * el transporte HTTP, la máquina de estados y los errores.
 *
 * @module engines
 */

export { default as Fetcher, parseContentMetadata } from './Fetcher';
export type { FetcherDeps } from './Fetcher';
export type { ContentMetadata, ByteRange, ProgressEvent, ProgressSink } from './types';
export { UNKNOWN_LENGTH, planRanges, rangeWidth, resolveConcurrency } from './RangePlanner';
export { default as ChunkFetcher } from './ChunkFetcher';
export type { RangeRequest, RangeResult } from './ChunkFetcher';
export { default as ChunkStore } from './ChunkStore';
export type { ChunkInfo, ChunkPlan } from './ChunkStore';
export { default as FileAssembler } from './FileAssembler';
export type { AssembleResult } from './FileAssembler';
export { FetchedFile } from './FetchedFile';
export { default as ChangeTokenCache, normalizeChangeToken } from './ChangeTokenCache';
export type { ChangeTokenCacheOptions, SkipQuery } from './ChangeTokenCache';
export {
  default as IntegrityVerifier,
  SUPPORTED_ALGORITHMS,
  assertAlgorithm,
  isSupportedAlgorithm,
} from './IntegrityVerifier';
export type { HashAlgorithm } from './IntegrityVerifier';
export { ProgressChannel, ProgressAggregator, drainProgress } from './ProgressChannel';
export type { ProgressSnapshot } from './ProgressChannel';
export { ProgressWriter, FileHandleWriter } from './ProgressWriter';
export type { ByteWriter } from './ProgressWriter';
export { AxiosTransport, isSuccessStatus } from './HttpTransport';
export type {
  HttpTransport,
  HttpHeadResponse,
  HttpGetResponse,
  HeaderMap,
  AxiosTransportOptions,
} from './HttpTransport';
export {
  FETCH_STATE,
  FetchStateMachine,
  canTransition,
  isTerminalState,
} from './FetchStateMachine';
export type { FetchStateValue, StateChangeListener } from './FetchStateMachine';
export {
  FetchError,
  InvalidConfigurationError,
  UpstreamError,
  PartialTransferError,
  AssemblyError,
  UnsupportedAlgorithmError,
  IntegrityMismatchError,
} from './errors';
export type { FetchErrorCode, RangeFailure } from './errors';
