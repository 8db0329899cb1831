/**
 * HTTP dispatch module exports
 */

export { ErrorClassifier, isSuccessStatus, statusPatterns } from './classifier.js'
export { RequestDispatcher } from './dispatcher.js'
export {
  ClientClosedError,
  ClientError,
  ConfigurationError,
  DomainError,
  isClientErrorOfCode,
  ResolutionError,
  RetriableStatusError,
  TimeoutError,
  TransportError,
} from './errors.js'
export { FetchResponse, FetchTransport } from './fetchTransport.js'
export {
  DEFAULT_BACKOFF_POLICY,
  stopAfterAttempt,
  stopAfterDelay,
  stopAny,
  stopNever,
  unwrapSignal,
  waitExponential,
  waitFixed,
  waitRandomExponential,
  withRetry,
} from './retry.js'
export type { ClassificationRules } from './classifier.js'
export type { RequestDispatcherOptions } from './dispatcher.js'
export type { ClientErrorCode, DomainErrorClass, ErrorDetails, ErrorKind } from './errors.js'
export type { FetchTransportOptions } from './fetchTransport.js'
export type {
  BackoffPolicy,
  ExponentialWaitOptions,
  RetryOptions,
  RetryState,
  StopStrategy,
  WaitStrategy,
} from './retry.js'
export type {
  Attempt,
  ErrorPayload,
  HttpMethod,
  HttpRequestOptions,
  RetrySignal,
  Transport,
  TransportRequestOptions,
  TransportResponse,
} from './types.js'
