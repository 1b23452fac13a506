/**
 * Codes carried in the `error` field of every error response body.
 *
 * `UpstreamTimeout` and `UpstreamRejected` never leave the proxy; they are kept here so
 * the outcome classification and the log lines use the same vocabulary.
 */
export const ErrorCode = {
  InvalidRequest: 'InvalidRequest',
  DuplicateUser: 'DuplicateUser',
  InvalidCredentials: 'InvalidCredentials',
  Unauthorized: 'Unauthorized',
  DuplicateKey: 'DuplicateKey',
  NotFound: 'NotFound',
  PoolExhausted: 'PoolExhausted',
  UpstreamTimeout: 'UpstreamTimeout',
  UpstreamRejected: 'UpstreamRejected',
  UpstreamUnavailable: 'UpstreamUnavailable',
  UpstreamBadRequest: 'UpstreamBadRequest',
  PersistenceFailure: 'PersistenceFailure',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];
