export type RelayErrorKind =
  | 'configuration'
  | 'transport'
  | 'remote_rejected'
  | 'remote_job_failed'
  | 'timeout'

export class RelayError extends Error {
  readonly kind: RelayErrorKind

  constructor(kind: RelayErrorKind, message: string) {
    super(message)
    this.kind = kind
    this.name = 'RelayError'
  }
}

/** GPU credentials are not set. */
export class ConfigurationError extends RelayError {
  constructor(message: string) {
    super('configuration', message)
    this.name = 'ConfigurationError'
  }
}

/** Network failure, timeout or unreadable response from the GPU API. */
export class TransportError extends RelayError {
  constructor(message: string) {
    super('transport', message)
    this.name = 'TransportError'
  }
}

/** The GPU API answered a submission with an error or without a job id. */
export class RemoteRejected extends RelayError {
  readonly httpStatus: number | undefined

  constructor(message: string, httpStatus?: number) {
    super('remote_rejected', message)
    this.httpStatus = httpStatus
    this.name = 'RemoteRejected'
  }
}

/** The job reached FAILED, or COMPLETED with a non-success payload. */
export class RemoteJobFailed extends RelayError {
  constructor(message: string) {
    super('remote_job_failed', message)
    this.name = 'RemoteJobFailed'
  }
}

export class JobTimeout extends RelayError {
  readonly elapsedSeconds: number

  constructor(elapsedSeconds: number) {
    super('timeout', `job exceeded its time limit after ${Math.round(elapsedSeconds)}s`)
    this.elapsedSeconds = elapsedSeconds
    this.name = 'JobTimeout'
  }
}

export const DEFAULT_GPU_ERROR = 'Unknown GPU error'

/**
 * The one status message shown to the client for a failed generation.
 * Poll-time transport errors use `POLL_ERROR_MESSAGE` instead.
 */
export function describeFailure(err: RelayError): string {
  switch (err.kind) {
    case 'configuration':
      return 'Server config error: missing API keys.'
    case 'transport':
      return `Error: could not reach GPU server (${err.message}).`
    case 'remote_rejected':
      return `GPU server error: ${err.message}`
    case 'remote_job_failed':
      return `GPU error: ${err.message}`
    case 'timeout':
      return 'Error: job timed out.'
  }
}

export const POLL_ERROR_MESSAGE = 'Error checking job status.'
