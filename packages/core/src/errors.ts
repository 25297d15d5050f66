export type ProviderErrorKind =
  | 'invalid-credential'
  | 'unsupported'
  | 'quota'
  | 'network'
  | 'timeout'
  | 'unknown'

const RETRYABLE = new Set<ProviderErrorKind>(['quota', 'network'])

/**
 * Failure reported by a model client. `kind` lets callers tell a dead
 * credential from a rate limit they may wait out.
 */
export class ProviderError extends Error {
  constructor(
    public readonly kind: ProviderErrorKind,
    public readonly provider: string,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`[provider-${provider}] ${message}`, options)
    this.name = 'ProviderError'
  }

  get retryable(): boolean {
    return RETRYABLE.has(this.kind)
  }
}

/** Invalid configuration, credential or provider; fatal and never retried. */
export class ReviewConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ReviewConfigError'
  }
}

export class ReviewCancelledError extends Error {
  constructor(message = 'review cancelled while waiting for the model', options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ReviewCancelledError'
  }
}

export function isProviderError(e: unknown): e is ProviderError {
  return e instanceof ProviderError
}
