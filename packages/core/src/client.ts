export interface CompleteOptions {
  /** Level ceiling, passed to the backend as its reply limit */
  maxTokens: number
  temperature: number
  /** Fires on timeout and on caller cancellation */
  signal?: AbortSignal
}

/**
 * One capability shared by every backend: accept a bounded prompt, return
 * the reply text or reject with a `ProviderError`.
 */
export interface ModelClient {
  readonly name: string
  complete(prompt: string, opts: CompleteOptions): Promise<string>
}
