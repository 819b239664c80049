export interface RetryOptions {
  attempts: number
  backoffMs: number
  /** Return false to rethrow immediately. Defaults to retrying every error. */
  shouldRetry?: (error: unknown) => boolean
  onRetry?: (error: unknown, attempt: number) => void
  signal?: AbortSignal
}

/**
 * Retries an async operation with fixed backoff.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: unknown

  for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
    try {
      return await fn()
    } catch (error) {
      lastError = error
      const retryable = options.shouldRetry?.(error) ?? true
      if (!retryable || options.signal?.aborted) throw error
      if (attempt < options.attempts) {
        options.onRetry?.(error, attempt)
        await new Promise((resolve) => setTimeout(resolve, options.backoffMs))
      }
    }
  }

  throw lastError
}
