/**
 * Contract for the external suggestion backend and a timeout-bounded call.
 *
 * The backend is an opaque awaitable function: workflow text in, raw
 * suggestion records out. The caller enforces the timeout; the backend only
 * receives an AbortSignal it may honor.
 */

// ============================================================================
// Types
// ============================================================================

export interface SuggestionRequest {
  workflow: string;
  /** Hint for how many suggestions to return */
  maxSuggestions: number;
}

/**
 * Suggestion backend. Resolves to raw suggestion records (any shape; the
 * normalizer validates them) or rejects when unavailable.
 */
export type SuggestionBackend = (request: SuggestionRequest, signal: AbortSignal) => Promise<unknown>;

export type SuggestionOutcome =
  | { status: 'ok'; suggestions: unknown[] }
  | { status: 'timeout'; timeoutMs: number }
  | { status: 'failed'; error: string };

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised by backends for connection failures and malformed top-level
 * responses. Always recovered by {@link requestSuggestions}.
 */
export class BackendUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BackendUnavailableError';
  }
}

// ============================================================================
// requestSuggestions
// ============================================================================

/**
 * Call a backend with a hard timeout. Never rejects.
 *
 * - Resolves `ok` with the raw array when the backend returns an array.
 * - Resolves `timeout` when the backend does not settle in `timeoutMs`;
 *   the backend's signal is aborted.
 * - Resolves `failed` on rejection or a non-array response.
 */
export async function requestSuggestions(
  backend: SuggestionBackend,
  request: SuggestionRequest,
  timeoutMs: number,
): Promise<SuggestionOutcome> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<SuggestionOutcome>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ status: 'timeout', timeoutMs });
    }, timeoutMs);
  });

  const call = (async (): Promise<SuggestionOutcome> => {
    try {
      const response = await backend(request, controller.signal);
      if (!Array.isArray(response)) {
        return { status: 'failed', error: 'Malformed backend response: expected an array of suggestions' };
      }
      return { status: 'ok', suggestions: response };
    } catch (err) {
      return { status: 'failed', error: err instanceof Error ? err.message : String(err) };
    }
  })();

  try {
    return await Promise.race([call, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
