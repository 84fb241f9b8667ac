/**
 * Suggestion backend backed by the Anthropic Messages API.
 *
 * Asks the model for packages that fit a described workflow and parses the
 * JSON it returns. The SDK is loaded lazily so the rest of the system works
 * without it being configured.
 */

import { BackendUnavailableError } from './suggestion-backend.js';
import type { SuggestionBackend, SuggestionRequest } from './suggestion-backend.js';

// ============================================================================
// Types
// ============================================================================

export interface LlmBackendOptions {
  model: string;
  /** Defaults to ANTHROPIC_API_KEY */
  apiKey?: string;
  maxTokens?: number;
}

const DEFAULT_MAX_TOKENS = 1024;

// ============================================================================
// Availability
// ============================================================================

/**
 * Check whether an API key is available for the LLM backend.
 */
export function isLlmBackendAvailable(apiKey?: string): boolean {
  return !!(apiKey ?? process.env.ANTHROPIC_API_KEY);
}

// ============================================================================
// Prompt
// ============================================================================

export function buildSuggestionPrompt(request: SuggestionRequest): string {
  return `You recommend Linux software packages.

The user describes their workflow as:
"""
${request.workflow}
"""

Suggest up to ${request.maxSuggestions} packages that would help with this workflow.
Use the package's canonical name as known to common package managers.

Respond in JSON format only, no markdown:
[
  { "package": "<name>", "reason": "<one sentence>", "confidence": <0-1 number> }
]`;
}

// ============================================================================
// Response parsing
// ============================================================================

/**
 * Extract the suggestion array from model output.
 *
 * Accepts a bare JSON array, an object with a `suggestions` array, and
 * either wrapped in a fenced code block or surrounded by prose.
 *
 * @throws {BackendUnavailableError} When no suggestion array can be found
 */
export function parseSuggestionText(text: string): unknown[] {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const body = (fenced ? fenced[1] : text).trim();

  const direct = tryParseJson(body);
  const fromDirect = extractArray(direct);
  if (fromDirect) return fromDirect;

  const start = body.indexOf('[');
  const end = body.lastIndexOf(']');
  if (start !== -1 && end > start) {
    const fromSlice = extractArray(tryParseJson(body.slice(start, end + 1)));
    if (fromSlice) return fromSlice;
  }

  throw new BackendUnavailableError('Malformed backend response: no suggestion array found');
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function extractArray(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (typeof value === 'object' && value !== null && 'suggestions' in value) {
    const { suggestions } = value;
    if (Array.isArray(suggestions)) return suggestions;
  }
  return null;
}

// ============================================================================
// createLlmSuggestionBackend
// ============================================================================

/**
 * Create a suggestion backend that queries Claude.
 *
 * @example
 * ```typescript
 * const backend = createLlmSuggestionBackend({ model: 'claude-sonnet-4-20250514' });
 * const outcome = await requestSuggestions(backend, { workflow, maxSuggestions: 10 }, 15000);
 * ```
 */
export function createLlmSuggestionBackend(options: LlmBackendOptions): SuggestionBackend {
  return async (request, signal) => {
    const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new BackendUnavailableError('ANTHROPIC_API_KEY is not set');
    }

    const { default: Anthropic } = await import('@anthropic-ai/sdk');
    const client = new Anthropic({ apiKey });

    const response = await client.messages
      .create(
        {
          model: options.model,
          max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
          messages: [{ role: 'user', content: buildSuggestionPrompt(request) }],
        },
        { signal },
      )
      .catch((err: unknown) => {
        throw new BackendUnavailableError(
          `Suggestion request failed: ${err instanceof Error ? err.message : String(err)}`,
        );
      });

    // Extract text content
    const textContent = response.content.find((block) => block.type === 'text');
    if (!textContent || textContent.type !== 'text') {
      throw new BackendUnavailableError('Malformed backend response: no text content');
    }

    return parseSuggestionText(textContent.text);
  };
}
