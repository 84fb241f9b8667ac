import { describe, it, expect } from 'vitest';
import { requestSuggestions, BackendUnavailableError } from './suggestion-backend.js';
import type { SuggestionBackend } from './suggestion-backend.js';

const REQUEST = { workflow: 'web development with python', maxSuggestions: 10 };

describe('requestSuggestions', () => {
  it('resolves ok with the raw suggestions', async () => {
    const backend: SuggestionBackend = async () => [{ package: 'flask', reason: 'web' }];

    const outcome = await requestSuggestions(backend, REQUEST, 1000);
    expect(outcome).toEqual({ status: 'ok', suggestions: [{ package: 'flask', reason: 'web' }] });
  });

  it('passes the request through to the backend', async () => {
    let seen: unknown;
    const backend: SuggestionBackend = async (request) => {
      seen = request;
      return [];
    };

    await requestSuggestions(backend, REQUEST, 1000);
    expect(seen).toEqual(REQUEST);
  });

  it('resolves timeout and aborts the signal when the backend hangs', async () => {
    let signal: AbortSignal | undefined;
    const backend: SuggestionBackend = (_request, s) => {
      signal = s;
      return new Promise(() => {});
    };

    const outcome = await requestSuggestions(backend, REQUEST, 20);
    expect(outcome).toEqual({ status: 'timeout', timeoutMs: 20 });
    expect(signal?.aborted).toBe(true);
  });

  it('resolves failed when the backend rejects', async () => {
    const backend: SuggestionBackend = async () => {
      throw new BackendUnavailableError('connection refused');
    };

    const outcome = await requestSuggestions(backend, REQUEST, 1000);
    expect(outcome).toEqual({ status: 'failed', error: 'connection refused' });
  });

  it('resolves failed for a non-array response', async () => {
    const backend: SuggestionBackend = async () => ({ package: 'flask' });

    const outcome = await requestSuggestions(backend, REQUEST, 1000);
    expect(outcome.status).toBe('failed');
  });

  it('stringifies non-Error rejections', async () => {
    const backend: SuggestionBackend = () => Promise.reject('boom');

    const outcome = await requestSuggestions(backend, REQUEST, 1000);
    expect(outcome).toEqual({ status: 'failed', error: 'boom' });
  });
});
