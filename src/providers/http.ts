/**
 * JSON over HTTP with a per-request timeout
 */

import { toError } from '../shared/errors.js';

export interface JsonRequestOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

export type JsonResponse =
  | { ok: true; status: number; body: unknown }
  | { ok: false; status: number | null; message: string };

export async function getJson(url: string, options: JsonRequestOptions): Promise<JsonResponse> {
  const timeout = AbortSignal.timeout(options.timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: 'application/json', ...options.headers },
      signal,
    });
  } catch (err) {
    if (timeout.aborted) {
      return { ok: false, status: null, message: `timed out after ${options.timeoutMs}ms` };
    }
    if (options.signal?.aborted) {
      return { ok: false, status: null, message: 'aborted' };
    }
    return { ok: false, status: null, message: toError(err).message };
  }

  if (!response.ok) {
    return { ok: false, status: response.status, message: `HTTP ${response.status}` };
  }

  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    return { ok: false, status: response.status, message: toError(err).message };
  }
  if (text.trim().length === 0) {
    return { ok: false, status: response.status, message: 'empty response body' };
  }

  try {
    return { ok: true, status: response.status, body: JSON.parse(text) };
  } catch {
    return { ok: false, status: response.status, message: 'response is not valid JSON' };
  }
}

/**
 * Encode each path segment of a DOI but keep its slashes.
 */
export function encodeIdentifierPath(id: string): string {
  return id.split('/').map(encodeURIComponent).join('/');
}

export function joinUrl(base: string, ...segments: string[]): string {
  return [base.replace(/\/+$/, ''), ...segments].join('/');
}
