import { ResultAsync as RA, type ResultAsync } from 'neverthrow';
import type { HttpProbeError, HttpProbePort, HttpProbeResponse } from '../../../ports/http-probe.port.js';
import { errorMessage } from '../node-error-code.js';

/**
 * GET via the global fetch with `AbortSignal.timeout`. The response body is
 * discarded so the connection is released before the probe resolves.
 */
export class FetchHttpProbe implements HttpProbePort {
  get(url: URL, timeoutMs: number): ResultAsync<HttpProbeResponse, HttpProbeError> {
    return RA.fromPromise(request(url, timeoutMs), (e) => mapFetchError(e, timeoutMs));
  }
}

async function request(url: URL, timeoutMs: number): Promise<HttpProbeResponse> {
  const response = await fetch(url, {
    method: 'GET',
    redirect: 'follow',
    signal: AbortSignal.timeout(timeoutMs),
  });
  await response.body?.cancel();
  return { status: response.status, ok: response.ok };
}

function mapFetchError(e: unknown, timeoutMs: number): HttpProbeError {
  if (e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError')) {
    return { code: 'HTTP_TIMEOUT', message: `Request timed out after ${timeoutMs}ms` };
  }
  // undici reports "fetch failed" and keeps the useful part in `cause`.
  const cause = e instanceof Error ? e.cause : undefined;
  return { code: 'HTTP_TRANSPORT', message: cause === undefined ? errorMessage(e) : errorMessage(cause) };
}
