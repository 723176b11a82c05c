import type { ResultAsync } from 'neverthrow';

export type HttpProbeResponse = {
  readonly status: number;
  readonly ok: boolean;
};

export type HttpProbeError =
  | { readonly code: 'HTTP_TIMEOUT'; readonly message: string }
  | { readonly code: 'HTTP_TRANSPORT'; readonly message: string };

/**
 * Port: a single GET with a deadline. Any HTTP status is an `ok` response;
 * only transport failures and timeouts are errors.
 */
export interface HttpProbePort {
  get(url: URL, timeoutMs: number): ResultAsync<HttpProbeResponse, HttpProbeError>;
}
